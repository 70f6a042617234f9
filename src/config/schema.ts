import fs from "fs";
import path from "path";
import { z } from "zod";
import YAML from "yaml";
import { DEFAULT_MAX_TOKENS } from "../llm/base";

export const DEFAULT_MODEL = "openai/gpt-4o-mini";

export const API_KEY_ENV_VARS = ["LLM_API_KEY", "OPENROUTER_API_KEY"] as const;

export const appConfigSchema = z.object({
  provider: z.enum(["openrouter", "mock"]).default("openrouter"),
  apiUrl: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).default(DEFAULT_MODEL),
  systemPrompt: z.string().optional(),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: z.number().min(0).max(2).optional(),
  responseFormat: z.enum(["json", "text"]).optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;

function readConfigFile(filePath: string): unknown {
  const data = fs.readFileSync(filePath, "utf8");
  if (filePath.endsWith(".yaml") || filePath.endsWith(".yml")) {
    return YAML.parse(data);
  }
  return JSON.parse(data);
}

export function resolveApiKey(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (explicit?.trim()) {
    return explicit;
  }
  for (const name of API_KEY_ENV_VARS) {
    const value = env[name];
    if (value?.trim()) {
      return value;
    }
  }
  return undefined;
}

/**
 * Builds the runtime config from an optional YAML/JSON file, flag overrides
 * and the environment. Overrides win over file values; the API key falls
 * back to the environment when neither sets it.
 */
export function loadConfig(
  configPath?: string,
  overrides: Partial<AppConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  let fileValues: unknown = {};
  if (configPath) {
    const absolutePath = path.isAbsolute(configPath)
      ? configPath
      : path.join(process.cwd(), configPath);
    fileValues = readConfigFile(absolutePath) ?? {};
  }
  const base = z.record(z.string(), z.unknown()).parse(fileValues);
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = appConfigSchema.parse({ ...base, ...defined });
  return {
    ...parsed,
    apiKey: resolveApiKey(parsed.apiKey, env),
  };
}
