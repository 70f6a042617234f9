import { type AppConfigInput, loadConfig } from "../config/schema";
import { extractEntities } from "../entities/extract";
import { formatEntityReport } from "../entities/present";
import { createQueryClient } from "../llm";
import type { QueryOptions } from "../llm/base";
import { type Logger, logger as defaultLogger } from "../utils/logger";

export interface CommonOptions {
  config?: string;
  provider?: AppConfigInput["provider"];
  model?: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  apiUrl?: string;
}

export interface ExtractOptions extends CommonOptions {
  /** Unset leaves the format to the config file, then to JSON. */
  json?: boolean;
}

export interface QueryCommandOptions extends CommonOptions {
  json?: boolean;
}

export interface CommandIo {
  write: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof globalThis.fetch;
  logger?: Logger;
}

function resolveSetup(opts: CommonOptions, io: CommandIo, responseFormat?: QueryOptions["responseFormat"]) {
  const config = loadConfig(
    opts.config,
    {
      provider: opts.provider,
      model: opts.model,
      systemPrompt: opts.system,
      maxTokens: opts.maxTokens,
      temperature: opts.temperature,
      apiUrl: opts.apiUrl,
      responseFormat,
    },
    io.env
  );
  const client = createQueryClient(config, {
    fetchImpl: io.fetchImpl,
    logger: io.logger ?? defaultLogger,
  });
  const queryOptions: QueryOptions = {
    model: config.model,
    systemPrompt: config.systemPrompt,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    responseFormat: config.responseFormat,
    apiUrl: config.apiUrl,
  };
  return { client, queryOptions };
}

/**
 * Runs one extraction and writes the entity report. Returns the exit code:
 * a failed request is 1, while unparseable model output still exits 0
 * because the report already explains it.
 */
export async function runExtract(text: string, opts: ExtractOptions, io: CommandIo): Promise<number> {
  const log = io.logger ?? defaultLogger;
  const format = opts.json === undefined ? undefined : opts.json ? "json" : "text";
  const { client, queryOptions } = resolveSetup(opts, io, format);
  const outcome = await extractEntities(client, text, queryOptions);
  if (!outcome.ok) {
    io.write(`Extraction failed: ${outcome.error.message}`);
    return 1;
  }
  if (outcome.parsed.kind !== "ok") {
    log.warn("model output could not be read as an entity list", { kind: outcome.parsed.kind });
  }
  for (const line of formatEntityReport(outcome.parsed)) {
    io.write(line);
  }
  return 0;
}

export async function runQuery(prompt: string, opts: QueryCommandOptions, io: CommandIo): Promise<number> {
  const { client, queryOptions } = resolveSetup(opts, io, opts.json ? "json" : undefined);
  const result = await client.query(prompt, queryOptions);
  if (!result.ok) {
    io.write(`Query failed: ${result.error.message}`);
    return 1;
  }
  io.write(result.text);
  return 0;
}
