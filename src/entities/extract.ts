import type { QueryClient, QueryError, QueryOptions } from "../llm/base";
import { type EntityParseResult, parseEntityList } from "./parse";
import { DEFAULT_EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from "./prompt";

export type ExtractionOptions = Omit<QueryOptions, "responseFormat"> & {
  /** Defaults to `"json"`. */
  responseFormat?: QueryOptions["responseFormat"];
  template?: string;
};

export type ExtractionOutcome =
  | { ok: true; text: string; parsed: EntityParseResult }
  | { ok: false; error: QueryError };

export async function extractEntities(
  client: QueryClient,
  text: string,
  options: ExtractionOptions
): Promise<ExtractionOutcome> {
  const { template, ...rest } = options;
  const result = await client.query(buildExtractionPrompt(text, template), {
    ...rest,
    systemPrompt: rest.systemPrompt ?? DEFAULT_EXTRACTION_SYSTEM_PROMPT,
    responseFormat: rest.responseFormat ?? "json",
  });
  if (!result.ok) {
    return result;
  }
  return { ok: true, text: result.text, parsed: parseEntityList(result.text) };
}
