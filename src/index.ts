export {
  ConfigError,
  DEFAULT_API_URL,
  DEFAULT_MAX_TOKENS,
  InputError,
  LLMError,
  ShapeError,
  TransportError,
  unwrapQueryResult,
} from "./llm/base";
export type {
  ChatCompletionRequest,
  ChatMessage,
  ClientConfig,
  QueryClient,
  QueryError,
  QueryErrorKind,
  QueryOptions,
  QueryResult,
  ResponseFormat,
} from "./llm/base";
export { buildChatRequest, resolveApiUrl } from "./llm/request";
export { ChatCompletionClient } from "./llm/openai";
export type { ChatCompletionClientOptions } from "./llm/openai";
export { MockQueryClient } from "./llm/mock";
export { createQueryClient } from "./llm";
export { appConfigSchema, loadConfig, resolveApiKey } from "./config/schema";
export type { AppConfig } from "./config/schema";
export { parseEntityList } from "./entities/parse";
export type { Entity, EntityParseResult } from "./entities/parse";
export { formatEntityReport } from "./entities/present";
export { DEFAULT_EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from "./entities/prompt";
export { extractEntities } from "./entities/extract";
export type { ExtractionOptions, ExtractionOutcome } from "./entities/extract";
export { Logger, logger } from "./utils/logger";
