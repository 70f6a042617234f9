export type MessageRole = "system" | "user";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export type ResponseFormat = "json" | "text";

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  response_format?: { type: "json_object" };
}

export interface ClientConfig {
  apiKey?: string;
  apiUrl?: string;
}

export interface QueryOptions {
  model: string;
  systemPrompt?: string;
  /** Defaults to {@link DEFAULT_MAX_TOKENS}. */
  maxTokens?: number;
  responseFormat?: ResponseFormat;
  /** Left out of the payload when undefined so the service applies its own default. */
  temperature?: number;
  apiUrl?: string;
}

export const DEFAULT_API_URL = "https://openrouter.ai/api/v1/chat/completions";
export const DEFAULT_MAX_TOKENS = 2048;

export type QueryErrorKind = "config" | "input" | "transport" | "shape";

export class LLMError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "LLMError";
  }
}

export class ConfigError extends LLMError {
  readonly kind = "config" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class InputError extends LLMError {
  readonly kind = "input" as const;

  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class TransportError extends LLMError {
  readonly kind = "transport" as const;

  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = "TransportError";
  }
}

export class ShapeError extends LLMError {
  readonly kind = "shape" as const;

  constructor(message: string, public readonly body: string) {
    super(message);
    this.name = "ShapeError";
  }
}

export type QueryError = ConfigError | InputError | TransportError | ShapeError;

export type QueryResult =
  | { ok: true; text: string; raw: unknown }
  | { ok: false; error: QueryError };

export interface QueryClient {
  query(prompt: string, options: QueryOptions): Promise<QueryResult>;
}

export function unwrapQueryResult(result: QueryResult): string {
  if (!result.ok) {
    throw result.error;
  }
  return result.text;
}
