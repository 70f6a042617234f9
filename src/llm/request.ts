import {
  type ChatCompletionRequest,
  type ChatMessage,
  DEFAULT_API_URL,
  DEFAULT_MAX_TOKENS,
  type QueryOptions,
} from "./base";

function present(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function resolveApiUrl(...candidates: Array<string | undefined>): string {
  const url = candidates.find(present);
  return url ? url.trim() : DEFAULT_API_URL;
}

export function buildChatRequest(prompt: string, options: QueryOptions): ChatCompletionRequest {
  const messages: ChatMessage[] = [];
  if (present(options.systemPrompt)) {
    messages.push({ role: "system", content: options.systemPrompt });
  }
  messages.push({ role: "user", content: prompt });

  const payload: ChatCompletionRequest = {
    model: options.model,
    messages,
    max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
  };
  if (typeof options.temperature === "number") {
    payload.temperature = options.temperature;
  }
  if (options.responseFormat === "json") {
    payload.response_format = { type: "json_object" };
  }
  return payload;
}
