import { nanoid } from "nanoid";
import { z } from "zod";
import {
  type ClientConfig,
  ConfigError,
  InputError,
  type QueryClient,
  type QueryOptions,
  type QueryResult,
  ShapeError,
  TransportError,
} from "./base";
import { buildChatRequest, resolveApiUrl } from "./request";
import { type Logger, logger as defaultLogger } from "../utils/logger";

type FetchImpl = typeof globalThis.fetch;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export interface ChatCompletionClientOptions {
  fetchImpl?: FetchImpl;
  logger?: Logger;
}

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint.
 *
 * Every call is a single POST; there is no retry, timeout or streaming.
 * Failures come back as a {@link QueryResult} carrying a typed error instead
 * of being thrown.
 */
export class ChatCompletionClient implements QueryClient {
  private readonly fetchImpl: FetchImpl;
  private readonly logger: Logger;

  constructor(
    private readonly config: ClientConfig,
    options: ChatCompletionClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = options.logger ?? defaultLogger;
  }

  async query(prompt: string, options: QueryOptions): Promise<QueryResult> {
    const requestId = nanoid(6);
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) {
      const error = new ConfigError("API key is not configured");
      this.logger.error(error.message, { requestId });
      return { ok: false, error };
    }
    if (!prompt.trim()) {
      const error = new InputError("Prompt must not be empty");
      this.logger.error(error.message, { requestId });
      return { ok: false, error };
    }

    const url = resolveApiUrl(options.apiUrl, this.config.apiUrl);
    const payload = buildChatRequest(prompt, options);
    this.logger.debug("sending chat completion", {
      requestId,
      url,
      model: payload.model,
      messages: payload.messages.length,
    });

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(payload),
      });
      body = await response.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error = new TransportError(`Request to ${url} failed: ${reason}`, undefined, undefined, err);
      this.logger.error(error.message, { requestId });
      return { ok: false, error };
    }

    if (!response.ok) {
      const error = new TransportError(
        `Chat completion request failed with status ${response.status}`,
        response.status,
        body
      );
      this.logger.error(error.message, { requestId, status: response.status, body });
      return { ok: false, error };
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      const error = new ShapeError("Response body is not valid JSON", body);
      this.logger.error(error.message, { requestId, body });
      return { ok: false, error };
    }

    const parsed = completionSchema.safeParse(data);
    if (!parsed.success) {
      const error = new ShapeError("Response is missing choices[0].message.content", body);
      this.logger.error(error.message, { requestId, body });
      return { ok: false, error };
    }

    this.logger.debug("chat completion received", { requestId, status: response.status });
    return { ok: true, text: parsed.data.choices[0].message.content, raw: data };
  }
}
