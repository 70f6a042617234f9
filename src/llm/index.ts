import type { AppConfig } from "../config/schema";
import type { Logger } from "../utils/logger";
import type { QueryClient } from "./base";
import { MockQueryClient } from "./mock";
import { ChatCompletionClient } from "./openai";

export interface ClientFactoryOptions {
  fetchImpl?: typeof globalThis.fetch;
  logger?: Logger;
}

export function createQueryClient(config: AppConfig, options: ClientFactoryOptions = {}): QueryClient {
  if (config.provider === "mock") {
    return new MockQueryClient();
  }
  return new ChatCompletionClient(
    { apiKey: config.apiKey, apiUrl: config.apiUrl },
    { fetchImpl: options.fetchImpl, logger: options.logger }
  );
}
