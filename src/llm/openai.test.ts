import test from "node:test";
import assert from "node:assert/strict";

import { completionBody, createFakeFetch } from "../testing/fakeFetch";
import { Logger } from "../utils/logger";
import { ConfigError, DEFAULT_API_URL, InputError, ShapeError, TransportError, unwrapQueryResult } from "./base";
import { ChatCompletionClient } from "./openai";

function captureLogger() {
  const lines: string[] = [];
  return { lines, logger: new Logger("debug", (line) => lines.push(line)) };
}

test("missing credential returns a config error without calling the network", async () => {
  const fake = createFakeFetch({ body: completionBody("unused") });
  const { lines, logger } = captureLogger();

  for (const apiKey of [undefined, "", "  "]) {
    const client = new ChatCompletionClient({ apiKey }, { fetchImpl: fake.fetchImpl, logger });
    const result = await client.query("Hello", { model: "test-model" });
    assert.equal(result.ok, false);
    assert.ok(!result.ok && result.error instanceof ConfigError);
  }

  assert.equal(fake.calls.length, 0);
  assert.equal(lines.length, 3);
  assert.match(lines[0] ?? "", /API key is not configured/);
});

test("blank prompt returns an input error without calling the network", async () => {
  const fake = createFakeFetch({ body: completionBody("unused") });
  const { logger } = captureLogger();
  const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });

  for (const prompt of ["", " ", "\n\t  "]) {
    const result = await client.query(prompt, { model: "test-model" });
    assert.ok(!result.ok && result.error instanceof InputError);
  }

  assert.equal(fake.calls.length, 0);
});

test("credential is checked before the prompt", async () => {
  const fake = createFakeFetch({ body: completionBody("unused") });
  const { logger } = captureLogger();
  const client = new ChatCompletionClient({}, { fetchImpl: fake.fetchImpl, logger });

  const result = await client.query("   ", { model: "test-model" });

  assert.ok(!result.ok && result.error.kind === "config");
});

test("successful call posts the payload with a bearer header and returns the content", async () => {
  const content = '{"entities":[{"text":"Joe","type":"PERSON"},{"text":"Christchurch","type":"LOCATION"}]}';
  const fake = createFakeFetch({ body: completionBody(content) });
  const { logger } = captureLogger();
  const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });

  const result = await client.query("Hi there, I am Joe and I live in Christchurch.", {
    model: "test-model",
    responseFormat: "json",
  });

  assert.equal(unwrapQueryResult(result), content);
  assert.equal(fake.calls.length, 1);
  const call = fake.calls[0];
  assert.equal(call?.url, DEFAULT_API_URL);
  assert.equal(call?.method, "POST");
  assert.equal(call?.headers.authorization, "Bearer test-secret");
  assert.equal(call?.headers["content-type"], "application/json");
  assert.deepEqual(call?.body, {
    model: "test-model",
    messages: [{ role: "user", content: "Hi there, I am Joe and I live in Christchurch." }],
    max_tokens: 2048,
    response_format: { type: "json_object" },
  });
});

test("per-call api url wins over the configured one", async () => {
  const fake = createFakeFetch({ body: completionBody("ok") });
  const { logger } = captureLogger();
  const client = new ChatCompletionClient(
    { apiKey: "test-secret", apiUrl: "http://configured.test/v1/chat/completions" },
    { fetchImpl: fake.fetchImpl, logger }
  );

  await client.query("Hello", { model: "test-model", apiUrl: "http://localhost:1234/v1/chat/completions" });
  await client.query("Hello", { model: "test-model", apiUrl: " " });

  assert.equal(fake.calls[0]?.url, "http://localhost:1234/v1/chat/completions");
  assert.equal(fake.calls[1]?.url, "http://configured.test/v1/chat/completions");
});

test("non-success status becomes a transport error carrying the raw body", async () => {
  const errorBody = '{"error":{"message":"Rate limit exceeded","code":429}}';
  const fake = createFakeFetch({ status: 429, body: errorBody });
  const { lines, logger } = captureLogger();
  const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });

  const result = await client.query("Hello", { model: "test-model" });

  assert.ok(!result.ok);
  assert.ok(result.error instanceof TransportError);
  assert.equal(result.error.status, 429);
  assert.equal(result.error.body, errorBody);
  assert.equal(result.error.message, "Chat completion request failed with status 429");
  assert.ok(lines.some((line) => line.includes("status 429") && line.includes("Rate limit exceeded")));
  assert.throws(() => unwrapQueryResult(result), TransportError);
});

test("fetch rejection becomes a transport error", async () => {
  const fake = createFakeFetch(new TypeError("fetch failed"));
  const { logger } = captureLogger();
  const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });

  const result = await client.query("Hello", { model: "test-model" });

  assert.ok(!result.ok && result.error instanceof TransportError);
  assert.equal(result.error.status, undefined);
  assert.equal(result.error.message, `Request to ${DEFAULT_API_URL} failed: fetch failed`);
  assert.ok(result.error.cause instanceof TypeError);
});

test("success status without message content becomes a shape error", async () => {
  const body = '{"choices":[{"index":0,"message":{"role":"assistant"}}]}';
  const fake = createFakeFetch({ body });
  const { lines, logger } = captureLogger();
  const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });

  const result = await client.query("Hello", { model: "test-model" });

  assert.ok(!result.ok && result.error instanceof ShapeError);
  assert.equal(result.error.message, "Response is missing choices[0].message.content");
  assert.equal(result.error.body, body);
  assert.ok(lines.some((line) => line.includes("choices[0].message.content")));
});

test("empty choices and non-JSON bodies are shape errors", async () => {
  const { logger } = captureLogger();
  for (const body of ['{"choices":[]}', "<html>gateway</html>"]) {
    const fake = createFakeFetch({ body });
    const client = new ChatCompletionClient({ apiKey: "test-secret" }, { fetchImpl: fake.fetchImpl, logger });
    const result = await client.query("Hello", { model: "test-model" });
    assert.ok(!result.ok && result.error.kind === "shape");
    assert.equal(result.error.body, body);
  }
});
