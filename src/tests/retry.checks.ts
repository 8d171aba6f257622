import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "../config/app.config";
import { createModelProvider } from "../modules/llm/provider.factory";
import { computeBackoffMs, withRetry } from "../modules/llm/retry";
import { ConfigError, ProviderError } from "../modules/shared/errors";
import { recordingSleep } from "./helpers/fakes";

function failingTimes(count: number, status: number): { calls: () => number; run: () => Promise<string> } {
  let attempts = 0;
  return {
    calls: () => attempts,
    run: async () => {
      attempts++;
      if (attempts <= count) {
        throw new ProviderError({ provider: "test", status, message: `status ${status}` });
      }
      return "ok";
    },
  };
}

test("computeBackoffMs doubles per attempt and caps at 30 seconds", () => {
  assert.equal(computeBackoffMs(1, 2000), 2000);
  assert.equal(computeBackoffMs(3, 2000), 8000);
  assert.equal(computeBackoffMs(10, 2000), 30000);
  assert.equal(computeBackoffMs(0, 100), 100);
});

test("withRetry retries transient provider errors with backoff", async () => {
  const { calls, sleep } = recordingSleep();
  const operation = failingTimes(2, 503);

  const result = await withRetry("test op", operation.run, { maxRetries: 3, baseDelayMs: 100, sleep });

  assert.equal(result, "ok");
  assert.equal(operation.calls(), 3);
  assert.deepEqual(calls, [100, 200]);
});

test("withRetry does not retry client errors", async () => {
  const { calls, sleep } = recordingSleep();
  const operation = failingTimes(1, 400);

  await assert.rejects(
    withRetry("test op", operation.run, { maxRetries: 3, baseDelayMs: 100, sleep }),
    (error: unknown) => error instanceof ProviderError && error.status === 400
  );
  assert.equal(operation.calls(), 1);
  assert.deepEqual(calls, []);
});

test("withRetry rethrows the last error once retries run out", async () => {
  const { calls, sleep } = recordingSleep();
  const operation = failingTimes(10, 429);

  await assert.rejects(
    withRetry("test op", operation.run, { maxRetries: 2, baseDelayMs: 50, sleep }),
    ProviderError
  );
  assert.equal(operation.calls(), 3);
  assert.deepEqual(calls, [50, 100]);
});

test("the factory builds the configured provider", async () => {
  const provider = createModelProvider(loadConfig({ EMBEDDING_MODEL: "test-embed" }));

  assert.equal(provider.name, "ollama");
  assert.equal(provider.embeddingModel, "ollama/test-embed");
  await assert.rejects(provider.embed("   "), ProviderError);

  const openai = createModelProvider(
    loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_EMBEDDING_MODEL: "test-embed" })
  );
  assert.equal(openai.name, "openai");
  assert.equal(openai.embeddingModel, "openai/test-embed");
});

test("the openai provider requires an api key", () => {
  assert.throws(
    () => createModelProvider(loadConfig({ LLM_PROVIDER: "openai" })),
    (error: unknown) => error instanceof ConfigError && error.option === "OPENAI_API_KEY"
  );
});
