import fetch from "node-fetch";
import { OpenAiSettings } from "../../config/app.config";
import { ConfigError, ProviderError } from "../shared/errors";
import { withRetry } from "./retry";
import { ModelProvider, RetryOptions } from "./types";

const PROVIDER = "openai";

type EmbeddingsResponse = {
  data?: Array<{
    index?: number;
    embedding?: unknown;
  }>;
};

type ChatCompletionResponse = {
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
};

function toSafeEmbedding(value: unknown): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ProviderError({ provider: PROVIDER, message: "Invalid embedding vector payload", retryable: false });
  }

  return value.map((entry) => {
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      throw new ProviderError({ provider: PROVIDER, message: "Invalid embedding vector value", retryable: false });
    }
    return entry;
  });
}

export function createOpenAiProvider(
  settings: OpenAiSettings,
  options: { temperature: number; retry: RetryOptions }
): ModelProvider {
  const apiKey = settings.apiKey;
  if (!apiKey) {
    throw new ConfigError({
      option: "OPENAI_API_KEY",
      message: "OPENAI_API_KEY is required for the openai provider",
    });
  }

  async function post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${settings.baseUrl}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ProviderError({
        provider: PROVIDER,
        status: response.status,
        message: `OpenAI request to ${path} failed (${response.status}): ${text}`,
      });
    }

    return response.json();
  }

  async function embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    return withRetry(
      "OpenAI embeddings",
      async () => {
        const payload = (await post("/embeddings", {
          model: settings.embeddingModel,
          input: texts,
        })) as EmbeddingsResponse;

        const rows = [...(payload.data ?? [])].sort(
          (a, b) => (a.index ?? 0) - (b.index ?? 0)
        );
        if (rows.length !== texts.length) {
          throw new ProviderError({
            provider: PROVIDER,
            message: `Expected ${texts.length} embeddings, received ${rows.length}`,
            retryable: false,
          });
        }
        return rows.map((row) => toSafeEmbedding(row.embedding));
      },
      options.retry
    );
  }

  return {
    name: PROVIDER,
    embeddingModel: `${PROVIDER}/${settings.embeddingModel}`,

    async embed(text: string): Promise<number[]> {
      const [vector] = await embedBatch([text]);
      return vector;
    },

    embedBatch,

    async generate(prompt: string): Promise<string> {
      return withRetry(
        "OpenAI generation",
        async () => {
          const payload = (await post("/chat/completions", {
            model: settings.model,
            temperature: options.temperature,
            messages: [{ role: "user", content: prompt }],
          })) as ChatCompletionResponse;

          const content = payload.choices?.[0]?.message?.content;
          if (typeof content !== "string" || content.trim().length === 0) {
            throw new ProviderError({
              provider: PROVIDER,
              message: "OpenAI returned an empty completion.",
              retryable: false,
            });
          }
          return content.trim();
        },
        options.retry
      );
    },
  };
}
