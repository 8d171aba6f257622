import fetch from "node-fetch";
import { OllamaSettings } from "../../config/app.config";
import { ProviderError } from "../shared/errors";
import { withRetry } from "./retry";
import { ModelProvider, RetryOptions } from "./types";

const PROVIDER = "ollama";

async function postJson(url: string, body: unknown): Promise<unknown> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new ProviderError({
      provider: PROVIDER,
      status: response.status,
      message: `Ollama error (${response.status}): ${text}`,
    });
  }

  return response.json();
}

export function createOllamaProvider(
  settings: OllamaSettings,
  options: { temperature: number; retry: RetryOptions }
): ModelProvider {
  async function embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new ProviderError({ provider: PROVIDER, message: "Text cannot be empty", retryable: false });
    }

    return withRetry(
      "Ollama embedding",
      async () => {
        const data = (await postJson(`${settings.baseUrl}/api/embeddings`, {
          model: settings.embeddingModel,
          prompt: text,
        })) as { embedding?: number[] };

        if (!data.embedding || data.embedding.length === 0) {
          throw new ProviderError({
            provider: PROVIDER,
            message: "Ollama returned an empty embedding.",
            retryable: false,
          });
        }
        return data.embedding;
      },
      options.retry
    );
  }

  return {
    name: PROVIDER,
    embeddingModel: `${PROVIDER}/${settings.embeddingModel}`,
    embed,

    // Ollama embeds one prompt per request; batches run sequentially to keep
    // the request rate flat.
    async embedBatch(texts: string[]): Promise<number[][]> {
      const vectors: number[][] = [];
      for (const text of texts) {
        vectors.push(await embed(text));
      }
      return vectors;
    },

    async generate(prompt: string): Promise<string> {
      return withRetry(
        "Ollama generation",
        async () => {
          const data = (await postJson(`${settings.baseUrl}/api/generate`, {
            model: settings.model,
            prompt,
            stream: false,
            options: { temperature: options.temperature },
          })) as { response?: string };

          if (!data.response) {
            throw new ProviderError({
              provider: PROVIDER,
              message: "Ollama returned an empty response.",
              retryable: false,
            });
          }
          return data.response;
        },
        options.retry
      );
    },
  };
}
