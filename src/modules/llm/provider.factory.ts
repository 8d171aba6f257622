import { AppConfig } from "../../config/app.config";
import { createOllamaProvider } from "./ollama.provider";
import { createOpenAiProvider } from "./openai.provider";
import { ModelProvider } from "./types";

/**
 * Picks the model backend once at startup. Call sites only ever see the
 * returned `ModelProvider`.
 */
export function createModelProvider(config: AppConfig): ModelProvider {
  const options = {
    temperature: config.temperature,
    retry: {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryDelayMs,
    },
  };

  console.log(`Initializing model provider: ${config.provider}`);

  switch (config.provider) {
    case "openai":
      return createOpenAiProvider(config.openai, options);
    case "ollama":
      return createOllamaProvider(config.ollama, options);
  }
}
