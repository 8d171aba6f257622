export interface Embedder {
  /** Identifies the embedding space; cached indexes built with another model are rejected. */
  readonly embeddingModel: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface Generator {
  generate(prompt: string): Promise<string>;
}

export interface ModelProvider extends Embedder, Generator {
  readonly name: string;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}
