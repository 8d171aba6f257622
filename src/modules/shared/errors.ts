import { SourceKind } from "../rag/types";

export class ConfigError extends Error {
  readonly option: string;

  constructor(input: { option: string; message: string }) {
    super(input.message);
    this.name = "ConfigError";
    this.option = input.option;
  }
}

export class IndexBuildError extends Error {
  readonly sourceKind: SourceKind;

  constructor(input: { sourceKind: SourceKind; message: string }) {
    super(input.message);
    this.name = "IndexBuildError";
    this.sourceKind = input.sourceKind;
  }
}

export class IndexRestoreError extends Error {
  readonly directory: string;

  constructor(input: { directory: string; message: string }) {
    super(`Cannot restore vector index from ${input.directory}: ${input.message}`);
    this.name = "IndexRestoreError";
    this.directory = input.directory;
  }
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(input: {
    provider: string;
    message: string;
    status?: number;
    retryable?: boolean;
  }) {
    super(input.message);
    this.name = "ProviderError";
    this.provider = input.provider;
    this.status = input.status;
    this.retryable = input.retryable ?? isRetryableStatus(input.status);
  }
}

export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
