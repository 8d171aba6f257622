import fs from "fs";
import path from "path";
import { AppConfig } from "../../config/app.config";
import { loadAuthoritative, loadSupplemental } from "../ingest/document.loader";
import { Embedder } from "../llm/types";
import { Passage, SourceKind } from "../rag/types";
import { describeError, IndexBuildError } from "../shared/errors";
import { sleep as defaultSleep } from "../shared/sleep";
import { VectorIndex } from "../vector-db/vector.store";

export type IndexLifecycle = "unbuilt" | "building" | "ready";

/**
 * Read-only view handed to the pipeline. A kind without an index is
 * queried as always-empty.
 */
export interface IndexSnapshot {
  readonly authoritative: VectorIndex;
  readonly supplemental?: VectorIndex;
}

export interface IndexStatus {
  ready: boolean;
  authoritative: IndexLifecycle;
  supplemental: IndexLifecycle;
  passages: {
    authoritative: number;
    supplemental: number;
  };
}

export type IndexManagerConfig = Pick<
  AppConfig,
  | "chunkSize"
  | "chunkOverlap"
  | "batchSize"
  | "retryDelayMs"
  | "cacheDirectory"
  | "authoritativeSourcePath"
  | "supplementalSourcePath"
>;

export interface PassageSource {
  exists(kind: SourceKind): boolean;
  load(kind: SourceKind): Passage[];
}

export interface IndexManagerDeps {
  embedder: Embedder;
  sleep?: (ms: number) => Promise<void>;
  source?: PassageSource;
}

export interface BatchBuildResult {
  index: VectorIndex;
  insertedCount: number;
  failedBatches: number[];
}

export function cacheLocation(cacheDirectory: string, kind: SourceKind): string {
  return path.join(cacheDirectory, `${kind}_vectorstore`);
}

export function fileSource(config: IndexManagerConfig): PassageSource {
  const splitOptions = { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap };
  const pathFor = (kind: SourceKind) =>
    kind === "authoritative" ? config.authoritativeSourcePath : config.supplementalSourcePath;

  return {
    exists: (kind) => fs.existsSync(pathFor(kind)),
    load: (kind) =>
      kind === "authoritative"
        ? loadAuthoritative(pathFor(kind), splitOptions)
        : loadSupplemental(pathFor(kind), splitOptions),
  };
}

/**
 * Builds an index batch by batch. The first batch creates the index, later
 * batches are appended. Between batches the builder waits `retryDelayMs`;
 * a failed batch is dropped and followed by a `2 × retryDelayMs` wait.
 */
export async function buildIndexBatched(
  passages: Passage[],
  options: {
    embedder: Embedder;
    batchSize: number;
    retryDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
    label?: string;
  }
): Promise<BatchBuildResult> {
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? "index";
  const batchCount = Math.ceil(passages.length / options.batchSize);
  const index = VectorIndex.empty(options.embedder);
  const failedBatches: number[] = [];
  let insertedCount = 0;

  for (let batchIndex = 0; batchIndex < batchCount; batchIndex++) {
    const start = batchIndex * options.batchSize;
    const batch = passages.slice(start, start + options.batchSize);
    const isLast = batchIndex === batchCount - 1;

    try {
      console.log(`[${label}] Adding batch ${batchIndex + 1}/${batchCount}: ${batch.length} passages`);
      await index.addPassages(batch);
      insertedCount += batch.length;

      if (!isLast) {
        console.log(`[${label}] Waiting ${options.retryDelayMs}ms before next batch...`);
        await sleep(options.retryDelayMs);
      }
    } catch (error) {
      failedBatches.push(batchIndex + 1);
      console.warn(
        `[${label}] Batch ${batchIndex + 1} failed, dropping ${batch.length} passages: ${describeError(error)}`
      );
      if (!isLast) {
        await sleep(options.retryDelayMs * 2);
      }
    }
  }

  console.log(
    `[${label}] Index built with ${insertedCount}/${passages.length} passages` +
      (failedBatches.length > 0 ? ` (failed batches: ${failedBatches.join(", ")})` : "")
  );

  return { index, insertedCount, failedBatches };
}

/**
 * Owns both indexes and their lifecycle. Only one build runs at a time:
 * concurrent callers share the in-flight promise. Readers only ever see the
 * snapshot published at the end of a successful build.
 */
export class IndexManager {
  private readonly lifecycle: Record<SourceKind, IndexLifecycle> = {
    authoritative: "unbuilt",
    supplemental: "unbuilt",
  };
  private published?: IndexSnapshot;
  private inFlight?: Promise<IndexSnapshot>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly source: PassageSource;

  constructor(
    private readonly config: IndexManagerConfig,
    private readonly deps: IndexManagerDeps
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.source = deps.source ?? fileSource(config);
  }

  isReady(): boolean {
    return this.published !== undefined;
  }

  snapshot(): IndexSnapshot | undefined {
    return this.published;
  }

  getStatus(): IndexStatus {
    return {
      ready: this.isReady(),
      authoritative: this.lifecycle.authoritative,
      supplemental: this.lifecycle.supplemental,
      passages: {
        authoritative: this.published?.authoritative.size ?? 0,
        supplemental: this.published?.supplemental?.size ?? 0,
      },
    };
  }

  async buildIndexes(): Promise<IndexSnapshot> {
    if (this.published) return this.published;
    if (this.inFlight) return this.inFlight;

    const previous = { ...this.lifecycle };
    this.inFlight = this.runBuild()
      .then((snapshot) => {
        this.published = snapshot;
        return snapshot;
      })
      .catch((error: unknown) => {
        this.lifecycle.authoritative = previous.authoritative;
        this.lifecycle.supplemental = previous.supplemental;
        throw error;
      })
      .finally(() => {
        this.inFlight = undefined;
      });

    return this.inFlight;
  }

  private async runBuild(): Promise<IndexSnapshot> {
    const started = Date.now();
    this.lifecycle.authoritative = "building";
    this.lifecycle.supplemental = "building";

    let authoritative = this.restore("authoritative");
    let supplemental = this.restore("supplemental");

    if (!authoritative) {
      authoritative = await this.rebuildAuthoritative();
    }

    if (!supplemental) {
      supplemental = await this.rebuildSupplemental();
    }

    this.lifecycle.authoritative = "ready";
    this.lifecycle.supplemental = supplemental ? "ready" : "unbuilt";

    this.persist("authoritative", authoritative);
    if (supplemental) this.persist("supplemental", supplemental);

    console.log(`Vector indexes ready in ${Date.now() - started}ms`);
    return Object.freeze({ authoritative, supplemental });
  }

  private restore(kind: SourceKind): VectorIndex | undefined {
    const directory = cacheLocation(this.config.cacheDirectory, kind);
    if (!fs.existsSync(directory)) return undefined;

    try {
      console.log(`Loading ${kind} vector index from cache...`);
      const index = VectorIndex.load(directory, this.deps.embedder);
      if (index.size === 0) {
        console.warn(`Cached ${kind} vector index is empty, rebuilding`);
        return undefined;
      }
      console.log(`Restored ${kind} vector index with ${index.size} passages`);
      return index;
    } catch (error) {
      console.warn(`Failed to load ${kind} cache, rebuilding: ${describeError(error)}`);
      return undefined;
    }
  }

  private async rebuildAuthoritative(): Promise<VectorIndex> {
    const passages = this.source.load("authoritative");
    if (passages.length === 0) {
      throw new IndexBuildError({
        sourceKind: "authoritative",
        message: `No authoritative passages loaded from ${this.config.authoritativeSourcePath}`,
      });
    }

    const { index } = await this.buildBatched(passages, "authoritative");
    if (index.size === 0) {
      throw new IndexBuildError({
        sourceKind: "authoritative",
        message: "Every authoritative batch failed; the index would be empty",
      });
    }
    return index;
  }

  private async rebuildSupplemental(): Promise<VectorIndex | undefined> {
    if (!this.source.exists("supplemental")) {
      console.log("No supplemental source found, supplemental index stays empty");
      return undefined;
    }

    const passages = this.source.load("supplemental");
    if (passages.length === 0) {
      console.log("Supplemental source produced no passages, supplemental index stays empty");
      return undefined;
    }

    const { index } = await this.buildBatched(passages, "supplemental");
    if (index.size === 0) {
      console.warn("Every supplemental batch failed, supplemental index stays empty");
      return undefined;
    }
    return index;
  }

  private buildBatched(passages: Passage[], kind: SourceKind): Promise<BatchBuildResult> {
    return buildIndexBatched(passages, {
      embedder: this.deps.embedder,
      batchSize: this.config.batchSize,
      retryDelayMs: this.config.retryDelayMs,
      sleep: this.sleep,
      label: kind,
    });
  }

  private persist(kind: SourceKind, index: VectorIndex): void {
    const directory = cacheLocation(this.config.cacheDirectory, kind);
    try {
      index.save(directory);
      console.log(`Saved ${kind} vector index to ${directory}`);
    } catch (error) {
      console.warn(`Failed to save ${kind} vector index: ${describeError(error)}`);
    }
  }
}
