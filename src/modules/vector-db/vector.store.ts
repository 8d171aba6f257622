import fs from "fs";
import path from "path";
import { Embedder } from "../llm/types";
import {
  createPassage,
  hasCitationKey,
  Passage,
  PassageMetadata,
  passageKey,
  SOURCE_KINDS,
  SourceKind,
} from "../rag/types";
import { IndexRestoreError } from "../shared/errors";

export const INDEX_FILE_NAME = "index.json";
const INDEX_FORMAT_VERSION = 1;

/**
 * Entry stored in the index: the passage plus its embedding
 */
export interface VectorEntry {
  id: string;
  vector: number[];
  passage: Passage;
}

/**
 * Search hit with cosine similarity in [-1, 1]
 */
export interface SearchResult {
  id: string;
  passage: Passage;
  similarity: number;
}

interface PersistedIndex {
  version: number;
  embeddingModel: string;
  dimensions: number;
  entries: VectorEntry[];
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === "string" && SOURCE_KINDS.some((kind) => kind === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function parseMetadata(value: unknown): PassageMetadata | undefined {
  if (!isRecord(value)) return undefined;
  return {
    title: optionalString(value.title),
    origin: optionalString(value.origin),
    videoId: optionalString(value.videoId),
    brand: optionalString(value.brand),
    product: optionalString(value.product),
  };
}

function parseEntry(value: unknown, dimensions: number, directory: string): VectorEntry {
  const fail = (reason: string): never => {
    throw new IndexRestoreError({ directory, message: reason });
  };

  if (!isRecord(value)) return fail("entry is not an object");
  const { id, vector, passage } = value;

  if (typeof id !== "string") return fail("entry id is missing");
  if (
    !Array.isArray(vector) ||
    vector.length !== dimensions ||
    !vector.every((n): n is number => typeof n === "number" && Number.isFinite(n))
  ) {
    return fail(`entry ${id} has an invalid vector`);
  }
  if (!isRecord(passage)) return fail(`entry ${id} has no passage`);

  const { content, sourceKind, docId, chunkId, metadata } = passage;
  if (
    typeof content !== "string" ||
    !isSourceKind(sourceKind) ||
    typeof docId !== "string" ||
    typeof chunkId !== "string"
  ) {
    return fail(`entry ${id} has a malformed passage`);
  }

  return {
    id,
    vector,
    passage: createPassage({ content, sourceKind, docId, chunkId, metadata: parseMetadata(metadata) }),
  };
}

/**
 * In-process nearest-neighbour index over embedded passages, persisted as a
 * single JSON file per directory.
 */
export class VectorIndex {
  private readonly entries: VectorEntry[] = [];

  private constructor(private readonly embedder: Embedder) {}

  static empty(embedder: Embedder): VectorIndex {
    return new VectorIndex(embedder);
  }

  static async fromPassages(passages: Passage[], embedder: Embedder): Promise<VectorIndex> {
    const index = new VectorIndex(embedder);
    await index.addPassages(passages);
    return index;
  }

  static load(directory: string, embedder: Embedder): VectorIndex {
    const filePath = path.join(directory, INDEX_FILE_NAME);
    if (!fs.existsSync(filePath)) {
      throw new IndexRestoreError({ directory, message: "no cached index found" });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new IndexRestoreError({
        directory,
        message: error instanceof Error ? error.message : "unreadable index file",
      });
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.entries)) {
      throw new IndexRestoreError({ directory, message: "index file is malformed" });
    }
    if (parsed.version !== INDEX_FORMAT_VERSION) {
      throw new IndexRestoreError({ directory, message: `unsupported index version ${String(parsed.version)}` });
    }
    if (parsed.embeddingModel !== embedder.embeddingModel) {
      throw new IndexRestoreError({
        directory,
        message: `index was built with ${String(parsed.embeddingModel)}, current model is ${embedder.embeddingModel}`,
      });
    }
    const dimensions = parsed.dimensions;
    if (typeof dimensions !== "number") {
      throw new IndexRestoreError({ directory, message: "index dimensions are missing" });
    }

    const index = new VectorIndex(embedder);
    for (const raw of parsed.entries) {
      index.entries.push(parseEntry(raw, dimensions, directory));
    }
    return index;
  }

  get size(): number {
    return this.entries.length;
  }

  get dimensions(): number {
    return this.entries[0]?.vector.length ?? 0;
  }

  passages(): Passage[] {
    return this.entries.map((entry) => entry.passage);
  }

  /**
   * Embeds and appends passages. Nothing is appended if embedding fails.
   */
  async addPassages(passages: Passage[]): Promise<void> {
    if (passages.length === 0) return;

    const invalid = passages.find((passage) => !hasCitationKey(passage));
    if (invalid) {
      throw new Error(`Passage is missing its citation key: ${passageKey(invalid)}`);
    }

    const vectors = await this.embedder.embedBatch(passages.map((p) => p.content));
    if (vectors.length !== passages.length) {
      throw new Error(`Expected ${passages.length} embeddings, received ${vectors.length}`);
    }

    const expected = this.dimensions || vectors[0].length;
    if (vectors.some((vector) => vector.length !== expected)) {
      throw new Error(`Embedding dimensions mismatch, expected ${expected}`);
    }

    passages.forEach((passage, i) => {
      this.entries.push({ id: passageKey(passage), vector: vectors[i], passage });
    });
  }

  async similaritySearchWithScores(query: string, k: number): Promise<SearchResult[]> {
    if (this.entries.length === 0 || k <= 0) return [];

    const queryVector = await this.embedder.embed(query);
    return this.entries
      .map((entry, position) => ({
        entry,
        position,
        similarity: cosineSimilarity(queryVector, entry.vector),
      }))
      .sort((a, b) => b.similarity - a.similarity || a.position - b.position)
      .slice(0, k)
      .map(({ entry, similarity }) => ({ id: entry.id, passage: entry.passage, similarity }));
  }

  async similaritySearch(query: string, k: number): Promise<Passage[]> {
    const results = await this.similaritySearchWithScores(query, k);
    return results.map((result) => result.passage);
  }

  save(directory: string): void {
    fs.mkdirSync(directory, { recursive: true });
    const payload: PersistedIndex = {
      version: INDEX_FORMAT_VERSION,
      embeddingModel: this.embedder.embeddingModel,
      dimensions: this.dimensions,
      entries: this.entries,
    };

    // the previous index.json stays in place until the new one is fully written
    const filePath = path.join(directory, INDEX_FILE_NAME);
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(payload), "utf-8");
    fs.renameSync(tmpPath, filePath);
  }
}
