export type SourceKind = "authoritative" | "supplemental";

export const SOURCE_KINDS: readonly SourceKind[] = ["authoritative", "supplemental"];

export interface PassageMetadata {
  title?: string;
  origin?: string;
  videoId?: string;
  brand?: string;
  product?: string;
}

export interface Passage {
  readonly content: string;
  readonly sourceKind: SourceKind;
  readonly docId: string;
  readonly chunkId: string;
  readonly metadata?: Readonly<PassageMetadata>;
}

export interface Citation {
  readonly sourceKind: SourceKind;
  readonly docId: string;
  readonly chunkId: string;
}

export type AnswerStatus =
  | "answered"
  | "refused_sensitive"
  | "insufficient_info"
  | "validation_failed"
  | "error"
  | "not_ready";

// "processing" only exists while a context is moving through the stages.
export type PipelineStatus = AnswerStatus | "processing";

export interface PipelineContext {
  question: string;
  retrievedAuthoritative: Passage[];
  retrievedSupplemental: Passage[];
  isSensitive: boolean;
  needsSupplemental: boolean;
  answer: string;
  status: PipelineStatus;
  citations: Citation[];
}

export interface AskResponse {
  answer: string;
  status: AnswerStatus;
  citations: Citation[];
}

export function createPassage(input: {
  content: string;
  sourceKind: SourceKind;
  docId: string;
  chunkId: string;
  metadata?: PassageMetadata;
}): Passage {
  return Object.freeze({
    content: input.content,
    sourceKind: input.sourceKind,
    docId: input.docId,
    chunkId: input.chunkId,
    metadata: input.metadata ? Object.freeze({ ...input.metadata }) : undefined,
  });
}

export function passageKey(passage: Pick<Passage, "sourceKind" | "docId" | "chunkId">): string {
  return `${passage.sourceKind}:${passage.docId}:${passage.chunkId}`;
}

export function hasCitationKey(passage: Passage): boolean {
  return (
    passage.sourceKind.length > 0 &&
    passage.docId.trim().length > 0 &&
    passage.chunkId.trim().length > 0
  );
}
