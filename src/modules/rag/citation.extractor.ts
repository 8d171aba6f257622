import { Citation, Passage } from "./types";

/**
 * One citation per passage handed to the generator, in the same order.
 * Citations are not matched against the markers the answer actually uses.
 */
export function extractCitations(passages: Passage[]): Citation[] {
  return passages.map((passage) => ({
    sourceKind: passage.sourceKind,
    docId: passage.docId,
    chunkId: passage.chunkId,
  }));
}
