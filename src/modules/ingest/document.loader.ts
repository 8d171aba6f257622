import fs from "fs";
import { createPassage, Passage, PassageMetadata } from "../rag/types";
import { describeError } from "../shared/errors";
import { splitText, SplitOptions } from "./text.splitter";

const MIN_SUPPLEMENTAL_LENGTH = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Transcript text lives either under `transcriptText.content` or in a flat
 * `transcript` field; the nested shape wins when both are present.
 */
export function extractTranscriptText(record: unknown): string {
  if (!isRecord(record)) return "";

  const nested = record.transcriptText;
  if (isRecord(nested) && typeof nested.content === "string") {
    return nested.content;
  }

  if (typeof record.transcript === "string") {
    return record.transcript;
  }

  return "";
}

function recordMetadata(record: Record<string, unknown>, origin: string): PassageMetadata {
  return {
    origin,
    title: toOptionalString(record.title),
    videoId: toOptionalString(record.video_id) ?? toOptionalString(record.videoId),
    brand: toOptionalString(record.brand),
    product: toOptionalString(record.product),
  };
}

export function loadAuthoritative(filePath: string, options: SplitOptions): Passage[] {
  try {
    console.log(`Loading authoritative facts from ${filePath}`);
    const content = fs.readFileSync(filePath, "utf-8");

    const passages = splitText(content, options).map((text, index) =>
      createPassage({
        content: text,
        sourceKind: "authoritative",
        docId: `F${index + 1}`,
        chunkId: `c${index + 1}`,
        metadata: { origin: filePath },
      })
    );

    console.log(`Loaded ${passages.length} authoritative passages`);
    return passages;
  } catch (error) {
    console.warn(`Error loading authoritative facts: ${describeError(error)}`);
    return [];
  }
}

export function passagesFromRecords(
  records: unknown[],
  options: SplitOptions,
  origin: string
): Passage[] {
  const passages: Passage[] = [];

  records.forEach((record, index) => {
    const text = extractTranscriptText(record);
    if (text.trim().length < MIN_SUPPLEMENTAL_LENGTH || !isRecord(record)) return;

    const docId = `E${index + 1}`;
    const metadata = recordMetadata(record, origin);

    if (text.length <= options.chunkSize) {
      passages.push(
        createPassage({ content: text, sourceKind: "supplemental", docId, chunkId: "c1", metadata })
      );
      return;
    }

    const pieces = splitText(text, options).filter(
      (piece) => piece.trim().length >= MIN_SUPPLEMENTAL_LENGTH
    );
    pieces.forEach((piece, pieceIndex) => {
      passages.push(
        createPassage({
          content: piece,
          sourceKind: "supplemental",
          docId,
          chunkId: `c${pieceIndex + 1}`,
          metadata,
        })
      );
    });
  });

  return passages;
}

export function loadSupplemental(filePath: string, options: SplitOptions): Passage[] {
  try {
    console.log(`Loading supplemental records from ${filePath}`);
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));

    if (!Array.isArray(parsed)) {
      console.warn(`Supplemental source ${filePath} is not a JSON array, ignoring it`);
      return [];
    }

    const passages = passagesFromRecords(parsed, options, filePath);
    console.log(
      `Loaded ${passages.length} supplemental passages from ${parsed.length} records`
    );
    return passages;
  } catch (error) {
    console.warn(`Error loading supplemental records: ${describeError(error)}`);
    return [];
  }
}
