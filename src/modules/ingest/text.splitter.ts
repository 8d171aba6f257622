export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

function findBreak(text: string, start: number, preferredEnd: number): number {
  const floor = start + Math.floor((preferredEnd - start) / 2);

  const paragraph = text.lastIndexOf("\n\n", preferredEnd - 1);
  if (paragraph > floor) return paragraph;

  for (let i = preferredEnd; i > floor; i--) {
    if (/\s/.test(text[i])) return i;
  }

  return preferredEnd;
}

/**
 * Sliding-window splitter over characters. Windows prefer to end on a paragraph
 * break or whitespace in their second half; consecutive windows overlap by
 * `chunkOverlap` characters, or not at all when a window ended early and is
 * shorter than the overlap. Output is trimmed and never contains empty chunks.
 */
export function splitText(text: string, options: SplitOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const chunks: string[] = [];
  if (text.trim().length === 0) return chunks;

  let start = 0;
  while (start < text.length) {
    const preferredEnd = Math.min(text.length, start + chunkSize);
    const end =
      preferredEnd >= text.length ? text.length : findBreak(text, start, preferredEnd);

    const content = text.slice(start, end).trim();
    if (content.length > 0) chunks.push(content);

    if (end >= text.length) break;
    const next = end - chunkOverlap;
    start = next > start ? next : end;
  }

  return chunks;
}
