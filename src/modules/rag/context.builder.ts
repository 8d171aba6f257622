import { Passage } from "./types";

export function formatSourceLabel(passage: Passage): string {
  return `Source: ${passage.sourceKind} | Doc: ${passage.docId} | Chunk: ${passage.chunkId}`;
}

export function buildContext(passages: Passage[]): string {
  return passages
    .map((passage) => `${formatSourceLabel(passage)}\n${passage.content}`)
    .join("\n\n");
}

export function buildPrompt(question: string, context: string, productName: string): string {
  return `You are a helpful assistant answering questions about ${productName}.

STRICT RULES:
1. Only use the provided context to answer
2. Never make up or hallucinate information
3. If context doesn't contain the answer, say so
4. Cite sources for each claim using [source:doc_id:chunk_id] format
5. Be concise and accurate

Context:
${context}

Question: ${question}

Answer:`;
}
