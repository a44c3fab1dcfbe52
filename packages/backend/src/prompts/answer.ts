import type { Chunk } from "@chunkgraph/shared";

export function buildAnswerSystemPrompt(chunks: Chunk[]): string {
  const context = chunks
    .map((chunk, position) => `[${position + 1}] (doc ${chunk.docId})\n${chunk.content}`)
    .join("\n\n");

  return `
You answer questions using only the retrieved passages below.

Retrieved passages:
${context.length > 0 ? context : "(none)"}

Rules:
1. Use the passages only; do not rely on outside knowledge.
2. If the passages do not contain the answer, say so plainly.
3. Cite passages by their bracketed number, e.g. [2].
`.trim();
}
