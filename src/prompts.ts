/**
 * Prompt templates for question answering, summarization and field extraction.
 */
import type { ConversationTurn, ScoredChunk, SummaryKind } from "./types";

export const ANSWER_INSTRUCTIONS = `You are a helpful tenant support assistant. Answer the question using ONLY the contract excerpts provided.

Instructions:
1. Answer based only on the excerpts; do not rely on outside knowledge.
2. Be specific and mention the page of the clause you rely on.
3. If the excerpts do not contain the answer, say that the contract does not specify it.
4. Keep the answer concise and clear.`;

export function formatContext(retrieved: readonly ScoredChunk[]): string {
  return retrieved.map(({ chunk }) => `[Page ${chunk.page}]\n${chunk.text.trim()}`).join("\n\n---\n\n");
}

export function formatHistory(turns: readonly ConversationTurn[]): string {
  return turns.map((t) => `User: ${t.question}\nAssistant: ${t.answer}`).join("\n\n");
}

export function answerPrompt(
  question: string,
  retrieved: readonly ScoredChunk[],
  history: readonly ConversationTurn[],
): string {
  const parts = [ANSWER_INSTRUCTIONS, `Contract excerpts:\n\n${formatContext(retrieved)}`];
  if (history.length > 0) parts.push(`Conversation so far:\n\n${formatHistory(history)}`);
  parts.push(`Question: ${question}\n\nAnswer:`);
  return parts.join("\n\n");
}

const SUMMARY_INSTRUCTIONS: Record<SummaryKind, { task: string; heading: string }> = {
  brief: {
    task: `Provide a brief 1-2 paragraph summary of this rental contract.
Focus on the most important terms: rent amount, duration, and key obligations.`,
    heading: "Brief Summary:",
  },
  key_points: {
    task: `Extract and list the key points from this rental contract.
Format as a numbered list covering:
1. Rental amount and payment terms
2. Lease duration and dates
3. Security deposit details
4. Maintenance responsibilities
5. Termination conditions
6. Important restrictions or rules
7. Any special clauses`,
    heading: "Key Points:",
  },
  comprehensive: {
    task: `Provide a comprehensive summary of this rental contract.
Include all important sections:
- Parties and Property Details
- Financial Terms (rent, deposits, fees)
- Lease Period and Renewal
- Responsibilities (tenant vs landlord)
- Rules and Restrictions
- Termination and Penalties
- Special Conditions`,
    heading: "Comprehensive Summary:",
  },
};

export function summaryPrompt(kind: SummaryKind, text: string): string {
  const { task, heading } = SUMMARY_INSTRUCTIONS[kind];
  return `${task}\n\nContract content:\n${text}\n\n${heading}`;
}

/** Map step for long documents: condense one group of passages. */
export function partialSummaryPrompt(text: string, part: number, parts: number): string {
  return `Summarize part ${part} of ${parts} of a rental contract. Keep every amount, date, party name, obligation and restriction it mentions, with the page numbers shown.

Contract content:
${text}

Summary of part ${part}:`;
}

export function extractionPrompt(fieldList: string, text: string): string {
  return `Extract the following fields from this rental contract.

Fields:
${fieldList}

Reply with a single JSON object whose keys are exactly the field names above. For each field use {"value": "<text as stated in the contract>", "page": <page number>} when the contract states it, or null when it does not. Do not guess.

Contract content:
${text}

JSON:`;
}
