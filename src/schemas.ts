/** zod schemas for results that are persisted and read back. */
import { z } from "zod";

export const citationSchema = z.object({
  page: z.number().int(),
  excerpt: z.string(),
  chunkId: z.string(),
  score: z.number().optional(),
});

export const tokenUsageSchema = z.object({
  promptTokens: z.number().nonnegative(),
  completionTokens: z.number().nonnegative(),
  totalTokens: z.number().nonnegative(),
});

export const answerResultSchema = z.object({
  answer: z.string(),
  citations: z.array(citationSchema),
  tokenUsage: tokenUsageSchema,
  insufficientContext: z.boolean(),
});
