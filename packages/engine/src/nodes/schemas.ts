/**
 * Structured output schemas for generator calls.
 *
 * Field descriptions are sent to the model as the expected JSON shape.
 */

import { z } from 'zod';

const stringList = (description: string) => z.array(z.string()).describe(description);

export const RelevanceGrade = z.object({
  binaryScore: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['yes', 'no'])
    )
    .describe("Documents are relevant to the question, 'yes' or 'no'"),
});
export type RelevanceGrade = z.infer<typeof RelevanceGrade>;

export const Suggestions = z.object({
  suggestions: stringList(
    'Suggestions for documents, books, articles, or related topics to improve retrieval'
  ),
  missingInfo: stringList('Missing information or context that could improve retrieval'),
});
export type Suggestions = z.infer<typeof Suggestions>;

export const ConfidenceScore = z.object({
  confidence: z.number().min(0).max(1).describe('Confidence score ranging from 0 to 1'),
  missingInfo: stringList('Missing information or context that could improve answer generation'),
  suggestions: stringList('Suggestions for improving answer generation'),
});
export type ConfidenceScore = z.infer<typeof ConfidenceScore>;

export const QuestionRewrite = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe('Rewritten query based on suggestions and missing information'),
});
export type QuestionRewrite = z.infer<typeof QuestionRewrite>;
