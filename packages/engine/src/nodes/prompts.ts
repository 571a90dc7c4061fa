/**
 * Prompt builders for the workflow nodes.
 */

import type { ChatMessage, DocumentSet } from '@docqa/core';

/**
 * Answer shown when the corpus holds nothing relevant to the question
 */
export const NO_RELEVANT_DOCUMENTS_ANSWER =
  'Sorry, no relevant document was found to answer the query. Check the answer details for suggestions.';

/**
 * Join document contents into one context block
 */
export function formatContext(documents: DocumentSet | undefined): string {
  return (documents ?? []).map((doc) => doc.content).join('\n\n');
}

// =============================================================================
// System Prompts
// =============================================================================

export const GRADER_SYSTEM_PROMPT = [
  'You are a grader assessing relevance of retrieved documents to a user question.',
  'If the documents contain keyword(s) or semantic meaning related to the question, grade them as relevant.',
  "Give a binary score 'yes' or 'no' to indicate whether the documents are relevant to the question.",
].join('\n');

export const ANSWER_SYSTEM_PROMPT = [
  'Use the following pieces of context to answer the question at the end.',
  "If you don't know the answer, just say that you don't know, don't try to make up an answer.",
  'Use three sentences maximum and keep the answer as concise as possible.',
  'Always say "thanks for asking!" at the end of the answer.',
].join('\n');

const GAP_INSTRUCTIONS = [
  'Missing or Uncertain Information:',
  '1. Specify which facts, concepts, or perspectives are missing.',
  '2. Highlight ambiguities or uncertainties in the documents that limit a complete answer.',
  'Enrichment Suggestions:',
  '1. Recommend up to three additional sources, topics, or data types that would help fill the missing gaps or improve retrieval quality.',
  '2. Keep suggestions specific and actionable (e.g. "Add documentation on inbound email processing", not "find more info about email").',
];

export const ENRICHMENT_SYSTEM_PROMPT = [
  'You are an expert at enriching a knowledge base. You provide suggestions and missing information for a given query.',
  'Provide the following:',
  ...GAP_INSTRUCTIONS,
].join('\n');

export const EVALUATOR_SYSTEM_PROMPT = [
  'You are AnswerEvaluatorAI, an expert system for evaluating the accuracy and completeness of answers based on provided documents.',
  'Your objective:',
  '1. Assess whether the given Answer fully and correctly addresses the Question, using evidence from the Context.',
  '2. Determine if the answer is factually accurate and fully supported by the content of the provided documents.',
  '3. Check for coverage completeness: does the answer address all key aspects of the question that are present or inferable from the documents?',
  '4. Identify any irrelevant, unsupported, or hallucinated claims.',
  'Confidence Scoring:',
  '1. Output a confidence score between 0 and 1, indicating how certain you are that the answer is accurate and complete.',
  '   1.0 = fully correct and complete',
  '   0.0 = inaccurate or entirely unsupported',
  ...GAP_INSTRUCTIONS,
].join('\n');

export const REWRITE_SYSTEM_PROMPT = [
  'You are a question re-writer that converts an input question to a better version that is optimized for retrieval.',
  'Look at the input and try to reason about the underlying semantic intent / meaning.',
].join('\n');

// =============================================================================
// Message Builders
// =============================================================================

export function gradePrompt(question: string, context: string): ChatMessage[] {
  return [
    { role: 'system', content: GRADER_SYSTEM_PROMPT },
    { role: 'user', content: `Documents:\n${context}\n\nQuestion: ${question}` },
  ];
}

export function answerPrompt(question: string, context: string): ChatMessage[] {
  return [
    { role: 'system', content: ANSWER_SYSTEM_PROMPT },
    { role: 'user', content: `Context:\n${context}\n\nQuestion: ${question}` },
  ];
}

export function enrichmentPrompt(question: string): ChatMessage[] {
  return [
    { role: 'system', content: ENRICHMENT_SYSTEM_PROMPT },
    { role: 'user', content: `Question: ${question}` },
  ];
}

export function evaluatorPrompt(question: string, context: string, answer: string): ChatMessage[] {
  return [
    { role: 'system', content: EVALUATOR_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Context:\n${context}\n\nQuestion: ${question}\n\nAnswer: ${answer}`,
    },
  ];
}

export function rewritePrompt(
  question: string,
  suggestions: readonly string[],
  missingInfo: readonly string[]
): ChatMessage[] {
  return [
    { role: 'system', content: REWRITE_SYSTEM_PROMPT },
    {
      role: 'user',
      content: [
        `Here is the initial question:\n${question}`,
        `Suggestions:\n${suggestions.join('\n')}`,
        `Missing information:\n${missingInfo.join('\n')}`,
        'Formulate an improved question.',
      ].join('\n\n'),
    },
  ];
}
