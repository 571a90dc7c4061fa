/**
 * Configuration
 *
 * Reads docqa configuration from environment variables.
 *
 * Environment Variables:
 * - DOCQA_LLM_PROVIDER: google | anthropic | openai | openai_compat (default: google)
 * - DOCQA_LLM_MODEL: Model identifier (default: provider default)
 * - DOCQA_LLM_API_KEY: API key (default: provider-specific env var)
 * - DOCQA_LLM_BASE_URL: Base URL (required for openai_compat)
 * - TAVILY_API_KEY: Web search API key
 * - DOCQA_WEB_RESULTS: Web results per query (default: 3)
 * - DOCQA_RETRIEVE_RESULTS: Documents fetched per retrieval (default: 5)
 * - DOCQA_RERANK_TOP_K: Documents kept after reranking (default: 3)
 * - DOCQA_CONFIDENCE_THRESHOLD: Score an answer must exceed (default: 0.9)
 * - DOCQA_MAX_ITERATIONS: Rewrite loop bound (default: 3)
 * - DOCQA_MAX_STEPS: Node execution cap per run (default: 50)
 * - LOG_LEVEL: DEBUG | INFO | NOTICE | WARNING | ERROR | CRITICAL (default: INFO)
 *
 * @module @docqa/core/config
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const intFrom = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : fallback))
    .pipe(z.number().int().min(min));

const EnvSchema = z.object({
  DOCQA_LLM_PROVIDER: z
    .enum(['google', 'anthropic', 'openai', 'openai_compat'])
    .default('google'),
  DOCQA_LLM_MODEL: optionalString,
  DOCQA_LLM_API_KEY: optionalString,
  DOCQA_LLM_BASE_URL: optionalString.pipe(z.string().url().optional()),
  TAVILY_API_KEY: optionalString,
  DOCQA_WEB_RESULTS: intFrom(3, 1),
  DOCQA_RETRIEVE_RESULTS: intFrom(5, 1),
  DOCQA_RERANK_TOP_K: intFrom(3, 1),
  DOCQA_CONFIDENCE_THRESHOLD: z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : 0.9))
    .pipe(z.number().min(0).max(1)),
  DOCQA_MAX_ITERATIONS: intFrom(3, 0),
  DOCQA_MAX_STEPS: intFrom(50, 1),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => {
      const upper = (value || 'INFO').toUpperCase();
      return upper === 'WARN' ? 'WARNING' : upper;
    })
    .pipe(z.enum(['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'])),
});

/**
 * Effective docqa configuration
 */
export interface DocqaConfig {
  llm: {
    provider: 'google' | 'anthropic' | 'openai' | 'openai_compat';
    model?: string;
    apiKey?: string;
    baseUrl?: string;
  };
  webSearch: {
    apiKey?: string;
    maxResults: number;
  };
  workflow: {
    nResults: number;
    rerankTopK: number;
    confidenceThreshold: number;
    maxIterations: number;
    maxSteps: number;
  };
  logLevel: 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';
}

/**
 * Load configuration from environment variables
 *
 * @throws {ValidationError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DocqaConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[String(issue.path[0])] = issue.message;
    }
    throw new ValidationError(
      `Invalid configuration: ${Object.keys(fieldErrors).join(', ')}`,
      { fieldErrors }
    );
  }

  const e = parsed.data;
  return {
    llm: {
      provider: e.DOCQA_LLM_PROVIDER,
      model: e.DOCQA_LLM_MODEL,
      apiKey: e.DOCQA_LLM_API_KEY,
      baseUrl: e.DOCQA_LLM_BASE_URL,
    },
    webSearch: {
      apiKey: e.TAVILY_API_KEY,
      maxResults: e.DOCQA_WEB_RESULTS,
    },
    workflow: {
      nResults: e.DOCQA_RETRIEVE_RESULTS,
      rerankTopK: e.DOCQA_RERANK_TOP_K,
      confidenceThreshold: e.DOCQA_CONFIDENCE_THRESHOLD,
      maxIterations: e.DOCQA_MAX_ITERATIONS,
      maxSteps: e.DOCQA_MAX_STEPS,
    },
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Mask a secret for display
 */
export function maskSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}****`;
}

/**
 * Configuration with secrets masked, for display
 */
export function redactConfig(config: DocqaConfig): DocqaConfig {
  return {
    ...config,
    llm: { ...config.llm, apiKey: maskSecret(config.llm.apiKey) },
    webSearch: { ...config.webSearch, apiKey: maskSecret(config.webSearch.apiKey) },
  };
}
