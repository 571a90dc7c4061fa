/**
 * Tavily Web Searcher
 *
 * WebSearcher backed by the Tavily search API. Results come back in
 * Tavily's ranking order; only each result's content is kept.
 */

import { z } from 'zod';
import type { WebSearcher } from '../types.js';
import { CapabilityError, wrapCapabilityError } from '../errors.js';
import { getLogger, type Logger } from '../telemetry/logger.js';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

export interface TavilyWebSearcherConfig {
  /** API key (falls back to TAVILY_API_KEY) */
  apiKey?: string;
  /** Results per query (default 3) */
  maxResults?: number;
  /** Endpoint override */
  url?: string;
  logger?: Logger;
}

const TavilyResponse = z.object({
  results: z.array(
    z.object({
      title: z.string().optional(),
      url: z.string().optional(),
      content: z.string(),
      score: z.number().optional(),
    })
  ),
});

export class TavilyWebSearcher implements WebSearcher {
  private readonly apiKey: string | undefined;
  private readonly maxResults: number;
  private readonly url: string;
  private readonly logger: Logger;

  constructor(config: TavilyWebSearcherConfig = {}) {
    this.apiKey = config.apiKey || process.env.TAVILY_API_KEY;
    this.maxResults = config.maxResults ?? 3;
    this.url = config.url ?? TAVILY_SEARCH_URL;
    this.logger = config.logger ?? getLogger();
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  async search(query: string): Promise<string[]> {
    if (!this.apiKey) {
      throw new CapabilityError('web_search', 'Tavily web search not available: TAVILY_API_KEY not set');
    }

    const startTime = Date.now();
    let body: unknown;
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ query, max_results: this.maxResults }),
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Tavily API error: ${response.status} ${error}`);
      }
      body = await response.json();
    } catch (error) {
      throw wrapCapabilityError('web_search', error);
    }

    const parsed = TavilyResponse.safeParse(body);
    if (!parsed.success) {
      throw new CapabilityError('web_search', `Unexpected Tavily response: ${parsed.error.message}`);
    }

    this.logger.debug('Web search completed', {
      results: parsed.data.results.length,
      latencyMs: Date.now() - startTime,
    });
    return parsed.data.results.map((result) => result.content);
  }
}
