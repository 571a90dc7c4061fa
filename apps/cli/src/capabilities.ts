/**
 * Capability wiring for the CLI
 *
 * Builds the retriever, generator and (when a key is configured) the
 * web searcher from the effective configuration.
 */

import {
  InMemoryRetriever,
  LLMGenerator,
  LexicalReranker,
  TavilyWebSearcher,
  createLLMProvider,
  loadCorpus,
  type Capabilities,
  type DocqaConfig,
  type Logger,
} from '@docqa/core';

export async function buildCapabilities(
  config: DocqaConfig,
  corpusPath: string,
  logger: Logger
): Promise<Capabilities> {
  const documents = await loadCorpus(corpusPath);
  const retriever = new InMemoryRetriever(documents, {
    reranker: new LexicalReranker(),
    logger,
  });
  logger.debug('Corpus loaded', { path: corpusPath, documents: retriever.size });

  const provider = createLLMProvider(config.llm);
  const generator = new LLMGenerator(provider, { logger });

  const webSearcher = new TavilyWebSearcher({
    apiKey: config.webSearch.apiKey,
    maxResults: config.webSearch.maxResults,
    logger,
  });

  return webSearcher.isAvailable() ? { retriever, generator, webSearcher } : { retriever, generator };
}
