export { InMemoryRetriever, type InMemoryRetrieverOptions } from './memory-retriever.js';
export { LexicalReranker, type Reranker, type ScoredDocument } from './reranker.js';
export { loadCorpus, parseCorpus, corpusFormatFor, type CorpusFormat } from './corpus.js';
export { tokenize } from './tokenize.js';
