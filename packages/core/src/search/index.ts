export { TavilyWebSearcher, TAVILY_SEARCH_URL, type TavilyWebSearcherConfig } from './tavily.js';
