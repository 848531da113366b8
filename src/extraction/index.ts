export { ContentExtractor } from './content-extractor.js';
export {
  LinkFilter,
  normalizeUrl,
  resolveLink,
  shouldCrawl,
  type LinkFilterOptions,
} from './link-filter.js';
