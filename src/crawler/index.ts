/**
 * Crawler Module
 *
 * URL classification, reveal-loop loading and listing discovery
 */

export {
  normalizeUrl,
  normalizeFilter,
  isValidArticleUrl,
  deriveSlug,
  deriveRegion,
  deriveArticleSlug,
  placeNameFromIndexUrl,
  isPlaceIndexUrl,
  buildPlaceUrl,
} from './url.js';

export {
  loadAllArticleLinks,
  extractContentLinks,
  contentLinkSelector,
  type LoaderOptions,
  type LoadResult,
  type StopReason,
} from './listing-loader.js';

export {
  revealMore,
  selectorStrategy,
  scriptedScanStrategy,
  DEFAULT_REVEAL_STRATEGIES,
  REVEAL_SELECTORS,
  type RevealStrategy,
} from './reveal.js';

export {
  crawlListing,
  discoverArticles,
  getArticleUrls,
  collectPlaceLinks,
  getPlaceUrls,
  buildListingState,
  type CrawlOptions,
  type DiscoveryOptions,
} from './listing-crawler.js';
