/**
 * Scraper Module
 *
 * Browser sessions, the page automation surface and article extraction
 */

// Article scraping
export {
  scrapeArticle,
  scrapeSingleArticle,
  buildArticle,
  type ArticleScrapeOptions,
  type SingleArticleOptions,
} from './article-scraper.js';

export { extractArticleData, type RawArticleData } from './extraction.js';

// Browser utilities
export { openBrowserSession, withBrowserSession } from './browser.js';
export { PlaywrightPageDriver } from './page-driver.js';

export type { BrowserOptions, BrowserSession, SessionFactory } from './browser.js';
export type { PageDriver, ControlHandle, NavigateOptions, WaitStrategy } from './page-driver.js';
