/**
 * Batch Orchestrator
 *
 * Discovers the articles under a listing and scrapes them one by one through
 * a single browser session. A failing article becomes a failed result and
 * the loop moves on; only discovery or session startup can fail the batch.
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { OrchestrationError, errorMessage } from '../utils/errors.js';
import { getArticleUrls } from '../crawler/listing-crawler.js';
import type { DiscoveryOptions } from '../crawler/listing-crawler.js';
import { isValidArticleUrl } from '../crawler/url.js';
import { openBrowserSession } from '../scraper/browser.js';
import type { BrowserSession, SessionFactory } from '../scraper/browser.js';
import { scrapeArticle } from '../scraper/article-scraper.js';
import type { PageDriver } from '../scraper/page-driver.js';
import { saveArticle } from '../output/writer.js';
import type {
  Article,
  BatchResult,
  BatchSummary,
  CandidateUrl,
  OutputFiles,
  ProgressCallback,
  TaxonomyFilter,
} from '../types/index.js';

/**
 * Collaborators the batch loop calls; defaults are the real implementations
 */
export interface BatchDependencies {
  discover: (listingUrl: string, options: DiscoveryOptions) => Promise<CandidateUrl[]>;
  openSession: SessionFactory;
  scrapeArticle: (page: PageDriver, url: CandidateUrl) => Promise<Article>;
  saveArticle: (article: Article, outputDir: string) => Promise<OutputFiles>;
}

export interface BatchOptions {
  maxArticles?: number;
  taxonomyFilter?: TaxonomyFilter;
  onProgress?: ProgressCallback;
  outputDir?: string;
  headless?: boolean;
  deps?: Partial<BatchDependencies>;
}

const defaultDependencies: BatchDependencies = {
  discover: getArticleUrls,
  openSession: openBrowserSession,
  scrapeArticle: (page, url) => scrapeArticle(page, url),
  saveArticle,
};

/**
 * Truncate to the first maxArticles and re-check every URL against the
 * article predicate
 */
export function selectCandidates(
  urls: readonly CandidateUrl[],
  maxArticles?: number,
  taxonomyFilter?: TaxonomyFilter
): CandidateUrl[] {
  const limited = maxArticles !== undefined ? urls.slice(0, Math.max(0, maxArticles)) : [...urls];

  return limited.filter((url) => {
    const valid = isValidArticleUrl(url, taxonomyFilter);
    if (!valid) {
      logger.warn({ url }, 'Dropping URL that failed article validation');
    }
    return valid;
  });
}

async function scrapeOne(
  page: PageDriver,
  url: CandidateUrl,
  outputDir: string,
  deps: BatchDependencies
): Promise<BatchResult> {
  try {
    const article = await deps.scrapeArticle(page, url);
    const files = await deps.saveArticle(article, outputDir);
    return { url, success: true, files };
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ url, error: message }, 'Article scrape failed');
    return { url, success: false, error: message };
  }
}

/**
 * Run the scrape loop over already discovered URLs in one session
 */
export async function scrapeUrls(
  urls: readonly CandidateUrl[],
  options: Omit<BatchOptions, 'maxArticles' | 'taxonomyFilter'> = {}
): Promise<BatchResult[]> {
  const deps: BatchDependencies = { ...defaultDependencies, ...options.deps };
  const outputDir = options.outputDir ?? config.output.dir;
  const results: BatchResult[] = [];

  if (urls.length === 0) {
    return results;
  }

  let session: BrowserSession;
  try {
    session = await deps.openSession({ headless: options.headless });
  } catch (error) {
    throw new OrchestrationError(`Could not open browser session: ${errorMessage(error)}`, error);
  }

  try {
    for (const [index, url] of urls.entries()) {
      options.onProgress?.(index + 1, urls.length, url);
      results.push(await scrapeOne(session.page, url, outputDir, deps));
    }
  } finally {
    await session.close();
  }

  return results;
}

/**
 * Discover articles under a listing and scrape each one
 */
export async function scrapeBatch(
  listingUrl: string,
  options: BatchOptions = {}
): Promise<BatchResult[]> {
  const { maxArticles, taxonomyFilter, ...loopOptions } = options;
  const deps: BatchDependencies = { ...defaultDependencies, ...options.deps };

  logger.info({ listingUrl, maxArticles, taxonomyFilter }, 'Starting batch');

  const discovered = await deps.discover(listingUrl, {
    taxonomyFilter,
    headless: options.headless,
  });
  const candidates = selectCandidates(discovered, maxArticles, taxonomyFilter);

  logger.info(
    { discovered: discovered.length, toScrape: candidates.length },
    'Candidate articles selected'
  );

  const results = await scrapeUrls(candidates, loopOptions);
  const summary = summarizeBatch(results);

  logger.info({ listingUrl, ...summary }, 'Batch completed');
  return results;
}

export function summarizeBatch(results: readonly BatchResult[]): BatchSummary {
  const succeeded = results.filter((result) => result.success).length;
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
  };
}
