/**
 * Listing Crawler
 *
 * Discovers article URLs under a region listing and region URLs under the
 * places index. Every call returns fresh values; nothing is cached between
 * runs.
 */

import { TAXONOMY } from '../config/taxonomy.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { FatalDiscoveryError } from '../utils/errors.js';
import { withBrowserSession, openBrowserSession } from '../scraper/browser.js';
import type { BrowserOptions, SessionFactory } from '../scraper/browser.js';
import type { PageDriver } from '../scraper/page-driver.js';
import { loadAllArticleLinks } from './listing-loader.js';
import type { LoaderOptions } from './listing-loader.js';
import {
  normalizeUrl,
  isValidArticleUrl,
  isPlaceIndexUrl,
  placeNameFromIndexUrl,
} from './url.js';
import type {
  CandidateUrl,
  ListingState,
  PlaceLink,
  ProcessedStatus,
  TaxonomyFilter,
} from '../types/index.js';

export interface CrawlOptions extends LoaderOptions {
  listingSettleMs?: number;
  navigationTimeoutMs?: number;
}

export interface DiscoveryOptions extends CrawlOptions, BrowserOptions {
  openSession?: SessionFactory;
}

const PLACE_LINK_SELECTOR = `a[href*="/${TAXONOMY.listingRoot}/" i][href$="/${TAXONOMY.indexPage}" i]`;

/**
 * Partition discovered URLs into valid and skipped and seed the diagnostic
 * fields
 */
export function buildListingState(
  listingUrl: string,
  discovered: readonly CandidateUrl[],
  taxonomyFilter?: TaxonomyFilter
): ListingState {
  const validUrls: CandidateUrl[] = [];
  const skippedUrls: CandidateUrl[] = [];

  for (const url of discovered) {
    if (isValidArticleUrl(url, taxonomyFilter)) {
      validUrls.push(url);
    } else {
      skippedUrls.push(url);
    }
  }

  const processed: Record<CandidateUrl, ProcessedStatus> = {};
  for (const url of validUrls) {
    processed[url] = 'pending';
  }

  return {
    listingUrl,
    totalFound: discovered.length,
    validUrls,
    skippedUrls,
    processed,
    remaining: [...validUrls],
  };
}

async function openListing(
  page: PageDriver,
  url: string,
  options: CrawlOptions
): Promise<void> {
  const {
    navigationTimeoutMs = config.scraper.navigationTimeoutMs,
    listingSettleMs = config.scraper.listingSettleMs,
  } = options;

  logger.info({ url }, 'Navigating to listing page');

  try {
    await page.navigate(url, { waitUntil: 'domcontentloaded', timeout: navigationTimeoutMs });
  } catch (error) {
    throw new FatalDiscoveryError(url, error);
  }

  await page.waitFixed(listingSettleMs);
}

/**
 * Crawl a listing on an already open page
 */
export async function crawlListing(
  page: PageDriver,
  listingUrl: string,
  options: CrawlOptions = {}
): Promise<ListingState> {
  await openListing(page, listingUrl, options);

  const loaded = await loadAllArticleLinks(page, options);
  const state = buildListingState(listingUrl, loaded.urls, options.taxonomyFilter);

  logger.info(
    {
      listingUrl,
      totalFound: state.totalFound,
      valid: state.validUrls.length,
      skipped: state.skippedUrls.length,
      clicks: loaded.clicks,
      stopReason: loaded.stopReason,
    },
    'Crawling complete'
  );

  return state;
}

/**
 * Crawl a listing in its own browser session
 */
export async function discoverArticles(
  listingUrl: string,
  options: DiscoveryOptions = {}
): Promise<ListingState> {
  const { openSession = openBrowserSession, headless, timeout, ...crawlOptions } = options;

  return withBrowserSession(
    { headless, timeout },
    (page) => crawlListing(page, listingUrl, crawlOptions),
    openSession
  );
}

export async function getArticleUrls(
  listingUrl: string,
  options: DiscoveryOptions = {}
): Promise<CandidateUrl[]> {
  const state = await discoverArticles(listingUrl, options);
  return state.validUrls;
}

/**
 * Region index links on an already open page. The index is fully rendered,
 * so no reveal loop runs.
 */
export async function collectPlaceLinks(
  page: PageDriver,
  indexUrl: string,
  options: CrawlOptions = {}
): Promise<PlaceLink[]> {
  await openListing(page, indexUrl, options);

  const hrefs = await page.collectHrefs(PLACE_LINK_SELECTOR);
  const baseUrl = page.currentUrl();
  const self = normalizeUrl(indexUrl, indexUrl);
  const seen = new Set<CandidateUrl>();
  const places: PlaceLink[] = [];

  for (const href of hrefs) {
    const url = normalizeUrl(href, baseUrl);
    if (!url || url === self || seen.has(url) || !isPlaceIndexUrl(url)) {
      continue;
    }

    seen.add(url);
    places.push({ url, name: placeNameFromIndexUrl(url) });
  }

  logger.info({ indexUrl, places: places.length }, 'Found places');
  return places;
}

export async function getPlaceUrls(
  indexUrl: string,
  options: DiscoveryOptions = {}
): Promise<PlaceLink[]> {
  const { openSession = openBrowserSession, headless, timeout, ...crawlOptions } = options;

  return withBrowserSession(
    { headless, timeout },
    (page) => collectPlaceLinks(page, indexUrl, crawlOptions),
    openSession
  );
}
