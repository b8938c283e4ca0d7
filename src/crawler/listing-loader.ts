/**
 * Incremental Listing Loader
 *
 * Clicks the reveal control until the listing stops growing. There is no
 * page parameter or total count to go by, so the end of the listing is
 * inferred from lack of progress: either no control is left, or a click
 * renders nothing new.
 */

import { TAXONOMY } from '../config/taxonomy.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { normalizeUrl, normalizeFilter } from './url.js';
import { revealMore, DEFAULT_REVEAL_STRATEGIES } from './reveal.js';
import type { RevealStrategy } from './reveal.js';
import type { PageDriver } from '../scraper/page-driver.js';
import type { CandidateUrl, TaxonomyFilter } from '../types/index.js';

export type StopReason = 'no-control' | 'no-new-content' | 'max-attempts';

export interface LoaderOptions {
  taxonomyFilter?: TaxonomyFilter;
  /** Ceiling on reveal clicks */
  maxAttempts?: number;
  /** Upper bound on the wait after each click */
  revealSettleMs?: number;
  preClickDelayMs?: number;
  /** When set, poll the link count during the settle wait and stop early once it grows */
  pollIntervalMs?: number;
  strategies?: readonly RevealStrategy[];
}

export interface LoadResult {
  /** Unique normalized URLs in discovery order */
  urls: CandidateUrl[];
  stopReason: StopReason;
  clicks: number;
  extractions: number;
}

/**
 * CSS selector for content links, scoped to a region when a filter is given.
 * Alternate-branch links are collected too so they show up as skipped.
 */
export function contentLinkSelector(taxonomyFilter?: TaxonomyFilter): string {
  const filter = normalizeFilter(taxonomyFilter);
  const listing = filter
    ? `a[href*="/${TAXONOMY.listingRoot}/${filter}/" i]`
    : `a[href*="/${TAXONOMY.listingRoot}/" i]`;

  return `${listing}, a[href*="/${TAXONOMY.alternateContentType}/" i]`;
}

/**
 * Normalize and dedup every content link in the current render
 */
export async function extractContentLinks(
  page: PageDriver,
  taxonomyFilter?: TaxonomyFilter
): Promise<CandidateUrl[]> {
  const hrefs = await page.collectHrefs(contentLinkSelector(taxonomyFilter));
  const baseUrl = page.currentUrl();
  const seen = new Set<CandidateUrl>();

  for (const href of hrefs) {
    const normalized = normalizeUrl(href, baseUrl);
    if (normalized) {
      seen.add(normalized);
    }
  }

  return [...seen];
}

export async function loadAllArticleLinks(
  page: PageDriver,
  options: LoaderOptions = {}
): Promise<LoadResult> {
  const {
    taxonomyFilter,
    maxAttempts = config.scraper.maxRevealAttempts,
    revealSettleMs = config.scraper.revealSettleMs,
    preClickDelayMs = config.scraper.preClickDelayMs,
    pollIntervalMs,
    strategies = DEFAULT_REVEAL_STRATEGIES,
  } = options;

  const found = new Set<CandidateUrl>();
  let clicks = 0;
  let extractions = 0;

  const extract = async (): Promise<CandidateUrl[]> => {
    extractions++;
    const links = await extractContentLinks(page, taxonomyFilter);
    for (const link of links) {
      found.add(link);
    }
    logger.info(
      { onPage: links.length, totalUnique: found.size },
      'Extracted article links'
    );
    return links;
  };

  const waitForNewContent = async (before: number): Promise<CandidateUrl[]> => {
    if (pollIntervalMs === undefined || pollIntervalMs <= 0 || pollIntervalMs >= revealSettleMs) {
      await page.waitFixed(revealSettleMs);
      return extract();
    }

    let waited = 0;
    for (;;) {
      const step = Math.min(pollIntervalMs, revealSettleMs - waited);
      await page.waitFixed(step);
      waited += step;

      const links = await extract();
      if (links.length > before || waited >= revealSettleMs) {
        return links;
      }
    }
  };

  await extract();

  let stopReason: StopReason;
  for (;;) {
    if (clicks >= maxAttempts) {
      stopReason = 'max-attempts';
      logger.info({ maxAttempts }, 'Reached maximum reveal attempts, stopping');
      break;
    }

    const before = found.size;
    const clickedWith = await revealMore(page, strategies, { preClickDelayMs });
    if (!clickedWith) {
      stopReason = 'no-control';
      logger.info('No more reveal control found, stopping');
      break;
    }
    clicks++;

    const fresh = await waitForNewContent(before);
    if (fresh.length <= before) {
      stopReason = 'no-new-content';
      logger.info({ clicks }, 'No new content loaded after click, stopping');
      break;
    }
  }

  return { urls: [...found], stopReason, clicks, extractions };
}
