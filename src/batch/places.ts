/**
 * Multi-place orchestration
 *
 * Runs one batch per region. A region whose listing cannot be discovered is
 * reported and the next region still runs.
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { getPlaceUrls } from '../crawler/listing-crawler.js';
import type { DiscoveryOptions } from '../crawler/listing-crawler.js';
import { buildPlaceUrl } from '../crawler/url.js';
import { scrapeBatch } from './orchestrator.js';
import type { BatchOptions } from './orchestrator.js';
import type { BatchResult, PlaceLink } from '../types/index.js';

export interface PlaceOutcome {
  place: PlaceLink;
  results: BatchResult[];
  error?: string;
}

export interface PlacesReport {
  places: PlaceOutcome[];
  results: BatchResult[];
}

export interface PlacesOptions extends Omit<BatchOptions, 'taxonomyFilter'> {
  indexUrl?: string;
  baseUrl?: string;
  /** Finds places on the index page; defaults to getPlaceUrls */
  findPlaces?: (indexUrl: string, options: DiscoveryOptions) => Promise<PlaceLink[]>;
  /** Runs one place's batch; defaults to scrapeBatch */
  runBatch?: (listingUrl: string, options: BatchOptions) => Promise<BatchResult[]>;
}

export async function scrapePlaceList(
  places: readonly PlaceLink[],
  options: PlacesOptions = {}
): Promise<PlacesReport> {
  const { runBatch = scrapeBatch, maxArticles, onProgress, outputDir, headless, deps } = options;
  const batchOptions: BatchOptions = { maxArticles, onProgress, outputDir, headless, deps };
  const outcomes: PlaceOutcome[] = [];

  for (const [index, place] of places.entries()) {
    logger.info(
      { place: place.name, url: place.url, position: index + 1, total: places.length },
      'Scraping place'
    );

    try {
      const results = await runBatch(place.url, { ...batchOptions, taxonomyFilter: place.name });
      outcomes.push({ place, results });
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ place: place.name, error: message }, 'Place failed');
      outcomes.push({ place, results: [], error: message });
    }
  }

  return {
    places: outcomes,
    results: outcomes.flatMap((outcome) => outcome.results),
  };
}

/**
 * Every region listed on the places index
 */
export async function scrapeAllPlaces(options: PlacesOptions = {}): Promise<PlacesReport> {
  const { indexUrl = config.site.placesIndexUrl, findPlaces = getPlaceUrls } = options;

  const places = await findPlaces(indexUrl, { headless: options.headless });
  if (places.length === 0) {
    logger.warn({ indexUrl }, 'No places found');
    return { places: [], results: [] };
  }

  logger.info({ places: places.map((place) => place.name) }, 'Places discovered');
  return scrapePlaceList(places, options);
}

/**
 * Named regions, e.g. ["africa", "europe"]
 */
export async function scrapePlaces(
  names: readonly string[],
  options: PlacesOptions = {}
): Promise<PlacesReport> {
  const baseUrl = options.baseUrl ?? config.site.baseUrl;
  const places = names
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0)
    .map((name) => ({ name, url: buildPlaceUrl(baseUrl, name) }));

  return scrapePlaceList(places, options);
}
