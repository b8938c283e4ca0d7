/**
 * Batch Module
 */

export {
  scrapeBatch,
  scrapeUrls,
  selectCandidates,
  summarizeBatch,
  type BatchOptions,
  type BatchDependencies,
} from './orchestrator.js';

export {
  scrapeAllPlaces,
  scrapePlaces,
  scrapePlaceList,
  type PlacesOptions,
  type PlacesReport,
  type PlaceOutcome,
} from './places.js';
