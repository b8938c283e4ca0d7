/**
 * Application configuration
 */

import { env } from './env.js';
import { TAXONOMY, REVEAL_PHRASES } from './taxonomy.js';

const baseUrl = env.HEMISPHERES_BASE_URL.endsWith('/')
  ? env.HEMISPHERES_BASE_URL
  : `${env.HEMISPHERES_BASE_URL}/`;

export const config = {
  app: {
    name: 'hemispheres-scraper',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  site: {
    baseUrl,
    placesIndexUrl: `${baseUrl}${TAXONOMY.listingRoot}/${TAXONOMY.indexPage}`,
    defaultListingUrl: `${baseUrl}${TAXONOMY.listingRoot}/africa/${TAXONOMY.indexPage}`,
    defaultArticleUrl: `${baseUrl}${TAXONOMY.listingRoot}/africa/morocco/marrakesh-solo-travel.html`,
  },

  browser: {
    headless: env.HEADLESS,
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
    viewport: { width: 1280, height: 800 },
    locale: 'en-US',
  },

  scraper: {
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    elementTimeoutMs: 20000,
    listingSettleMs: 3000,
    revealSettleMs: 2000,
    preClickDelayMs: 500,
    articleRenderMs: 8000,
    scrollSteps: 5,
    scrollStepMs: 1000,
    maxRevealAttempts: env.MAX_REVEAL_ATTEMPTS,
  },

  output: {
    dir: env.OUTPUT_DIR,
    reportFile: 'batch-report.json',
    maxRelatedArticles: 5,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  taxonomy: TAXONOMY,
  revealPhrases: REVEAL_PHRASES,

  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { TAXONOMY, REVEAL_PHRASES } from './taxonomy.js';
