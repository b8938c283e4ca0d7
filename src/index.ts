#!/usr/bin/env node
/**
 * Hemispheres Scraper
 *
 * Discovers and scrapes travel articles from the Hemispheres magazine site
 * and writes each one as JSON, HTML and Markdown.
 *
 * Usage:
 *   node dist/index.js --url <article-url>            - Scrape one article
 *   node dist/index.js --listing-url <url> [--max-articles N]
 *                                                     - Scrape a region listing
 *   node dist/index.js --places africa,europe          - Scrape named regions
 *   node dist/index.js                                 - Default: every region
 */

import { logger } from './utils/logger.js';
import { runCli } from './cli/run.js';
import { EXIT_CODES } from './cli/exit-code.js';

process.on('SIGINT', () => {
  logger.warn('Scraping interrupted by user');
  process.exit(EXIT_CODES.interrupted);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Application failed');
    process.exit(EXIT_CODES.failure);
  });
