/**
 * CLI runner: resolves the mode, runs it and maps the outcome to an exit code
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { withDiscoveryRetry } from '../utils/retry.js';
import { getPlaceUrls, deriveSlug } from '../crawler/index.js';
import { scrapeSingleArticle } from '../scraper/index.js';
import { scrapeBatch, summarizeBatch, scrapeAllPlaces, scrapePlaces } from '../batch/index.js';
import type { PlacesOptions, PlacesReport } from '../batch/index.js';
import { writeBatchReport } from '../output/index.js';
import { parseCliArgs, resolveRunMode, CliUsageError, USAGE } from './args.js';
import type { CliOptions, RunMode } from './args.js';
import { EXIT_CODES, exitCodeFor } from './exit-code.js';
import type { ExitCode } from './exit-code.js';
import type { ProgressCallback } from '../types/index.js';

/**
 * Collaborators the runner calls out to; the defaults drive a real browser
 */
export interface CliDependencies {
  findPlaces?: PlacesOptions['findPlaces'];
  runBatch?: PlacesOptions['runBatch'];
}

const logProgress: ProgressCallback = (index, total, url) => {
  logger.info({ index, total, url }, `Scraping article ${index}/${total}`);
};

function describeMode(mode: RunMode): string {
  switch (mode.kind) {
    case 'single':
      return mode.url;
    case 'batch':
      return mode.listingUrl;
    case 'all-places':
      return config.site.placesIndexUrl;
    case 'places':
      return mode.names.join(',');
  }
}

async function runSingle(url: string, options: CliOptions, outputDir: string): Promise<ExitCode> {
  const { article, files } = await scrapeSingleArticle(url, { outputDir, headless: options.headless });

  logger.info(
    {
      title: article.title,
      subtitle: article.subtitle,
      date: article.date,
      author: article.author,
      sections: article.sections.length,
      images: article.sections.reduce((sum, section) => sum + section.images.length, 0),
      files,
    },
    'Scraping complete'
  );

  return EXIT_CODES.success;
}

async function runBatch(
  listingUrl: string,
  options: CliOptions,
  outputDir: string,
  deps: CliDependencies
): Promise<ExitCode> {
  const run = deps.runBatch ?? scrapeBatch;
  // A region listing links to other regions too; keep the batch inside it
  const region = deriveSlug(listingUrl);
  const results = await run(listingUrl, {
    taxonomyFilter: region.length > 0 ? region : undefined,
    maxArticles: options.maxArticles,
    outputDir,
    headless: options.headless,
    onProgress: logProgress,
  });
  const summary = summarizeBatch(results);

  await writeBatchReport(
    { mode: 'batch', source: listingUrl, finishedAt: new Date().toISOString(), summary, results },
    outputDir
  );

  logger.info(summary, 'Batch summary');
  return exitCodeFor(summary);
}

async function runPlaces(
  mode: RunMode,
  options: CliOptions,
  outputDir: string,
  deps: CliDependencies
): Promise<ExitCode> {
  const placesOptions: PlacesOptions = {
    maxArticles: options.maxArticles,
    outputDir,
    headless: options.headless,
    onProgress: logProgress,
    runBatch: deps.runBatch,
  };

  let report: PlacesReport;
  if (mode.kind === 'places') {
    report = await scrapePlaces(mode.names, placesOptions);
  } else {
    // Discovery has no retry of its own; the index page is worth a few tries
    report = await scrapeAllPlaces({
      ...placesOptions,
      findPlaces:
        deps.findPlaces ??
        ((indexUrl, discoveryOptions) =>
          withDiscoveryRetry(indexUrl, () => getPlaceUrls(indexUrl, discoveryOptions), config.retry)),
    });
  }

  if (report.places.length === 0) {
    logger.error('No places found');
    return EXIT_CODES.failure;
  }

  const placeErrors = report.places.flatMap((outcome) =>
    outcome.error ? [{ place: outcome.place.name, error: outcome.error }] : []
  );
  const summary = summarizeBatch(report.results);

  await writeBatchReport(
    {
      mode: mode.kind,
      source: describeMode(mode),
      finishedAt: new Date().toISOString(),
      summary,
      results: report.results,
      placeErrors,
    },
    outputDir
  );

  logger.info({ ...summary, places: report.places.length, placeErrors: placeErrors.length }, 'Places summary');
  return exitCodeFor({ succeeded: summary.succeeded, failed: summary.failed + placeErrors.length });
}

export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return EXIT_CODES.failure;
    }
    throw error;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return EXIT_CODES.success;
  }

  // --headless forces it on; otherwise HEADLESS decides
  options = { ...options, headless: options.headless || config.browser.headless };
  const mode = resolveRunMode(options, config.site.defaultListingUrl);
  const outputDir = options.output ?? config.output.dir;

  logger.info(
    { mode: mode.kind, target: describeMode(mode), outputDir, headless: options.headless },
    'Starting Hemispheres scraper'
  );

  switch (mode.kind) {
    case 'single':
      return runSingle(mode.url, options, outputDir);
    case 'batch':
      return runBatch(mode.listingUrl, options, outputDir, deps);
    case 'all-places':
    case 'places':
      return runPlaces(mode, options, outputDir, deps);
  }
}
