/**
 * Command line parsing
 */

export interface CliOptions {
  url?: string;
  listingUrl?: string;
  batch: boolean;
  maxArticles?: number;
  output?: string;
  headless: boolean;
  allPlaces: boolean;
  places?: string[];
  help: boolean;
}

export type RunMode =
  | { kind: 'single'; url: string }
  | { kind: 'batch'; listingUrl: string }
  | { kind: 'all-places' }
  | { kind: 'places'; names: string[] };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: hemispheres-scraper [options]

Modes (first match wins):
  --url <url>            Scrape a single article
  --listing-url <url>    Scrape every article under a listing page
  --batch                Batch mode on the default listing when --listing-url is absent
  --all-places           Scrape every region on the places index (default)
  --places <a,b,c>       Scrape the named regions

Options:
  --max-articles <n>     Scrape at most n articles per listing
  --output <dir>         Output directory
  --headless             Run the browser without a window
  --help                 Show this message
`;

const VALUE_FLAGS = new Set(['--url', '--listing-url', '--max-articles', '--output', '--places']);
const BOOLEAN_FLAGS = new Set(['--batch', '--headless', '--all-places', '--help', '-h']);

function parseMaxArticles(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`--max-articles expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    batch: false,
    headless: false,
    allPlaces: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;

    if (BOOLEAN_FLAGS.has(flag)) {
      switch (flag) {
        case '--batch':
          options.batch = true;
          break;
        case '--headless':
          options.headless = true;
          break;
        case '--all-places':
          options.allPlaces = true;
          break;
        default:
          options.help = true;
      }
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '' || value.startsWith('--')) {
      throw new CliUsageError(`${flag} expects a value`);
    }

    switch (flag) {
      case '--url':
        options.url = value;
        break;
      case '--listing-url':
        options.listingUrl = value;
        break;
      case '--max-articles':
        options.maxArticles = parseMaxArticles(value);
        break;
      case '--output':
        options.output = value;
        break;
      case '--places':
        options.places = value
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0);
        break;
    }
  }

  return options;
}

/**
 * Single URL > listing/batch > all places > named places > all places
 */
export function resolveRunMode(options: CliOptions, defaultListingUrl: string): RunMode {
  if (options.url) {
    return { kind: 'single', url: options.url };
  }
  if (options.listingUrl || options.batch) {
    return { kind: 'batch', listingUrl: options.listingUrl ?? defaultListingUrl };
  }
  if (options.allPlaces) {
    return { kind: 'all-places' };
  }
  if (options.places && options.places.length > 0) {
    return { kind: 'places', names: options.places };
  }
  return { kind: 'all-places' };
}
