/**
 * URL Normalizer / Classifier
 *
 * Pure functions over URLs: resolution, dedup normalization and taxonomy
 * membership. No I/O.
 */

import { TAXONOMY } from '../config/taxonomy.js';
import type { CandidateUrl, TaxonomyFilter } from '../types/index.js';

const WEB_PROTOCOLS = new Set(['http:', 'https:']);

const PLACE_INDEX_PATTERN = new RegExp(
  `/${TAXONOMY.listingRoot}/[^/]+/${TAXONOMY.indexPage.replace('.', '\\.')}$`
);

/**
 * Resolve an href against the page URL and reduce it to scheme://host/path.
 * Returns null for hrefs that are not http(s) URLs.
 */
export function normalizeUrl(rawHref: string, baseUrl: string): CandidateUrl | null {
  let resolved: URL;
  try {
    resolved = new URL(rawHref.trim(), baseUrl);
  } catch {
    return null;
  }

  if (!WEB_PROTOCOLS.has(resolved.protocol)) {
    return null;
  }

  return `${resolved.protocol}//${resolved.host}${resolved.pathname}`;
}

/**
 * Canonical form of a region filter: lowercased, reduced to the characters a
 * path segment can carry unescaped. Blank filters become undefined.
 */
export function normalizeFilter(taxonomyFilter?: TaxonomyFilter): string | undefined {
  const cleaned = taxonomyFilter?.trim().toLowerCase().replace(/[^a-z0-9._~-]/g, '');
  return cleaned ? cleaned : undefined;
}

function lowerPath(url: string): string | null {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return null;
  }
}

function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
  } catch {
    return [];
  }
}

/**
 * True when the URL is an article page under the listing root, outside the
 * alternate content branch, and (with a filter) inside the filtered region.
 */
export function isValidArticleUrl(url: string, taxonomyFilter?: TaxonomyFilter): boolean {
  const path = lowerPath(url);
  if (path === null) {
    return false;
  }

  if (!path.includes(`/${TAXONOMY.listingRoot}/`)) {
    return false;
  }

  if (path.includes(`/${TAXONOMY.alternateContentType}/`)) {
    return false;
  }

  const filter = normalizeFilter(taxonomyFilter);
  if (filter && !path.includes(`/${filter}/`)) {
    return false;
  }

  if (TAXONOMY.indexSuffixes.some((suffix) => path.endsWith(suffix))) {
    return false;
  }

  return path.endsWith(TAXONOMY.articleSuffix);
}

/**
 * Path segment right after the listing root, or '' when there is none.
 * The final segment (a page, not a directory) never counts.
 */
export function deriveSlug(url: string): string {
  const segments = pathSegments(url);
  const rootIndex = segments.findIndex(
    (segment) => segment.toLowerCase() === TAXONOMY.listingRoot
  );

  if (rootIndex === -1 || rootIndex + 1 >= segments.length - 1) {
    return '';
  }

  return segments[rootIndex + 1] ?? '';
}

/**
 * Region an article belongs to, used for output partitioning
 */
export function deriveRegion(url: string): string | undefined {
  const slug = deriveSlug(url);
  return slug.length > 0 ? slug : undefined;
}

/**
 * Final path segment without its extension
 */
export function deriveArticleSlug(url: string): string {
  const last = pathSegments(url).at(-1);
  if (!last) {
    return 'article';
  }

  const dot = last.lastIndexOf('.');
  const stem = dot > 0 ? last.slice(0, dot) : last;
  return stem.length > 0 ? stem : 'article';
}

/**
 * Last non-empty segment preceding /index.html
 */
export function placeNameFromIndexUrl(url: string): string {
  const segments = pathSegments(url);
  const last = segments.at(-1);

  if (last?.toLowerCase() === TAXONOMY.indexPage) {
    return segments.at(-2) ?? '';
  }

  return last ?? '';
}

/**
 * Matches <root>/<place>/index.html
 */
export function isPlaceIndexUrl(url: string): boolean {
  const path = lowerPath(url);
  return path !== null && PLACE_INDEX_PATTERN.test(path);
}

/**
 * Index URL for a named place under the site base URL
 */
export function buildPlaceUrl(baseUrl: string, placeName: string): string {
  const slug = encodeURIComponent(placeName.trim().toLowerCase());
  return new URL(`${TAXONOMY.listingRoot}/${slug}/${TAXONOMY.indexPage}`, baseUrl).toString();
}
