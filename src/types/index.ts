/**
 * Core types for the Hemispheres scraper
 */

/**
 * Absolute URL reduced to scheme://host/path. Dedup key within a discovery run.
 */
export type CandidateUrl = string;

/**
 * Optional region slug (e.g. "africa") narrowing which articles count
 */
export type TaxonomyFilter = string | undefined;

export type ProcessedStatus = 'pending' | 'success' | 'failed';

/**
 * Outcome of one listing discovery run
 */
export interface ListingState {
  listingUrl: string;
  /** Links found before classification */
  totalFound: number;
  validUrls: CandidateUrl[];
  skippedUrls: CandidateUrl[];
  processed: Record<CandidateUrl, ProcessedStatus>;
  /** Copy of validUrls at creation; not kept in sync with `processed` */
  remaining: CandidateUrl[];
}

export interface PlaceLink {
  url: CandidateUrl;
  name: string;
}

export interface ImageData {
  src: string;
  alt: string;
  caption?: string;
}

export interface ArticleSection {
  heading?: string;
  headingLevel: number;
  content: string;
  images: ImageData[];
}

export interface RelatedArticle {
  title: string;
  url: string;
}

export interface Article {
  url: string;
  title: string;
  subtitle?: string;
  date?: string;
  author?: string;
  heroImage?: ImageData;
  sections: ArticleSection[];
  relatedArticles: RelatedArticle[];
  rawHtml: string;
}

export type OutputFormat = 'json' | 'html' | 'markdown';

export type OutputFiles = Record<OutputFormat, string>;

/**
 * One attempted URL in a batch
 */
export interface BatchResult {
  url: CandidateUrl;
  success: boolean;
  error?: string;
  files?: OutputFiles;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
}

export type ProgressCallback = (index: number, total: number, url: CandidateUrl) => void;

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
