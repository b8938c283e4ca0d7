/**
 * Article Scraper
 *
 * Loads one article page, lets the client app render, and extracts the
 * structured record.
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withBrowserSession, openBrowserSession } from './browser.js';
import type { BrowserOptions, SessionFactory } from './browser.js';
import type { PageDriver } from './page-driver.js';
import { extractArticleData } from './extraction.js';
import type { RawArticleData, RawImage } from './extraction.js';
import { saveArticle } from '../output/writer.js';
import type { Article, ImageData, OutputFiles } from '../types/index.js';

export interface ArticleScrapeOptions {
  navigationTimeoutMs?: number;
  elementTimeoutMs?: number;
  renderWaitMs?: number;
  scrollSteps?: number;
  scrollStepMs?: number;
  /** Pulls the raw record off the rendered page; defaults to the in-page extraction script */
  extract?: (page: PageDriver) => Promise<RawArticleData>;
}

const evaluateExtraction = (page: PageDriver): Promise<RawArticleData> =>
  page.evaluate(extractArticleData);

function toImage(raw: RawImage): ImageData {
  return {
    src: raw.src,
    alt: raw.alt,
    ...(raw.caption ? { caption: raw.caption } : {}),
  };
}

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Turn in-page extraction output into an Article
 */
export function buildArticle(url: string, data: RawArticleData, rawHtml: string): Article {
  return {
    url,
    title: optional(data.title) ?? 'Untitled',
    subtitle: optional(data.subtitle),
    date: optional(data.date),
    author: optional(data.author),
    heroImage: data.heroImage ? toImage(data.heroImage) : undefined,
    sections: data.sections.map((section) => ({
      heading: section.heading ?? undefined,
      headingLevel: section.headingLevel,
      content: section.content.trim(),
      images: section.images.map(toImage),
    })),
    relatedArticles: data.relatedArticles,
    rawHtml,
  };
}

/**
 * Scrape an article on an already open page
 */
export async function scrapeArticle(
  page: PageDriver,
  url: string,
  options: ArticleScrapeOptions = {}
): Promise<Article> {
  const {
    navigationTimeoutMs = config.scraper.navigationTimeoutMs,
    elementTimeoutMs = config.scraper.elementTimeoutMs,
    renderWaitMs = config.scraper.articleRenderMs,
    scrollSteps = config.scraper.scrollSteps,
    scrollStepMs = config.scraper.scrollStepMs,
    extract = evaluateExtraction,
  } = options;

  await page.navigate(url, { waitUntil: 'domcontentloaded', timeout: navigationTimeoutMs });

  const actualUrl = page.currentUrl();
  if (actualUrl !== url) {
    logger.info({ url, actualUrl }, 'Redirected');
  }

  // networkidle never fires on this site (analytics keep polling)
  await page.waitFixed(renderWaitMs);

  // Scroll down in steps so lazy sections render
  for (let step = 0; step < scrollSteps; step++) {
    await page.scrollToFraction(step / scrollSteps);
    await page.waitFixed(scrollStepMs);
  }
  await page.scrollToFraction(0);
  await page.waitFixed(scrollStepMs);

  try {
    await page.waitForSelector('h1', elementTimeoutMs);
  } catch (error) {
    logger.warn({ url, error: errorMessage(error) }, 'No h1 heading found, continuing anyway');
  }

  const rawHtml = await page.renderedHtml();
  const data = await extract(page);
  const article = buildArticle(url, data, rawHtml);

  logger.info(
    {
      url,
      sections: article.sections.length,
      images: article.sections.reduce((sum, section) => sum + section.images.length, 0),
    },
    'Article extracted'
  );

  return article;
}

export interface SingleArticleOptions extends ArticleScrapeOptions, BrowserOptions {
  outputDir?: string;
  openSession?: SessionFactory;
}

/**
 * Scrape one URL in its own session and write all output formats
 */
export async function scrapeSingleArticle(
  url: string,
  options: SingleArticleOptions = {}
): Promise<{ article: Article; files: OutputFiles }> {
  const {
    outputDir = config.output.dir,
    openSession = openBrowserSession,
    headless,
    timeout,
    ...scrapeOptions
  } = options;

  const article = await withBrowserSession(
    { headless, timeout },
    (page) => scrapeArticle(page, url, scrapeOptions),
    openSession
  );
  const files = await saveArticle(article, outputDir);

  return { article, files };
}
