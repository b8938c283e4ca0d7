/**
 * Article persistence
 *
 * Output locations depend on the URL alone: <dir>/<region>/<slug>.<ext>.
 * Two URLs sharing region and final segment write to the same files; the
 * later one wins.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { deriveRegion, deriveArticleSlug } from '../crawler/url.js';
import { logger } from '../utils/logger.js';
import { renderMarkdown } from './markdown.js';
import type { Article, ImageData, OutputFiles } from '../types/index.js';

export function outputPaths(url: string, outputDir: string): OutputFiles {
  const region = deriveRegion(url);
  const dir = region ? path.join(outputDir, region) : outputDir;
  const slug = deriveArticleSlug(url);

  return {
    json: path.join(dir, `${slug}.json`),
    html: path.join(dir, `${slug}.html`),
    markdown: path.join(dir, `${slug}.md`),
  };
}

function imageRecord(image: ImageData): Record<string, string | null> {
  return {
    src: image.src,
    alt: image.alt,
    caption: image.caption ?? null,
  };
}

/**
 * JSON document written for an article
 */
export function toJsonRecord(article: Article, scrapedAt: Date): Record<string, unknown> {
  return {
    url: article.url,
    title: article.title,
    subtitle: article.subtitle ?? null,
    date: article.date ?? null,
    author: article.author ?? null,
    hero_image: article.heroImage ? imageRecord(article.heroImage) : null,
    sections: article.sections.map((section) => ({
      heading: section.heading ?? null,
      heading_level: section.headingLevel,
      content: section.content,
      images: section.images.map(imageRecord),
    })),
    related_articles: article.relatedArticles,
    scraped_at: scrapedAt.toISOString(),
  };
}

/**
 * Write JSON, HTML and Markdown for an article
 */
export async function saveArticle(
  article: Article,
  outputDir: string,
  scrapedAt: Date = new Date()
): Promise<OutputFiles> {
  const files = outputPaths(article.url, outputDir);
  await mkdir(path.dirname(files.json), { recursive: true });

  await writeFile(files.json, `${JSON.stringify(toJsonRecord(article, scrapedAt), null, 2)}\n`, 'utf-8');
  await writeFile(files.html, article.rawHtml, 'utf-8');
  await writeFile(files.markdown, renderMarkdown(article), 'utf-8');

  logger.debug({ url: article.url, files }, 'Article saved');
  return files;
}
