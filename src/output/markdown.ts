/**
 * Markdown rendering for scraped articles
 */

import { config } from '../config/index.js';
import type { Article, ImageData } from '../types/index.js';

function imageLines(image: ImageData): string[] {
  const lines = [`![${image.alt}](${image.src})`];
  if (image.caption) {
    lines.push(`*${image.caption}*`);
  }
  lines.push('');
  return lines;
}

export function renderMarkdown(
  article: Article,
  maxRelated: number = config.output.maxRelatedArticles
): string {
  const lines: string[] = [`# ${article.title}`, ''];

  if (article.subtitle) {
    lines.push(`*${article.subtitle}*`, '');
  }

  if (article.date) {
    lines.push(`**Date:** ${article.date}`);
  }
  if (article.author) {
    lines.push(`**Author:** ${article.author}`);
  }
  if (article.date || article.author) {
    lines.push('');
  }

  if (article.heroImage) {
    lines.push(...imageLines(article.heroImage));
  }

  lines.push(`**Source:** [${article.url}](${article.url})`, '', '---', '');

  for (const section of article.sections) {
    if (section.heading) {
      lines.push(`${'#'.repeat(section.headingLevel)} ${section.heading}`, '');
    }

    const content = section.content.trim();
    if (content) {
      lines.push(content, '');
    }

    for (const image of section.images) {
      lines.push(...imageLines(image));
    }
  }

  if (article.relatedArticles.length > 0) {
    lines.push('---', '', '## Related Articles', '');
    for (const related of article.relatedArticles.slice(0, maxRelated)) {
      lines.push(`- [${related.title}](${related.url})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
