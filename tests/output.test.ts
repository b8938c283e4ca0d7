import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { outputPaths, saveArticle, toJsonRecord } from '../src/output/writer.js';
import { renderMarkdown } from '../src/output/markdown.js';
import { writeBatchReport } from '../src/output/report.js';
import type { Article } from '../src/types/index.js';
import { BASE, article } from './helpers/fake-page.js';

const URL_MARRAKESH = article('africa', 'morocco', 'marrakesh-solo-travel');

const sample: Article = {
  url: URL_MARRAKESH,
  title: 'Marrakesh on Your Own',
  subtitle: 'A solo traveler in the Red City',
  date: 'March 2024',
  author: 'Test Writer',
  heroImage: { src: 'https://img.example.com/hero.jpg', alt: 'Rooftops', caption: 'Dusk' },
  sections: [
    { headingLevel: 2, content: 'Intro.', images: [] },
    {
      heading: 'Souks',
      headingLevel: 3,
      content: 'Bargain politely.',
      images: [{ src: 'https://img.example.com/souk.jpg', alt: 'Souk' }],
    },
  ],
  relatedArticles: Array.from({ length: 7 }, (_, i) => ({
    title: `Related ${i + 1}`,
    url: `${BASE}places-to-go/africa/related-${i + 1}.html`,
  })),
  rawHtml: '<html><body>Marrakesh</body></html>',
};

describe('outputPaths', () => {
  it('partitions by region and names files after the final segment', () => {
    expect(outputPaths(URL_MARRAKESH, 'out')).toEqual({
      json: path.join('out', 'africa', 'marrakesh-solo-travel.json'),
      html: path.join('out', 'africa', 'marrakesh-solo-travel.html'),
      markdown: path.join('out', 'africa', 'marrakesh-solo-travel.md'),
    });
  });

  it('writes to the root when the URL has no region', () => {
    expect(outputPaths(`${BASE}places-to-go/best-of-2024.html`, 'out').json).toBe(
      path.join('out', 'best-of-2024.json')
    );
  });

  it('maps distinct URLs with the same region and slug to the same files', () => {
    const a = outputPaths(article('africa', 'morocco', 'food-guide'), 'out');
    const b = outputPaths(article('africa', 'kenya', 'food-guide'), 'out');
    expect(a).toEqual(b);
  });
});

describe('renderMarkdown', () => {
  it('renders header, sections and at most five related articles', () => {
    const expected = [
      '# Marrakesh on Your Own',
      '',
      '*A solo traveler in the Red City*',
      '',
      '**Date:** March 2024',
      '**Author:** Test Writer',
      '',
      '![Rooftops](https://img.example.com/hero.jpg)',
      '*Dusk*',
      '',
      `**Source:** [${URL_MARRAKESH}](${URL_MARRAKESH})`,
      '',
      '---',
      '',
      'Intro.',
      '',
      '### Souks',
      '',
      'Bargain politely.',
      '',
      '![Souk](https://img.example.com/souk.jpg)',
      '',
      '---',
      '',
      '## Related Articles',
      '',
      ...[1, 2, 3, 4, 5].map((i) => `- [Related ${i}](${BASE}places-to-go/africa/related-${i}.html)`),
      '',
    ].join('\n');

    expect(renderMarkdown(sample)).toBe(expected);
  });

  it('omits optional blocks', () => {
    const bare: Article = { ...sample, subtitle: undefined, date: undefined, author: undefined, heroImage: undefined, sections: [], relatedArticles: [] };

    expect(renderMarkdown(bare)).toBe(
      ['# Marrakesh on Your Own', '', `**Source:** [${URL_MARRAKESH}](${URL_MARRAKESH})`, '', '---', ''].join('\n')
    );
  });
});

describe('toJsonRecord', () => {
  it('uses snake_case keys, nulls for absent values and an ISO timestamp', () => {
    const record = toJsonRecord({ ...sample, subtitle: undefined }, new Date('2024-03-01T10:00:00.000Z'));

    expect(record).toMatchObject({
      url: URL_MARRAKESH,
      subtitle: null,
      hero_image: { src: 'https://img.example.com/hero.jpg', alt: 'Rooftops', caption: 'Dusk' },
      sections: [
        { heading: null, heading_level: 2, content: 'Intro.', images: [] },
        {
          heading: 'Souks',
          heading_level: 3,
          content: 'Bargain politely.',
          images: [{ src: 'https://img.example.com/souk.jpg', alt: 'Souk', caption: null }],
        },
      ],
      scraped_at: '2024-03-01T10:00:00.000Z',
    });
    expect(record).not.toHaveProperty('raw_html');
  });
});

describe('saveArticle', () => {
  it('writes json, html and markdown under the region directory', async () => {
    const outputDir = await mkdtemp(path.join(tmpdir(), 'hemispheres-out-'));

    try {
      const files = await saveArticle(sample, outputDir, new Date('2024-03-01T10:00:00.000Z'));

      expect(files.json).toBe(path.join(outputDir, 'africa', 'marrakesh-solo-travel.json'));
      expect(await readFile(files.html, 'utf-8')).toBe(sample.rawHtml);
      expect(await readFile(files.markdown, 'utf-8')).toBe(renderMarkdown(sample));

      const json: unknown = JSON.parse(await readFile(files.json, 'utf-8'));
      expect(json).toMatchObject({ title: 'Marrakesh on Your Own', scraped_at: '2024-03-01T10:00:00.000Z' });
    } finally {
      await rm(outputDir, { recursive: true, force: true });
    }
  });
});

describe('writeBatchReport', () => {
  it('writes the report as JSON in the output directory', async () => {
    const outputDir = await mkdtemp(path.join(tmpdir(), 'hemispheres-report-'));

    try {
      const report = {
        mode: 'batch',
        source: `${BASE}places-to-go/africa/index.html`,
        finishedAt: '2024-03-01T10:00:00.000Z',
        summary: { total: 1, succeeded: 0, failed: 1 },
        results: [{ url: URL_MARRAKESH, success: false, error: 'boom' }],
      };

      const reportPath = await writeBatchReport(report, outputDir);

      expect(reportPath).toBe(path.join(outputDir, 'batch-report.json'));
      expect(JSON.parse(await readFile(reportPath, 'utf-8'))).toEqual(report);
    } finally {
      await rm(outputDir, { recursive: true, force: true });
    }
  });
});
