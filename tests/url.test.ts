import { describe, expect, it } from 'vitest';
import {
  normalizeUrl,
  normalizeFilter,
  isValidArticleUrl,
  deriveSlug,
  deriveRegion,
  deriveArticleSlug,
  placeNameFromIndexUrl,
  isPlaceIndexUrl,
  buildPlaceUrl,
} from '../src/crawler/url.js';
import { contentLinkSelector } from '../src/crawler/listing-loader.js';
import { BASE, article } from './helpers/fake-page.js';

const MARRAKESH = article('africa', 'morocco', 'marrakesh-solo-travel');

describe('normalizeUrl', () => {
  const page = `${BASE}places-to-go/africa/index.html`;

  it('collapses equivalent hrefs to one candidate', () => {
    const variants = [
      MARRAKESH,
      `${MARRAKESH}#gallery`,
      `${MARRAKESH}?utm_source=newsletter`,
      `${MARRAKESH}?a=1#b`,
      'morocco/marrakesh-solo-travel.html',
      '/en/us/hemispheres/places-to-go/africa/morocco/marrakesh-solo-travel.html',
      '//www.united.com/en/us/hemispheres/places-to-go/africa/morocco/marrakesh-solo-travel.html',
      '  morocco/marrakesh-solo-travel.html  ',
    ];

    const normalized = new Set(variants.map((href) => normalizeUrl(href, page)));
    expect([...normalized]).toEqual([MARRAKESH]);
  });

  it('is idempotent', () => {
    const once = normalizeUrl('../europe/france/paris-bistros.html?x=1', page);
    expect(once).toBe(`${BASE}places-to-go/europe/france/paris-bistros.html`);
    expect(normalizeUrl(once ?? '', page)).toBe(once);
  });

  it('lowercases the host but keeps the path as written', () => {
    expect(normalizeUrl('HTTPS://WWW.UNITED.COM/En/Path.html', page)).toBe(
      'https://www.united.com/En/Path.html'
    );
  });

  it('rejects non-web schemes', () => {
    expect(normalizeUrl('javascript:void(0)', page)).toBeNull();
    expect(normalizeUrl('mailto:editor@example.com', page)).toBeNull();
  });
});

describe('isValidArticleUrl', () => {
  it('accepts an article under the listing root', () => {
    expect(isValidArticleUrl(MARRAKESH)).toBe(true);
  });

  it('rejects anything on the alternate content branch, whatever the filter', () => {
    const mixed = [
      `${BASE}places-to-go/africa/things-to-do/desert-camps.html`,
      `${BASE}things-to-do/places-to-go/africa/spice-markets.html`,
    ];
    for (const url of mixed) {
      expect(isValidArticleUrl(url)).toBe(false);
      expect(isValidArticleUrl(url, 'africa')).toBe(false);
      expect(isValidArticleUrl(url, 'things-to-do')).toBe(false);
    }
  });

  it('rejects index pages even under the listing root', () => {
    expect(isValidArticleUrl(`${BASE}places-to-go/africa/index.html`)).toBe(false);
    expect(isValidArticleUrl(`${BASE}places-to-go/africa/morocco/index`)).toBe(false);
  });

  it('rejects pages outside the listing root and non-html pages', () => {
    expect(isValidArticleUrl(`${BASE}about-us/team.html`)).toBe(false);
    expect(isValidArticleUrl(`${BASE}places-to-go/africa/morocco/marrakesh`)).toBe(false);
    expect(isValidArticleUrl('not a url')).toBe(false);
  });

  it('narrows by region, case-insensitively', () => {
    expect(isValidArticleUrl(MARRAKESH, 'africa')).toBe(true);
    expect(isValidArticleUrl(MARRAKESH, 'AFRICA')).toBe(true);
    expect(isValidArticleUrl(MARRAKESH, 'europe')).toBe(false);
  });

  it('matches the same region segment the link selector asks for', () => {
    const pitons = article('st.lucia', 'castries', 'pitons');

    expect(isValidArticleUrl(pitons, 'St.Lucia')).toBe(true);
    expect(contentLinkSelector('St.Lucia')).toBe(
      'a[href*="/places-to-go/st.lucia/" i], a[href*="/things-to-do/" i]'
    );
  });

  it('keeps every unfiltered-valid URL valid under its own region only', () => {
    const urls = [
      MARRAKESH,
      article('europe', 'portugal', 'lisbon-trams'),
      article('asia', 'japan', 'kyoto-gardens'),
    ];
    for (const url of urls) {
      const own = deriveSlug(url);
      const other = own === 'europe' ? 'asia' : 'europe';
      expect(isValidArticleUrl(url)).toBe(true);
      expect(isValidArticleUrl(url, own)).toBe(true);
      expect(isValidArticleUrl(url, other)).toBe(false);
    }
  });
});

describe('normalizeFilter', () => {
  it('lowercases and keeps only path-safe characters', () => {
    expect(normalizeFilter(' St.Lucia"] ')).toBe('st.lucia');
    expect(normalizeFilter('south_pacific')).toBe('south_pacific');
  });

  it('treats blank filters as no filter', () => {
    expect(normalizeFilter(undefined)).toBeUndefined();
    expect(normalizeFilter('   ')).toBeUndefined();
    expect(normalizeFilter('"/"')).toBeUndefined();
  });
});

describe('slug and region derivation', () => {
  it('derives region and slug from an article URL', () => {
    expect(deriveRegion(MARRAKESH)).toBe('africa');
    expect(deriveArticleSlug(MARRAKESH)).toBe('marrakesh-solo-travel');
  });

  it('has no region for pages directly under the listing root', () => {
    expect(deriveRegion(`${BASE}places-to-go/best-of-2024.html`)).toBeUndefined();
    expect(deriveSlug(`${BASE}places-to-go/index.html`)).toBe('');
  });

  it('derives the place slug from a place index URL', () => {
    expect(deriveSlug(`${BASE}places-to-go/africa/index.html`)).toBe('africa');
    expect(placeNameFromIndexUrl(`${BASE}places-to-go/south-america/index.html`)).toBe('south-america');
  });

  it('falls back to "article" for an empty path', () => {
    expect(deriveArticleSlug('https://www.united.com/')).toBe('article');
  });

  it('recognizes place index URLs one level under the root', () => {
    expect(isPlaceIndexUrl(`${BASE}places-to-go/africa/index.html`)).toBe(true);
    expect(isPlaceIndexUrl(`${BASE}places-to-go/index.html`)).toBe(false);
    expect(isPlaceIndexUrl(`${BASE}places-to-go/africa/morocco/index.html`)).toBe(false);
  });

  it('builds a place URL from a name', () => {
    expect(buildPlaceUrl(BASE, ' Europe ')).toBe(`${BASE}places-to-go/europe/index.html`);
  });
});
