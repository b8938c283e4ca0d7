import { describe, expect, it } from 'vitest';
import {
  loadAllArticleLinks,
  contentLinkSelector,
  extractContentLinks,
} from '../src/crawler/listing-loader.js';
import { revealMore, REVEAL_SELECTORS } from '../src/crawler/reveal.js';
import { FakePage, BASE, article } from './helpers/fake-page.js';

const A1 = article('africa', 'morocco', 'marrakesh-solo-travel');
const A2 = article('africa', 'kenya', 'nairobi-food-guide');
const A3 = article('africa', 'south-africa', 'cape-town-wine-country');
const A4 = article('africa', 'egypt', 'cairo-museums');

const fast = { revealSettleMs: 2000, preClickDelayMs: 500 };

describe('contentLinkSelector', () => {
  it('collects the listing root and the alternate branch', () => {
    expect(contentLinkSelector()).toBe(
      'a[href*="/places-to-go/" i], a[href*="/things-to-do/" i]'
    );
  });

  it('scopes listing links to a normalized region', () => {
    expect(contentLinkSelector(' Africa"] ')).toBe(
      'a[href*="/places-to-go/africa/" i], a[href*="/things-to-do/" i]'
    );
  });
});

describe('extractContentLinks', () => {
  it('normalizes and dedups in document order', async () => {
    const page = FakePage.fromRenders([
      [A2, `${A1}#top`, `${A2}?ref=home`, '/en/us/hemispheres/places-to-go/africa/kenya/nairobi-food-guide.html'],
    ]);
    await page.navigate(`${BASE}places-to-go/africa/index.html`);

    expect(await extractContentLinks(page)).toEqual([A2, A1]);
  });
});

describe('loadAllArticleLinks', () => {
  it('stops when the control disappears', async () => {
    const page = FakePage.fromRenders([[A1, A2], [A1, A2, A3]]);

    const result = await loadAllArticleLinks(page, fast);

    expect(result).toEqual({
      urls: [A1, A2, A3],
      stopReason: 'no-control',
      clicks: 1,
      extractions: 2,
    });
  });

  it('stops when a click renders nothing new', async () => {
    const page = FakePage.fromRenders([[A1, A2], [A1, A2, A3], [A1, A2, A3]]);

    const result = await loadAllArticleLinks(page, fast);

    expect(result.stopReason).toBe('no-new-content');
    expect(result.urls).toEqual([A1, A2, A3]);
    expect(result.clicks).toBe(2);
    expect(result.extractions).toBe(result.clicks + 1);
  });

  it('stops exactly at the ceiling when every click adds links', async () => {
    const page = new FakePage({
      render: (clicks) =>
        Array.from({ length: clicks + 1 }, (_, i) => article('asia', 'japan', `story-${i}`)),
      controlAvailable: () => true,
    });

    const result = await loadAllArticleLinks(page, { ...fast, maxAttempts: 5 });

    expect(result.stopReason).toBe('max-attempts');
    expect(result.clicks).toBe(5);
    expect(result.extractions).toBe(6);
    expect(result.urls).toHaveLength(6);
    expect(page.clicks).toBe(5);
  });

  it('never clicks when no control is rendered', async () => {
    const page = FakePage.fromRenders([[A1]]);

    const result = await loadAllArticleLinks(page, fast);

    expect(result).toEqual({ urls: [A1], stopReason: 'no-control', clicks: 0, extractions: 1 });
    expect(page.waits).toEqual([]);
  });

  it('waits the pre-click delay then the settle delay', async () => {
    const page = FakePage.fromRenders([[A1], [A1, A2]]);

    await loadAllArticleLinks(page, fast);

    expect(page.waits).toEqual([500, 2000]);
  });

  it('polls up to the settle ceiling when nothing grows', async () => {
    const page = new FakePage({
      render: () => [A1],
      controlAvailable: (clicks) => clicks < 1,
    });

    const result = await loadAllArticleLinks(page, { ...fast, pollIntervalMs: 500 });

    expect(page.waits).toEqual([500, 500, 500, 500, 500]);
    expect(result.stopReason).toBe('no-new-content');
    expect(result.extractions).toBe(5);
  });

  it('polls only until the listing grows', async () => {
    const page = FakePage.fromRenders([[A1], [A1, A4]]);

    const result = await loadAllArticleLinks(page, { ...fast, pollIntervalMs: 500 });

    expect(page.waits).toEqual([500, 500]);
    expect(result.urls).toEqual([A1, A4]);
    expect(result.stopReason).toBe('no-control');
  });

  it('keeps links scoped to the filter', async () => {
    const europe = article('europe', 'portugal', 'lisbon-trams');
    const page = FakePage.fromRenders([[A1, europe]]);

    const result = await loadAllArticleLinks(page, { ...fast, taxonomyFilter: 'africa' });

    expect(result.urls).toEqual([A1]);
  });

  it('finds a region whose name carries a dot', async () => {
    const pitons = article('st.lucia', 'castries', 'pitons');
    const page = FakePage.fromRenders([[pitons, A1]]);

    const result = await loadAllArticleLinks(page, { ...fast, taxonomyFilter: ' St.Lucia ' });

    expect(result.urls).toEqual([pitons]);
  });

  it('falls back to the fixed settle wait for a non-positive poll interval', async () => {
    const page = new FakePage({
      render: () => [A1],
      controlAvailable: (clicks) => clicks < 1,
    });

    const result = await loadAllArticleLinks(page, { ...fast, pollIntervalMs: -100 });

    expect(page.waits).toEqual([500, 2000]);
    expect(result.stopReason).toBe('no-new-content');
    expect(result.extractions).toBe(2);
  });
});

describe('revealMore', () => {
  it('falls through failing and missing selectors to a class heuristic', async () => {
    const page = FakePage.fromRenders([[A1], [A1, A2]], {
      controlSelector: '[class*="load-more"]',
      failingSelectors: ['button:has-text("See more")'],
    });

    const clicked = await revealMore(page, undefined, { preClickDelayMs: 0 });

    expect(clicked).toBe('[class*="load-more"]');
    expect(page.selectorsTried).toEqual([...REVEAL_SELECTORS]);
    expect(page.clicks).toBe(1);
  });

  it('uses the scripted scan as a last resort', async () => {
    const page = FakePage.fromRenders([[A1], [A1, A2]], { controlSelector: null });

    expect(await revealMore(page, undefined, { preClickDelayMs: 0 })).toBe('scripted-button-scan');
    expect(page.clicks).toBe(1);
  });

  it('does not click a hidden control', async () => {
    const page = FakePage.fromRenders([[A1], [A1, A2]], { controlVisible: false });

    expect(await revealMore(page, undefined, { preClickDelayMs: 0 })).toBeNull();
    expect(page.clicks).toBe(0);
  });
});
