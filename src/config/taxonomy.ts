/**
 * Site taxonomy markers
 *
 * Path segments and phrases that describe how the magazine lays out its
 * content. Lowercase throughout; matching is done on lowercased paths.
 */

export const TAXONOMY = {
  /** Segment every article and region listing lives under */
  listingRoot: 'places-to-go',
  /** Sibling content branch that never counts as an article */
  alternateContentType: 'things-to-do',
  /** Article pages end with this */
  articleSuffix: '.html',
  /** Listing pages, never articles */
  indexSuffixes: ['/index.html', '/index'],
  indexPage: 'index.html',
} as const;

/**
 * Text shown on the reveal control, matched case-insensitively
 */
export const REVEAL_PHRASES = ['see more', 'load more', 'show more'] as const;

export type RevealPhrase = (typeof REVEAL_PHRASES)[number];
