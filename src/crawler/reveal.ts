/**
 * Reveal strategies
 *
 * Ordered probes for the "See more" control. Each probe either clicks
 * something and returns true or returns false; errors inside a probe are
 * caught and the next probe is tried. New site variants go at the end of
 * REVEAL_SELECTORS.
 */

import { REVEAL_PHRASES } from '../config/taxonomy.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { PageDriver } from '../scraper/page-driver.js';

export interface RevealStrategy {
  name: string;
  attempt(page: PageDriver, options: RevealOptions): Promise<boolean>;
}

export interface RevealOptions {
  preClickDelayMs: number;
}

/**
 * Text matches first, then class-name heuristics
 */
export const REVEAL_SELECTORS: readonly string[] = [
  'button:has-text("See more")',
  'button:has-text("see more")',
  'button[class*="see-more"]',
  '[class*="see-more"]',
  'button:has-text("Load more")',
  'button:has-text("Show more")',
  'a:has-text("See more")',
  '[class*="load-more"]',
];

export function selectorStrategy(selector: string): RevealStrategy {
  return {
    name: selector,
    async attempt(page, options) {
      const control = await page.locate(selector);
      if (!control || !(await control.isVisible())) {
        return false;
      }

      await control.scrollIntoView();
      await page.waitFixed(options.preClickDelayMs);
      await control.click();
      return true;
    },
  };
}

/**
 * Last resort: scan every button's visible text in the page
 */
export const scriptedScanStrategy: RevealStrategy = {
  name: 'scripted-button-scan',
  attempt: (page) => page.clickButtonWithText(REVEAL_PHRASES),
};

export const DEFAULT_REVEAL_STRATEGIES: readonly RevealStrategy[] = [
  ...REVEAL_SELECTORS.map(selectorStrategy),
  scriptedScanStrategy,
];

/**
 * Try each strategy in order and stop at the first click.
 * Returns the name of the strategy that clicked, or null.
 */
export async function revealMore(
  page: PageDriver,
  strategies: readonly RevealStrategy[] = DEFAULT_REVEAL_STRATEGIES,
  options: RevealOptions = { preClickDelayMs: config.scraper.preClickDelayMs }
): Promise<string | null> {
  for (const strategy of strategies) {
    try {
      if (await strategy.attempt(page, options)) {
        logger.debug({ strategy: strategy.name }, 'Clicked reveal control');
        return strategy.name;
      }
    } catch (error) {
      logger.debug({ strategy: strategy.name, error: errorMessage(error) }, 'Reveal strategy failed');
    }
  }

  return null;
}
