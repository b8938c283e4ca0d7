/**
 * Page automation capability
 *
 * The narrow surface the crawler and scraper need from a browser page.
 * PlaywrightPageDriver backs it with a live Playwright page; tests use an
 * in-process fake.
 */

import type { Page } from 'playwright';
import { logger } from '../utils/logger.js';

export type WaitStrategy = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigateOptions {
  waitUntil?: WaitStrategy;
  timeout?: number;
}

/**
 * A single located element that can be revealed and clicked
 */
export interface ControlHandle {
  isVisible(): Promise<boolean>;
  scrollIntoView(): Promise<void>;
  click(): Promise<void>;
}

export interface PageDriver {
  navigate(url: string, options?: NavigateOptions): Promise<void>;
  currentUrl(): string;
  /** Absolute hrefs of every anchor matching the selector, in document order */
  collectHrefs(selector: string): Promise<string[]>;
  /** First element matching the selector, or null when nothing matches */
  locate(selector: string): Promise<ControlHandle | null>;
  /** Clicks the first visible button whose text contains one of the phrases */
  clickButtonWithText(phrases: readonly string[]): Promise<boolean>;
  waitFixed(ms: number): Promise<void>;
  waitForSelector(selector: string, timeout: number): Promise<void>;
  scrollToFraction(fraction: number): Promise<void>;
  evaluate<R>(pageFunction: () => R): Promise<R>;
  renderedHtml(): Promise<string>;
  close(): Promise<void>;
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async navigate(url: string, options: NavigateOptions = {}): Promise<void> {
    const waitUntil = options.waitUntil ?? 'domcontentloaded';

    logger.debug({ url, waitUntil }, 'Navigating to URL');

    try {
      await this.page.goto(url, { waitUntil, timeout: options.timeout });
      logger.debug({ url }, 'Navigation successful');
    } catch (error) {
      logger.error({ url, error }, 'Navigation failed');
      throw error;
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async collectHrefs(selector: string): Promise<string[]> {
    return this.page.$$eval(selector, (elements: Element[]): string[] =>
      elements.flatMap((el) => (el instanceof HTMLAnchorElement && el.href ? [el.href] : []))
    );
  }

  async locate(selector: string): Promise<ControlHandle | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }

    return {
      isVisible: () => locator.isVisible(),
      scrollIntoView: () => locator.scrollIntoViewIfNeeded(),
      click: () => locator.click(),
    };
  }

  async clickButtonWithText(phrases: readonly string[]): Promise<boolean> {
    return this.page.evaluate((needles: string[]): boolean => {
      const buttons = Array.from(document.querySelectorAll('button'));
      const match = buttons.find((button) => {
        const text = (button.textContent ?? '').toLowerCase();
        return needles.some((needle) => text.includes(needle)) && button.offsetParent !== null;
      });

      if (!match) {
        return false;
      }

      match.click();
      return true;
    }, [...phrases]);
  }

  async waitFixed(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async waitForSelector(selector: string, timeout: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout });
  }

  async scrollToFraction(fraction: number): Promise<void> {
    await this.page.evaluate((f: number) => {
      window.scrollTo(0, document.body.scrollHeight * f);
    }, fraction);
  }

  async evaluate<R>(pageFunction: () => R): Promise<R> {
    return this.page.evaluate(pageFunction);
  }

  async renderedHtml(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    try {
      await this.page.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing page');
    }
  }
}
