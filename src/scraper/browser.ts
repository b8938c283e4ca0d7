/**
 * Playwright Browser Sessions
 *
 * Each session owns its own browser, context and page. Nothing is kept at
 * module level, so two sessions never share state.
 */

import { chromium } from 'playwright';
import type { Browser, BrowserContext } from 'playwright';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { PlaywrightPageDriver } from './page-driver.js';
import type { PageDriver } from './page-driver.js';

/**
 * Browser configuration options
 */
export interface BrowserOptions {
  headless?: boolean;
  timeout?: number;
}

export interface BrowserSession {
  page: PageDriver;
  close(): Promise<void>;
}

export type SessionFactory = (options?: BrowserOptions) => Promise<BrowserSession>;

// Hides the most common automation fingerprints
const STEALTH_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
  window.chrome = { runtime: {} };
`;

async function createContext(browser: Browser, timeout: number): Promise<BrowserContext> {
  const context = await browser.newContext({
    userAgent: config.browser.userAgent,
    viewport: config.browser.viewport,
    locale: config.browser.locale,
    javaScriptEnabled: true,
    hasTouch: false,
    isMobile: false,
    deviceScaleFactor: 1,
    extraHTTPHeaders: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      DNT: '1',
      'Upgrade-Insecure-Requests': '1',
      'Sec-Fetch-Dest': 'document',
      'Sec-Fetch-Mode': 'navigate',
      'Sec-Fetch-Site': 'none',
      'Sec-Fetch-User': '?1',
      'Cache-Control': 'max-age=0',
    },
  });

  await context.addInitScript(STEALTH_SCRIPT);
  context.setDefaultTimeout(timeout);

  return context;
}

/**
 * Launch a browser and open one page on it
 */
export async function openBrowserSession(options: BrowserOptions = {}): Promise<BrowserSession> {
  const headless = options.headless ?? config.browser.headless;
  const timeout = options.timeout ?? config.scraper.navigationTimeoutMs;

  logger.info({ headless }, 'Launching browser');

  const browser = await chromium.launch({
    headless,
    // Required for Docker/containerized environments
    args: [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      '--disable-blink-features=AutomationControlled',
    ],
  });

  try {
    const context = await createContext(browser, timeout);
    const page = await context.newPage();

    // Block unnecessary resource types for faster loading
    await page.route('**/*', (route) => {
      const resourceType = route.request().resourceType();
      const blockedTypes = ['media', 'font'];

      if (blockedTypes.includes(resourceType)) {
        return route.abort();
      }
      return route.continue();
    });

    const driver = new PlaywrightPageDriver(page);
    logger.debug('Browser session ready');

    return {
      page: driver,
      close: async () => {
        await driver.close();
        await closeContext(context);
        await closeBrowser(browser);
      },
    };
  } catch (error) {
    await closeBrowser(browser);
    throw error;
  }
}

/**
 * Run fn against a fresh session; the session is closed on every exit path
 */
export async function withBrowserSession<T>(
  options: BrowserOptions,
  fn: (page: PageDriver) => Promise<T>,
  openSession: SessionFactory = openBrowserSession
): Promise<T> {
  const session = await openSession(options);
  try {
    return await fn(session.page);
  } finally {
    await session.close();
  }
}

async function closeContext(context: BrowserContext): Promise<void> {
  try {
    await context.close();
  } catch (error) {
    logger.warn({ error }, 'Error closing context');
  }
}

async function closeBrowser(browser: Browser): Promise<void> {
  try {
    await browser.close();
    logger.info('Browser closed');
  } catch (error) {
    logger.warn({ error }, 'Error closing browser');
  }
}

export type { PageDriver };
