import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { logger } from '../utils/logger.js';
import type { Config } from '../types/index.js';
import type { RenderingSession, RenderingSessionFactory } from './rendering-session.js';

export type BrowserOptions = Pick<
  Config['browser'],
  'wsEndpoint' | 'executablePath' | 'navigationTimeoutMs'
>;

/**
 * Puppeteer-backed rendering session
 *
 * Connects to a remote browser over its DevTools WebSocket when one is configured,
 * otherwise launches the local Chrome binary headless. One tab per session.
 */
export class PuppeteerSession implements RenderingSession {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number
  ) {}

  static async open(options: BrowserOptions): Promise<PuppeteerSession> {
    let browser: Browser;

    if (options.wsEndpoint) {
      logger.info('Connecting to remote browser');
      browser = await puppeteer.connect({ browserWSEndpoint: options.wsEndpoint });
    } else if (options.executablePath) {
      logger.info('Launching local browser', { executablePath: options.executablePath });
      browser = await puppeteer.launch({
        executablePath: options.executablePath,
        headless: true,
        args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
      });
    } else {
      throw new Error('No browser configured: set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH');
    }

    try {
      const page = await browser.newPage();
      await page.setViewport({ width: 1920, height: 1080 });
      return new PuppeteerSession(browser, page, options.navigationTimeoutMs);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async navigate(url: string): Promise<void> {
    logger.debug('Navigating', { url });
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.navigationTimeoutMs,
    });
  }

  currentMarkup(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    try {
      await this.page.close();
    } finally {
      await this.browser.close();
      logger.debug('Browser session closed');
    }
  }
}

export function createPuppeteerSessionFactory(options: BrowserOptions): RenderingSessionFactory {
  return () => PuppeteerSession.open(options);
}
