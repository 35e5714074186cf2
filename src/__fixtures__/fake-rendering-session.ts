import type { RenderingSession } from '../scraper/rendering-session.js';

/**
 * In-process stand-in for a browser tab: serves fixed markup per URL.
 * Navigating to a URL with no markup fails the way an unreachable page does.
 */
export class FakeRenderingSession implements RenderingSession {
  readonly navigations: string[] = [];
  closed = false;
  private current: string | null = null;

  constructor(private readonly pages: Record<string, string>) {}

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    if (!(url in this.pages)) {
      this.current = null;
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    this.current = url;
  }

  async currentMarkup(): Promise<string> {
    if (this.current === null) {
      throw new Error('No page loaded');
    }
    return this.pages[this.current] ?? '';
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
