import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PageFetcher, parseRenderedPage, toPlainText } from './page-fetcher.js';
import { FakeRenderingSession } from '../__fixtures__/fake-rendering-session.js';

// Mock logger to prevent console output during tests
vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const PAGE_URL = 'https://acme.com/lines';

const LOGO_PAGE = `<html><body>
<div id="linked"><a href="/brands/blue-river"><img src="/img/br.png" alt=" Blue River " width="120" height="60px"></a></div>
<section><div class="cell"><img src="logo-two.png" title="Delta Valves"><span>Delta Valves Inc</span></div><p>Clarifiers</p><p>Filters</p><p>Screens</p><p>Ignored</p></section>
<img data-src="//cdn.example.com/lazy.jpg">
<a href="  /contact  ">Contact
   us</a>
<a href="http://[bad">Broken</a>
</body></html>`;

describe('toPlainText', () => {
  it('should trim lines, split on double spaces and join with single spaces', () => {
    expect(toPlainText('  Acme Rep  \n\n   Pumps  and  valves \n')).toBe('Acme Rep Pumps and valves');
  });
});

describe('parseRenderedPage', () => {
  it('should drop script and style content from the text', () => {
    const page = parseRenderedPage(
      PAGE_URL,
      '<html><head><style>p { color: red; }</style></head><body><p>Hello</p><script>var hidden = 1;</script></body></html>'
    );

    expect(page.plainText).toBe('Hello');
  });

  it('should separate adjacent block elements in the text', () => {
    const page = parseRenderedPage(
      PAGE_URL,
      '<html><body><h2>Lines</h2><ul><li>Pumps</li><li>Valves</li></ul><p>Blowers<br>Mixers</p><span>Fil</span><span>ters</span></body></html>'
    );

    expect(page.plainText).toBe('Lines Pumps Valves Blowers Mixers Filters');
  });

  it('should keep the raw markup', () => {
    const page = parseRenderedPage(PAGE_URL, LOGO_PAGE);
    expect(page.rawMarkup).toBe(LOGO_PAGE);
  });

  it('should resolve anchors against the page URL and collapse their text', () => {
    const page = parseRenderedPage(PAGE_URL, LOGO_PAGE);

    expect(page.anchors).toEqual([
      { href: 'https://acme.com/brands/blue-river', text: '' },
      { href: 'https://acme.com/contact', text: 'Contact us' },
    ]);
  });

  it('should describe a linked logo', () => {
    const [linked] = parseRenderedPage(PAGE_URL, LOGO_PAGE).imageElements;

    expect(linked).toEqual({
      src: 'https://acme.com/img/br.png',
      altText: 'Blue River',
      titleText: '',
      width: 120,
      height: 60,
      isClickable: true,
      linkTarget: 'https://acme.com/brands/blue-river',
      contextText: '',
    });
  });

  it('should build context from the parent and its next three siblings', () => {
    const images = parseRenderedPage(PAGE_URL, LOGO_PAGE).imageElements;

    expect(images[1]).toEqual({
      src: 'https://acme.com/logo-two.png',
      altText: '',
      titleText: 'Delta Valves',
      width: null,
      height: null,
      isClickable: false,
      linkTarget: '',
      contextText: 'Delta Valves Inc Clarifiers Filters Screens',
    });
  });

  it('should fall back to data-src for lazy images', () => {
    const images = parseRenderedPage(PAGE_URL, LOGO_PAGE).imageElements;
    expect(images[2]?.src).toBe('https://cdn.example.com/lazy.jpg');
  });
});

describe('PageFetcher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should navigate the session and parse the rendered page', async () => {
    const session = new FakeRenderingSession({ [PAGE_URL]: '<html><body><p>Pumps</p></body></html>' });
    const page = await new PageFetcher(session, { settleDelayMs: 0 }).fetch(PAGE_URL);

    expect(session.navigations).toEqual([PAGE_URL]);
    expect(page.url).toBe(PAGE_URL);
    expect(page.plainText).toBe('Pumps');
  });

  it('should wait for the settle delay before reading the markup', async () => {
    vi.useFakeTimers();
    const session = new FakeRenderingSession({ [PAGE_URL]: '<html><body>Ready</body></html>' });
    const markupSpy = vi.spyOn(session, 'currentMarkup');

    const pending = new PageFetcher(session, { settleDelayMs: 3000 }).fetch(PAGE_URL);

    await vi.advanceTimersByTimeAsync(2999);
    expect(markupSpy).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    const page = await pending;
    expect(markupSpy).toHaveBeenCalledTimes(1);
    expect(page.plainText).toBe('Ready');
  });

  it('should propagate navigation failures', async () => {
    const fetcher = new PageFetcher(new FakeRenderingSession({}), { settleDelayMs: 0 });

    await expect(fetcher.fetch('https://down.example.com/')).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
  });
});
