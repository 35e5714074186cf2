import { LinkFrontier } from '../crawler/link-frontier.js';
import { RelevanceSelector } from '../crawler/relevance-selector.js';
import { siteHost } from '../crawler/url-patterns.js';
import { BrandAssociator } from '../extraction/brand-associator.js';
import { titleCase } from '../extraction/brand-probes.js';
import { ProductExtractor } from '../extraction/product-extractor.js';
import { StructureClassifier } from '../extraction/structure-classifier.js';
import { GeminiOracle } from '../oracle/gemini-client.js';
import { normalize, RecordAggregator } from '../output/normalizer.js';
import { resolveOutputPath, type OutputFilenameOptions } from '../output/output-filename.js';
import { writeLineSheet } from '../output/spreadsheet-export.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import { PageFetcher } from './page-fetcher.js';
import { createPuppeteerSessionFactory } from './puppeteer-client.js';
import { withRenderingSession, type RenderingSessionFactory } from './rendering-session.js';
import type {
  Config,
  Oracle,
  ProductSpaceRecord,
  ScrapeError,
  ScrapeOptions,
  ScrapeRunResult,
  ScrapeStage,
} from '../types/index.js';

export interface LineSheetOrchestratorDeps {
  sessionFactory: RenderingSessionFactory;
  oracle: Oracle;
  settleDelayMs: number;
  outputDirectory: string;
  maxDepth: number;
  maxLinksPerPage: number;
  /** Clock for output file timestamps */
  now?: () => Date;
}

interface SiteResult {
  pagesScraped: number;
  /** Normalized rows produced, before run-wide deduplication */
  recordsFound: number;
}

/** Per-site page processing, bound to that site's rendering session */
interface PageSteps {
  fetcher: PageFetcher;
  classifier: StructureClassifier;
  associator: BrandAssociator;
}

/**
 * Derive a firm name from a site's host
 * e.g. https://www.acme-rep.com/ -> "Acme Rep"
 */
export function deriveFirmNameFromUrl(rootUrl: string): string {
  const host = siteHost(rootUrl);
  if (!host) return rootUrl;
  return titleCase(host.replace(/\.com|\.org/g, '').replace(/-/g, ' '));
}

/**
 * Line sheet orchestrator
 *
 * Per root URL: crawl, select relevant pages, then classify, extract, associate
 * and normalize each selected page, strictly one page at a time on one rendering
 * session. Page and site failures are recorded and the run carries on; the run
 * always ends with an export, header-only when nothing was found.
 */
export class LineSheetOrchestrator {
  private readonly selector: RelevanceSelector;
  private readonly extractor: ProductExtractor;

  constructor(private readonly deps: LineSheetOrchestratorDeps) {
    this.selector = new RelevanceSelector(deps.oracle);
    this.extractor = new ProductExtractor(deps.oracle);
  }

  /**
   * Scrape every root URL in order and write one export
   */
  async run(rootUrls: string[], options: ScrapeOptions = {}): Promise<ScrapeRunResult> {
    if (rootUrls.length === 0) {
      throw new RangeError('At least one root URL is required');
    }

    const aggregator = new RecordAggregator();
    const errors: ScrapeError[] = [];
    let sitesSucceeded = 0;
    let pagesScraped = 0;
    let lastFirmName = options.repFirmName ?? '';

    logger.info('Starting line sheet run', { sites: rootUrls.length });

    for (const [index, rootUrl] of rootUrls.entries()) {
      logger.info('Processing site', { site: index + 1, of: rootUrls.length, rootUrl });
      lastFirmName = options.repFirmName ?? deriveFirmNameFromUrl(rootUrl);

      try {
        const site = await this.scrapeRepFirm(rootUrl, aggregator, errors, options);
        pagesScraped += site.pagesScraped;
        if (site.recordsFound > 0) {
          sitesSucceeded++;
        }
      } catch (error) {
        this.recordError(errors, rootUrl, 'site', error);
      }
    }

    const records = aggregator.records();
    const filenameOptions: OutputFilenameOptions =
      rootUrls.length === 1
        ? { kind: 'single', repFirmName: lastFirmName, now: this.deps.now?.() }
        : {
            kind: 'batch',
            urlCount: rootUrls.length,
            successCount: sitesSucceeded,
            totalCount: rootUrls.length,
            now: this.deps.now?.(),
          };

    const outputPath = await writeLineSheet(
      resolveOutputPath(this.deps.outputDirectory, filenameOptions, options.outputFilename),
      records
    );

    logger.info('Line sheet run completed', {
      outputPath,
      records: records.length,
      sitesProcessed: rootUrls.length,
      sitesSucceeded,
      pagesScraped,
      errorCount: errors.length,
    });

    return {
      outputPath,
      records,
      sitesProcessed: rootUrls.length,
      sitesSucceeded,
      pagesScraped,
      errors,
    };
  }

  /**
   * Scrape one rep firm site into the aggregator
   * Session start failures propagate; failures inside a page are recorded and skipped.
   */
  async scrapeRepFirm(
    rootUrl: string,
    aggregator: RecordAggregator,
    errors: ScrapeError[],
    options: ScrapeOptions = {}
  ): Promise<SiteResult> {
    const repFirmName = options.repFirmName ?? deriveFirmNameFromUrl(rootUrl);
    const maxDepth = options.maxDepth ?? this.deps.maxDepth;
    const maxLinksPerPage = options.maxLinksPerPage ?? this.deps.maxLinksPerPage;

    return withRenderingSession(this.deps.sessionFactory, async (session) => {
      const fetcher = new PageFetcher(session, { settleDelayMs: this.deps.settleDelayMs });
      const crawl = await new LinkFrontier(fetcher).crawl(rootUrl, maxDepth, maxLinksPerPage);

      for (const failure of crawl.errors) {
        errors.push({ url: failure.url, stage: 'crawl', error: failure.error });
      }

      const result: SiteResult = { pagesScraped: 0, recordsFound: 0 };

      if (crawl.links.length === 0) {
        logger.warn('No links found', { rootUrl, pagesVisited: crawl.visitedPages.length });
        return result;
      }

      const selected = await this.selector.select(crawl.links, crawl.rootUrl, repFirmName);
      const pageSteps: PageSteps = {
        fetcher,
        classifier: new StructureClassifier(this.deps.oracle, fetcher),
        associator: new BrandAssociator(this.deps.oracle, fetcher),
      };

      for (const url of selected) {
        try {
          const records = normalize(await this.scrapePage(pageSteps, url, repFirmName));
          aggregator.add(records);
          result.recordsFound += records.length;
          result.pagesScraped++;
        } catch (error) {
          this.recordError(errors, url, 'page', error);
        }
      }

      logger.info('Site scraped', {
        rootUrl,
        repFirmName,
        linksFound: crawl.links.length,
        pagesSelected: selected.length,
        pagesScraped: result.pagesScraped,
        recordsFound: result.recordsFound,
      });

      return result;
    });
  }

  private async scrapePage(
    { fetcher, classifier, associator }: PageSteps,
    url: string,
    repFirmName: string
  ): Promise<ProductSpaceRecord[]> {
    const page = await fetcher.fetch(url);
    const profile = await classifier.classifyPage(page);
    const drafts = await this.extractor.extract(page.plainText, repFirmName);

    if (profile.structureType === 'TEXT_ONLY') {
      return drafts.map((draft) => ({ ...draft }));
    }

    return associator.associatePage(page, drafts, repFirmName);
  }

  private recordError(errors: ScrapeError[], url: string, stage: ScrapeStage, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Scrape step failed', { url, stage, error: message });
    errors.push({ url, stage, error: message });
    captureError(error, { url, stage });
  }
}

/**
 * Orchestrator wired to Gemini and Puppeteer from configuration
 */
export function createLineSheetOrchestrator(config: Config): LineSheetOrchestrator {
  return new LineSheetOrchestrator({
    sessionFactory: createPuppeteerSessionFactory(config.browser),
    oracle: new GeminiOracle({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      minIntervalMs: config.gemini.minIntervalMs,
    }),
    settleDelayMs: config.browser.settleDelayMs,
    outputDirectory: config.output.directory,
    maxDepth: config.crawl.maxDepth,
    maxLinksPerPage: config.crawl.maxLinksPerPage,
  });
}
