/**
 * Rep firm line sheet scraper
 * Crawls rep firm websites and exports a Rep Firm / Brand / Product / Space line sheet
 */

export * from './crawler/index.js';

export { PageFetcher, parseRenderedPage, toPlainText, type PageSource } from './scraper/page-fetcher.js';
export {
  withRenderingSession,
  type RenderingSession,
  type RenderingSessionFactory,
} from './scraper/rendering-session.js';
export { PuppeteerSession, createPuppeteerSessionFactory } from './scraper/puppeteer-client.js';
export {
  LineSheetOrchestrator,
  createLineSheetOrchestrator,
  deriveFirmNameFromUrl,
  type LineSheetOrchestratorDeps,
} from './scraper/scraper-orchestrator.js';

export { StructureClassifier, parseStructureProfile, FALLBACK_PROFILE } from './extraction/structure-classifier.js';
export { ProductExtractor, fallbackDraft } from './extraction/product-extractor.js';
export { BrandAssociator } from './extraction/brand-associator.js';
export { createBrandProbeChain, runProbeChain, type BrandProbe } from './extraction/brand-probes.js';

export { GeminiOracle, type GeminiOracleOptions } from './oracle/gemini-client.js';

export { normalize, aggregate, RecordAggregator } from './output/normalizer.js';
export { generateLineSheetCsv, writeLineSheet, LINE_SHEET_HEADERS } from './output/spreadsheet-export.js';
export { standardizedFilename, resolveOutputPath } from './output/output-filename.js';

export { loadConfig, ConfigError } from './utils/config.js';
export { CircuitBreaker, CircuitOpenError } from './utils/circuit-breaker.js';

export type * from './types/index.js';
