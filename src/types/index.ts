// Crawl Types
export interface Link {
  href: string;
  displayText: string;
  /** Depth of the page the link was found on */
  depth: number;
  sourcePage: string;
}

export interface CrawlResult {
  rootUrl: string;
  links: Link[];
  /** Pages actually visited, in visit order */
  visitedPages: string[];
  errors: Array<{ url: string; error: string }>;
}

// Page Types
export interface AnchorMeta {
  href: string;
  text: string;
}

export interface ImageMeta {
  src: string;
  altText: string;
  titleText: string;
  width: number | null;
  height: number | null;
  isClickable: boolean;
  /** href of the wrapping anchor, empty when the image is not clickable */
  linkTarget: string;
  contextText: string;
}

export interface FetchedPage {
  url: string;
  plainText: string;
  imageElements: ImageMeta[];
  anchors: AnchorMeta[];
  rawMarkup: string;
}

// Extraction Types
export type StructureType = 'TEXT_ONLY' | 'TEXT_PRODUCTS_IMAGE_BRANDS' | 'MIXED';

export type ExtractionStrategy = 'TEXT_SCRAPING' | 'IMAGE_LINK_EXTRACTION' | 'OCR' | 'COMBINATION';

export interface PageStructureProfile {
  structureType: StructureType;
  extractionStrategy: ExtractionStrategy;
  hasClickableBrandImages: boolean;
  clickableBrandImageLinks: string[];
  recommendedApproach: string;
}

export interface DraftProductRecord {
  repFirmName: string;
  brandCarried: string;
  productCovered: string;
  productSpace: string;
}

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface BrandCandidate {
  brandName: string;
  imageUrl: string;
  linkUrl?: string;
  contextText: string;
  isClickable: boolean;
  extractionMethod: 'IMAGE_ANALYSIS' | 'OCR_AI';
}

export interface ProductSpaceRecord {
  repFirmName: string;
  brandCarried: string;
  productCovered: string;
  productSpace: string;
  confidence?: Confidence;
}

// Oracle Types
export interface CompletionRequest {
  systemPrompt?: string;
  userPrompt: string;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Hosted text-completion service used as a fuzzy classifier / extractor.
 * Responses are untrusted free text.
 */
export interface Oracle {
  complete(request: CompletionRequest): Promise<string>;
}

// Run Types
export type ScrapeStage = 'crawl' | 'page' | 'site';

export interface ScrapeError {
  url: string;
  stage: ScrapeStage;
  error: string;
}

export interface ScrapeOptions {
  /** Known rep firm name; derived from each root URL's host when omitted */
  repFirmName?: string;
  outputFilename?: string;
  maxDepth?: number;
  maxLinksPerPage?: number;
}

export interface ScrapeRunResult {
  outputPath: string;
  records: ProductSpaceRecord[];
  sitesProcessed: number;
  sitesSucceeded: number;
  pagesScraped: number;
  errors: ScrapeError[];
}

// Configuration
export interface Config {
  gemini: {
    apiKey: string;
    model: string;
    minIntervalMs: number;
  };
  browser: {
    wsEndpoint?: string;
    executablePath?: string;
    settleDelayMs: number;
    navigationTimeoutMs: number;
  };
  crawl: {
    maxDepth: number;
    maxLinksPerPage: number;
  };
  output: {
    directory: string;
  };
  app: {
    logLevel: LogLevel;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
