import { Layer } from 'effect';
import {
  SiteInfoConfig,
  type SiteInfoConfigOptions,
} from './lib/Config/SiteInfoConfig.service.js';
import { SiteInfoLoggerLive } from './lib/Logging/SiteInfoLogger.service.js';
import { SiteInfoClient } from './lib/SiteInfoClient/SiteInfoClient.service.js';
import { SiteInfoParser } from './lib/SiteInfoParser/SiteInfoParser.service.js';
import { HttpTransportLive } from './lib/Transport/HttpTransport.js';

// Data model
export * from './lib/SiteInfo/SiteInfo.js';

// Selector table
export type { SelectorTable, SelectorField } from './lib/Selectors/Selectors.js';
export {
  SITE_INFO_SELECTORS,
  withSelectorOverrides,
} from './lib/Selectors/Selectors.js';

// Document access and extractors
export type { Queryable } from './lib/Document/Document.js';
export {
  decodeDocument,
  loadDocument,
  readDocument,
} from './lib/Document/Document.js';
export {
  parseGroupedInteger,
  extractText,
  extractUnsignedInt,
  cellText,
} from './lib/Extractor/FieldExtractors.js';
export {
  extractRows,
  extractVisitors,
  extractKeywords,
  extractUpstreams,
  extractLinksFrom,
  extractRelated,
  extractCategories,
  extractSubdomains,
} from './lib/Extractor/TableExtractors.js';

// Services
export type { ParseOutcome } from './lib/SiteInfoParser/SiteInfoParser.service.js';
export { SiteInfoParser } from './lib/SiteInfoParser/SiteInfoParser.service.js';
export { SiteInfoClient } from './lib/SiteInfoClient/SiteInfoClient.service.js';
export type {
  HttpResponse,
  HttpTransportService,
} from './lib/Transport/HttpTransport.js';
export {
  HttpTransport,
  HttpTransportLive,
  makeFetchTransport,
} from './lib/Transport/HttpTransport.js';

// Configuration
export type {
  ExtractionMode,
  SiteInfoConfigOptions,
  SiteInfoConfigService,
} from './lib/Config/SiteInfoConfig.service.js';
export {
  SiteInfoConfig,
  DEFAULT_SITE_INFO_OPTIONS,
  makeSiteInfoConfig,
  validateSiteInfoConfig,
} from './lib/Config/SiteInfoConfig.service.js';

// Logging
export type {
  SiteInfoLogEvent,
  SiteInfoLogger,
} from './lib/Logging/SiteInfoLogger.service.js';
export {
  SiteInfoLogger as SiteInfoLoggerTag,
  makeSiteInfoLogger,
  SiteInfoLoggerLive,
} from './lib/Logging/SiteInfoLogger.service.js';

// Errors
export {
  InsufficientDataError,
  FieldNotFoundError,
  MalformedNumberError,
  TableAbsentError,
  TransportError,
  DocumentParseError,
  FileReadError,
  ConfigurationError,
} from './lib/errors.js';
export type {
  FieldExtractionError,
  DocumentError,
  SiteInfoError,
} from './lib/errors.js';

/**
 * Parser wired with configuration and the console logger.
 */
export const makeSiteInfoParserLayer = (
  options: Partial<SiteInfoConfigOptions> = {}
) =>
  SiteInfoParser.Default.pipe(
    Layer.provideMerge(
      Layer.mergeAll(SiteInfoConfig.Live(options), SiteInfoLoggerLive)
    )
  );

/**
 * Client, parser and fetch transport wired together.
 *
 * @example
 * ```typescript
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(makeSiteInfoClientLayer({ requestTimeoutMs: 10_000 })))
 * );
 * ```
 */
export const makeSiteInfoClientLayer = (
  options: Partial<SiteInfoConfigOptions> = {}
) => {
  const base = Layer.mergeAll(SiteInfoConfig.Live(options), SiteInfoLoggerLive);
  return SiteInfoClient.Default.pipe(
    Layer.provideMerge(SiteInfoParser.Default),
    Layer.provideMerge(HttpTransportLive),
    Layer.provideMerge(base)
  );
};
