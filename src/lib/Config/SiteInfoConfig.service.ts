import { Effect, Layer } from 'effect';
import * as cheerio from 'cheerio';
import { ConfigurationError } from '../errors.js';
import {
  isSelectorField,
  type SelectorTable,
  withSelectorOverrides,
} from '../Selectors/Selectors.js';

/**
 * How the parser reacts to a field that cannot be extracted.
 *
 * - `fail-fast`: stop at the first failing stage; later fields stay empty.
 * - `collect-all`: run every stage and report each failure.
 *
 * @group Configuration
 * @public
 */
export type ExtractionMode = 'fail-fast' | 'collect-all';

/**
 * Configuration options for fetching and parsing site-info pages.
 *
 * @group Configuration
 * @public
 */
export interface SiteInfoConfigOptions {
  /**
   * Page location, with `{domain}` standing for the domain looked up
   * (default: 'https://www.alexa.com/siteinfo/{domain}')
   */
  readonly urlTemplate: string;
  /** User agent string to send with requests (default: 'SiteInfoParser/1.0') */
  readonly userAgent: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly requestTimeoutMs: number;
  /** Extra request headers (default: none) */
  readonly headers: Readonly<Record<string, string>>;
  /** Behaviour on field failures (default: 'fail-fast') */
  readonly extractionMode: ExtractionMode;
  /**
   * Replacement selectors for fields whose markup has moved.
   *
   * @example
   * ```typescript
   * selectorOverrides: { title: 'div.summary p.title' }
   * ```
   */
  readonly selectorOverrides?: Partial<SelectorTable>;
}

/**
 * Service interface for accessing site-info configuration.
 *
 * @group Configuration
 * @public
 */
export interface SiteInfoConfigService {
  /** Get the complete configuration options */
  getOptions: () => Effect.Effect<SiteInfoConfigOptions>;
  /** Get the selector table with overrides applied */
  getSelectors: () => Effect.Effect<SelectorTable>;
  /** Get the site-info page URL for a domain */
  getSiteInfoUrl: (domain: string) => Effect.Effect<string>;
  /** Get the configured user agent string */
  getUserAgent: () => Effect.Effect<string>;
  /** Get the request timeout in milliseconds */
  getRequestTimeout: () => Effect.Effect<number>;
  /** Get extra request headers */
  getHeaders: () => Effect.Effect<Readonly<Record<string, string>>>;
  /** Get the extraction mode */
  getExtractionMode: () => Effect.Effect<ExtractionMode>;
}

const DOMAIN_PLACEHOLDER = '{domain}';

export const DEFAULT_SITE_INFO_OPTIONS: SiteInfoConfigOptions = Object.freeze({
  urlTemplate: `https://www.alexa.com/siteinfo/${DOMAIN_PLACEHOLDER}`,
  userAgent: 'SiteInfoParser/1.0',
  requestTimeoutMs: 30_000,
  headers: {},
  extractionMode: 'fail-fast',
});

/**
 * The main SiteInfoConfig service for dependency injection.
 *
 * Provides default configuration that can be overridden using layers.
 *
 * @example
 * ```typescript
 * await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(SiteInfoConfig.Live({ extractionMode: 'collect-all' }))
 *   )
 * );
 * ```
 *
 * @group Configuration
 * @public
 */
export class SiteInfoConfig extends Effect.Service<SiteInfoConfigService>()(
  'site-info/SiteInfoConfig',
  {
    effect: Effect.sync(() => makeSiteInfoConfig({})),
  }
) {
  /**
   * Creates a Layer that provides SiteInfoConfig with custom options.
   * Options are validated; invalid ones fail the layer with a ConfigurationError.
   */
  static Live = (
    config: Partial<SiteInfoConfigOptions> | SiteInfoConfigService
  ) =>
    Layer.effect(SiteInfoConfig, resolveSiteInfoConfig(config));
}

const resolveSiteInfoConfig = (
  config: Partial<SiteInfoConfigOptions> | SiteInfoConfigService
): Effect.Effect<SiteInfoConfigService, ConfigurationError> =>
  'getOptions' in config
    ? Effect.succeed(config)
    : Effect.map(validateSiteInfoConfig(config), (options) =>
        makeSiteInfoConfig(options)
      );

/**
 * Checks options that cannot be caught by the type system.
 */
export const validateSiteInfoConfig = (
  options: Partial<SiteInfoConfigOptions>
): Effect.Effect<Partial<SiteInfoConfigOptions>, ConfigurationError> =>
  Effect.gen(function* () {
    if (
      options.urlTemplate !== undefined &&
      !options.urlTemplate.includes(DOMAIN_PLACEHOLDER)
    ) {
      return yield* Effect.fail(
        new ConfigurationError({
          message: `urlTemplate must contain ${DOMAIN_PLACEHOLDER}`,
          details: { urlTemplate: options.urlTemplate },
        })
      );
    }

    if (
      options.requestTimeoutMs !== undefined &&
      !(Number.isFinite(options.requestTimeoutMs) && options.requestTimeoutMs > 0)
    ) {
      return yield* Effect.fail(
        new ConfigurationError({
          message: 'requestTimeoutMs must be a positive number',
          details: { requestTimeoutMs: options.requestTimeoutMs },
        })
      );
    }

    const overrides = Object.entries(options.selectorOverrides ?? {});

    const unknown = overrides
      .map(([field]) => field)
      .filter((field) => !isSelectorField(field));
    if (unknown.length > 0) {
      return yield* Effect.fail(
        new ConfigurationError({
          message: `Unknown selector override for: ${unknown.join(', ')}`,
          details: { fields: unknown },
        })
      );
    }

    const blank = overrides
      .filter(([, selector]) => selector !== undefined && selector.trim() === '')
      .map(([field]) => field);
    if (blank.length > 0) {
      return yield* Effect.fail(
        new ConfigurationError({
          message: `Empty selector override for: ${blank.join(', ')}`,
          details: { fields: blank },
        })
      );
    }

    for (const [field, selector] of overrides) {
      if (selector !== undefined) {
        yield* compileSelector(field, selector);
      }
    }

    return options;
  });

const compileSelector = (
  field: string,
  selector: string
): Effect.Effect<void, ConfigurationError> =>
  Effect.try({
    // Compiling against an empty tree is enough to surface syntax errors
    try: () => {
      cheerio.load('').root().find(selector);
    },
    catch: (cause) =>
      new ConfigurationError({
        message: `Invalid selector override for ${field}: '${selector}'`,
        details: { field, selector, cause: String(cause) },
      }),
  });

/**
 * Creates a SiteInfoConfigService implementation with custom options.
 * Options are merged with defaults and the selector table is fixed here.
 *
 * @group Configuration
 * @public
 */
export const makeSiteInfoConfig = (
  options: Partial<SiteInfoConfigOptions> = {}
): SiteInfoConfigService => {
  const config: SiteInfoConfigOptions = {
    ...DEFAULT_SITE_INFO_OPTIONS,
    ...options,
    headers: { ...DEFAULT_SITE_INFO_OPTIONS.headers, ...options.headers },
  };
  const selectors = withSelectorOverrides(config.selectorOverrides);

  return {
    getOptions: () => Effect.succeed(config),
    getSelectors: () => Effect.succeed(selectors),
    getSiteInfoUrl: (domain: string) =>
      Effect.succeed(
        config.urlTemplate.replace(
          DOMAIN_PLACEHOLDER,
          encodeURIComponent(domain.trim())
        )
      ),
    getUserAgent: () => Effect.succeed(config.userAgent),
    getRequestTimeout: () => Effect.succeed(config.requestTimeoutMs),
    getHeaders: () => Effect.succeed(config.headers),
    getExtractionMode: () => Effect.succeed(config.extractionMode),
  };
};
