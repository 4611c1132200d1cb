import { Effect } from 'effect';
import { SiteInfoConfig } from '../Config/SiteInfoConfig.service.js';
import {
  type DocumentError,
  type FieldExtractionError,
  TransportError,
} from '../errors.js';
import { SiteInfoLogger } from '../Logging/SiteInfoLogger.service.js';
import {
  type ParseOutcome,
  SiteInfoParser,
} from '../SiteInfoParser/SiteInfoParser.service.js';
import type { SiteInfo } from '../SiteInfo/SiteInfo.js';
import { HttpTransport } from '../Transport/HttpTransport.js';

/**
 * Fetches a domain's site-info page through the {@link HttpTransport} and
 * hands the body to the {@link SiteInfoParser}.
 *
 * A status outside 200-299 fails with a `TransportError` before any parsing.
 * Nothing is retried.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const client = yield* SiteInfoClient;
 *   const site = yield* client.siteInfo('example.com');
 *   console.log(`Global rank: ${site.globalRank}`);
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class SiteInfoClient extends Effect.Service<SiteInfoClient>()(
  'site-info/SiteInfoClient',
  {
    effect: Effect.gen(function* () {
      const config = yield* SiteInfoConfig;
      const logger = yield* SiteInfoLogger;
      const transport = yield* HttpTransport;
      const parser = yield* SiteInfoParser;

      const fetchPage = (
        domain: string
      ): Effect.Effect<Uint8Array, TransportError> =>
        Effect.gen(function* () {
          const url = yield* config.getSiteInfoUrl(domain);
          const startMs = yield* Effect.sync(() => Date.now());
          yield* logger.logFetchStart(domain, url);

          const response = yield* transport
            .get(url)
            .pipe(
              Effect.tapError((error) =>
                logger.logFetchFailed(domain, url, error.message)
              )
            );

          const durationMs = (yield* Effect.sync(() => Date.now())) - startMs;
          yield* logger.logFetchComplete(domain, url, response.status, durationMs);

          if (response.status < 200 || response.status > 299) {
            const error = TransportError.fromStatus(url, response.status);
            yield* logger.logFetchFailed(domain, url, error.message);
            return yield* Effect.fail(error);
          }

          return response.body;
        });

      return {
        /** The site-info page URL for a domain */
        siteInfoUrl: (domain: string): Effect.Effect<string> =>
          config.getSiteInfoUrl(domain),

        /** Fetches and fully parses a domain's statistics */
        siteInfo: (
          domain: string
        ): Effect.Effect<
          SiteInfo,
          TransportError | DocumentError | FieldExtractionError
        > => Effect.flatMap(fetchPage(domain), parser.parse),

        /** Fetches and parses as much as the page allows */
        siteInfoPartial: (
          domain: string
        ): Effect.Effect<ParseOutcome, TransportError | DocumentError> =>
          Effect.flatMap(fetchPage(domain), parser.parsePartial),
      };
    }),
  }
) {}
