import { Effect, Either } from 'effect';
import { SiteInfoConfig } from '../Config/SiteInfoConfig.service.js';
import {
  loadDocument,
  readDocument,
  type Queryable,
} from '../Document/Document.js';
import {
  type DocumentError,
  type FieldExtractionError,
  type FileReadError,
  InsufficientDataError,
} from '../errors.js';
import {
  extractText,
  extractUnsignedInt,
} from '../Extractor/FieldExtractors.js';
import {
  extractCategories,
  extractKeywords,
  extractLinksFrom,
  extractRelated,
  extractSubdomains,
  extractUpstreams,
  extractVisitors,
} from '../Extractor/TableExtractors.js';
import { SiteInfoLogger } from '../Logging/SiteInfoLogger.service.js';
import type { SelectorTable } from '../Selectors/Selectors.js';
import { emptySiteInfo, type SiteInfo } from '../SiteInfo/SiteInfo.js';

/**
 * The record as far as extraction got, and the field errors met on the way.
 *
 * In fail-fast mode `errors` holds at most one error and every field after
 * the failing one is at its zero value.
 *
 * @group SiteInfoParser
 * @public
 */
export interface ParseOutcome {
  readonly site: SiteInfo;
  readonly errors: ReadonlyArray<FieldExtractionError>;
}

type Draft = { -readonly [K in keyof SiteInfo]: SiteInfo[K] };

interface Stage {
  readonly field: keyof SiteInfo;
  readonly run: (
    doc: Queryable,
    selectors: SelectorTable,
    draft: Draft
  ) => Effect.Effect<void, FieldExtractionError>;
}

const stage = <K extends keyof SiteInfo>(
  field: K,
  extract: (
    doc: Queryable,
    selectors: SelectorTable
  ) => Effect.Effect<SiteInfo[K], FieldExtractionError>
): Stage => ({
  field,
  run: (doc, selectors, draft) =>
    Effect.map(extract(doc, selectors), (value) => {
      draft[field] = value;
    }),
});

// Extraction order; in fail-fast mode nothing after a failing stage runs
const STAGES: ReadonlyArray<Stage> = [
  stage('globalRank', (doc, s) =>
    extractUnsignedInt(doc, 'global rank', s.globalRank)
  ),
  stage('localRank', (doc, s) =>
    extractUnsignedInt(doc, 'local rank', s.localRank)
  ),
  stage('mainCountry', (doc, s) => extractText(doc, 'country', s.mainCountry)),
  stage('linkingTotal', (doc, s) =>
    extractUnsignedInt(doc, 'linking total', s.linkingTotal)
  ),
  stage('title', (doc, s) => extractText(doc, 'site title', s.title)),
  stage('description', (doc, s) =>
    extractText(doc, 'site description', s.description)
  ),
  stage('visitors', (doc, s) => extractVisitors(doc, s.visitors)),
  stage('keywords', (doc, s) => extractKeywords(doc, s.keywords)),
  stage('upstreams', (doc, s) => extractUpstreams(doc, s.upstreams)),
  stage('linksFrom', (doc, s) => extractLinksFrom(doc, s.linksFrom)),
  stage('related', (doc, s) => extractRelated(doc, s.related)),
  stage('categories', (doc, s) => extractCategories(doc, s.categories)),
  stage('subdomains', (doc, s) => extractSubdomains(doc, s.subdomains)),
];

/**
 * Turns a site-info page into a {@link SiteInfo} record.
 *
 * The document is first checked for the provider's "not enough data" marker,
 * then every field is extracted in a fixed order: ranks, country, linking
 * total, title, description, then the visitor, keyword, upstream, inbound
 * link, related site, category and subdomain tables.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const parser = yield* SiteInfoParser;
 *   const { site, errors } = yield* parser.parsePartial(html);
 *   if (errors.length > 0) {
 *     console.log(`Stopped at ${errors[0].field}; rank was ${site.globalRank}`);
 *   }
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class SiteInfoParser extends Effect.Service<SiteInfoParser>()(
  'site-info/SiteInfoParser',
  {
    effect: Effect.gen(function* () {
      const config = yield* SiteInfoConfig;
      const logger = yield* SiteInfoLogger;
      const selectors = yield* config.getSelectors();
      const mode = yield* config.getExtractionMode();

      /**
       * Extracts as much of the record as the document allows.
       *
       * Fails only for document-level problems: undecodable input
       * (`DocumentParseError`) or the no-data marker (`InsufficientDataError`).
       * Field failures are reported in the outcome next to the partial record.
       */
      const parsePartial = (
        input: string | Uint8Array
      ): Effect.Effect<ParseOutcome, DocumentError> =>
        Effect.gen(function* () {
          const startMs = yield* Effect.sync(() => Date.now());
          yield* logger.logParseStart(input.length);

          const doc = yield* loadDocument(input);

          if (doc.locate(selectors.noData).size > 0) {
            yield* logger.logNoData();
            return yield* Effect.fail(
              InsufficientDataError.create(selectors.noData)
            );
          }

          const draft: Draft = { ...emptySiteInfo };
          const errors: FieldExtractionError[] = [];
          const failedStages: Array<keyof SiteInfo> = [];

          for (const { field, run } of STAGES) {
            const result = yield* Effect.either(run(doc, selectors, draft));
            if (Either.isRight(result)) {
              yield* logger.logStageComplete(field);
              continue;
            }
            errors.push(result.left);
            failedStages.push(field);
            yield* logger.logStageFailed(
              field,
              result.left._tag,
              result.left.message
            );
            if (mode === 'fail-fast') {
              break;
            }
          }

          const durationMs = (yield* Effect.sync(() => Date.now())) - startMs;
          yield* logger.logParseComplete(failedStages, durationMs);

          return { site: Object.freeze(draft), errors: Object.freeze(errors) };
        });

      /**
       * Extracts the complete record, failing with the first error met.
       */
      const parse = (
        input: string | Uint8Array
      ): Effect.Effect<SiteInfo, DocumentError | FieldExtractionError> =>
        Effect.flatMap(parsePartial(input), ({ site, errors }) => {
          const [first] = errors;
          return first === undefined
            ? Effect.succeed(site)
            : Effect.fail(first);
        });

      /**
       * Reads a saved page from disk and parses it like {@link parse}.
       */
      const parseFile = (
        path: string
      ): Effect.Effect<
        SiteInfo,
        FileReadError | DocumentError | FieldExtractionError
      > => Effect.flatMap(readDocument(path), parse);

      return { parse, parsePartial, parseFile };
    }),
  }
) {}
