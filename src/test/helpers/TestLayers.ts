/**
 * Test layers and fixture access shared by the unit tests
 */

import { Effect, Layer } from 'effect';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import {
  SiteInfoConfig,
  type SiteInfoConfigOptions,
} from '../../lib/Config/SiteInfoConfig.service.js';
import {
  type SiteInfoLogEvent,
  SiteInfoLogger,
} from '../../lib/Logging/SiteInfoLogger.service.js';
import { SiteInfoParser } from '../../lib/SiteInfoParser/SiteInfoParser.service.js';

export const silentLoggerLayer = Layer.succeed(SiteInfoLogger, {
  logEvent: () => Effect.void,
  logParseStart: () => Effect.void,
  logStageComplete: () => Effect.void,
  logStageFailed: () => Effect.void,
  logNoData: () => Effect.void,
  logParseComplete: () => Effect.void,
  logFetchStart: () => Effect.void,
  logFetchComplete: () => Effect.void,
  logFetchFailed: () => Effect.void,
} satisfies SiteInfoLogger);

/**
 * A logger layer that keeps every event in memory, without timestamps.
 */
export const makeRecordingLogger = () => {
  const events: Array<Omit<SiteInfoLogEvent, 'timestamp'>> = [];
  const record = (event: Omit<SiteInfoLogEvent, 'timestamp'>) =>
    Effect.sync(() => {
      events.push(event);
    });

  const layer = Layer.succeed(SiteInfoLogger, {
    logEvent: record,
    logParseStart: (size) =>
      record({ type: 'parse_start', message: 'parse', details: { size } }),
    logStageComplete: (field) =>
      record({ type: 'stage_complete', field, message: field }),
    logStageFailed: (field, errorTag, message) =>
      record({ type: 'stage_failed', field, message, details: { errorTag } }),
    logNoData: () => record({ type: 'no_data', message: 'no data' }),
    logParseComplete: (failedStages) =>
      record({
        type: 'parse_complete',
        message: 'done',
        details: { failedStages },
      }),
    logFetchStart: (domain, url) =>
      record({ type: 'fetch_start', domain, url, message: 'fetch' }),
    logFetchComplete: (domain, url, statusCode) =>
      record({
        type: 'fetch_complete',
        domain,
        url,
        message: 'fetched',
        details: { statusCode },
      }),
    logFetchFailed: (domain, url, message) =>
      record({ type: 'fetch_failed', domain, url, message }),
  } satisfies SiteInfoLogger);

  return { events, layer };
};

/**
 * SiteInfoParser with the given configuration and a silent logger.
 */
export const parserLayer = (
  options: Partial<SiteInfoConfigOptions> = {},
  loggerLayer: Layer.Layer<SiteInfoLogger> = silentLoggerLayer
) =>
  SiteInfoParser.Default.pipe(
    Layer.provideMerge(Layer.mergeAll(SiteInfoConfig.Live(options), loggerLayer))
  );

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

export const readFixture = (name: string): string =>
  fs.readFileSync(fixturePath(name), 'utf-8');
