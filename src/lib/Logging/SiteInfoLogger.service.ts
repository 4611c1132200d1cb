import { Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export interface SiteInfoLogEvent {
  timestamp: string;
  type:
    | 'parse_start'
    | 'stage_complete'
    | 'stage_failed'
    | 'no_data'
    | 'parse_complete'
    | 'fetch_start'
    | 'fetch_complete'
    | 'fetch_failed';
  domain?: string;
  url?: string;
  field?: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface SiteInfoLogger {
  readonly logEvent: (
    event: Omit<SiteInfoLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logParseStart: (size: number) => Effect.Effect<void>;
  readonly logStageComplete: (field: string) => Effect.Effect<void>;
  readonly logStageFailed: (
    field: string,
    errorTag: string,
    message: string
  ) => Effect.Effect<void>;
  readonly logNoData: () => Effect.Effect<void>;
  readonly logParseComplete: (
    failedStages: ReadonlyArray<string>,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logFetchStart: (domain: string, url: string) => Effect.Effect<void>;
  readonly logFetchComplete: (
    domain: string,
    url: string,
    statusCode: number,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logFetchFailed: (
    domain: string,
    url: string,
    message: string
  ) => Effect.Effect<void>;
}

export const SiteInfoLogger =
  Context.GenericTag<SiteInfoLogger>('SiteInfoLogger');

// Echoed to the console; everything else only reaches the log file
const CONSOLE_TYPES: ReadonlyArray<SiteInfoLogEvent['type']> = [
  'stage_failed',
  'no_data',
  'parse_complete',
  'fetch_failed',
];

/**
 * Creates a logger that prints notable events to the console and, when
 * `logDir` is given, appends every event as a JSON line to a file in it.
 */
export const makeSiteInfoLogger = (logDir?: string): SiteInfoLogger => {
  let logFilePath: string | undefined;
  if (logDir !== undefined) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const logFileName = `site-info-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
    logFilePath = path.join(logDir, logFileName);
  }

  const writeLogEvent = (event: SiteInfoLogEvent) =>
    Effect.gen(function* () {
      if (logFilePath !== undefined) {
        const target = logFilePath;
        yield* Effect.sync(() =>
          fs.appendFileSync(target, JSON.stringify(event) + '\n')
        );
      }

      if (CONSOLE_TYPES.includes(event.type)) {
        const prefix = `[${event.type}]`;
        const domainInfo = event.domain ? ` [${event.domain}]` : '';
        yield* Console.log(`${prefix}${domainInfo} ${event.message}`);
      }
    });

  const write = (event: Omit<SiteInfoLogEvent, 'timestamp'>) =>
    writeLogEvent({ ...event, timestamp: new Date().toISOString() });

  return {
    logEvent: write,

    logParseStart: (size) =>
      write({
        type: 'parse_start',
        message: `Parsing document (size ${size})`,
        details: { size },
      }),

    logStageComplete: (field) =>
      write({
        type: 'stage_complete',
        field,
        message: `Extracted ${field}`,
      }),

    logStageFailed: (field, errorTag, message) =>
      write({
        type: 'stage_failed',
        field,
        message: `[${errorTag}] ${field}: ${message}`,
        details: { errorTag },
      }),

    logNoData: () =>
      write({
        type: 'no_data',
        message: 'Page reports not enough data for this domain',
      }),

    logParseComplete: (failedStages, durationMs) =>
      write({
        type: 'parse_complete',
        message:
          failedStages.length === 0
            ? `Parsed all fields in ${durationMs}ms`
            : `Parsed with failures in ${failedStages.join(', ')} (${durationMs}ms)`,
        details: { failedStages, durationMs },
      }),

    logFetchStart: (domain, url) =>
      write({
        type: 'fetch_start',
        domain,
        url,
        message: `Fetching site info for ${domain}`,
      }),

    logFetchComplete: (domain, url, statusCode, durationMs) =>
      write({
        type: 'fetch_complete',
        domain,
        url,
        message: `Fetched ${url} (status ${statusCode}, ${durationMs}ms)`,
        details: { statusCode, durationMs },
      }),

    logFetchFailed: (domain, url, message) =>
      write({
        type: 'fetch_failed',
        domain,
        url,
        message,
      }),
  };
};

export const SiteInfoLoggerLive = Layer.succeed(
  SiteInfoLogger,
  makeSiteInfoLogger()
);
