import { afterEach, describe, expect, it, vi } from 'vitest';
import { Effect } from 'effect';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { makeSiteInfoLogger } from '../../../lib/Logging/SiteInfoLogger.service.js';

const tempDirs: Array<string> = [];

const makeTempDir = () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'site-info-log-'));
  tempDirs.push(dir);
  return dir;
};

const readEvents = (dir: string) => {
  const [file] = fs.readdirSync(dir);
  if (file === undefined) {
    return [];
  }
  return fs
    .readFileSync(path.join(dir, file), 'utf-8')
    .trim()
    .split('\n')
    .map((line): unknown => JSON.parse(line));
};

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('SiteInfoLogger', () => {
  it('should append every event as a JSON line when given a directory', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const dir = makeTempDir();
    const logger = makeSiteInfoLogger(dir);

    Effect.runSync(logger.logParseStart(120));
    Effect.runSync(logger.logStageComplete('title'));

    const events = readEvents(dir);
    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({
      type: 'parse_start',
      message: 'Parsing document (size 120)',
      details: { size: 120 },
    });
    expect(events[1]).toMatchObject({
      type: 'stage_complete',
      field: 'title',
      message: 'Extracted title',
    });
  });

  it('should create a missing log directory', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const dir = path.join(makeTempDir(), 'nested', 'logs');
    const logger = makeSiteInfoLogger(dir);

    Effect.runSync(logger.logNoData());

    expect(readEvents(dir)).toHaveLength(1);
  });

  it('should echo notable events to the console only', () => {
    const consoleSpy = vi
      .spyOn(console, 'log')
      .mockImplementation(() => undefined);
    const logger = makeSiteInfoLogger();

    Effect.runSync(logger.logStageComplete('title'));
    Effect.runSync(
      logger.logStageFailed('keywords', 'TableAbsentError', 'No keywords found')
    );
    Effect.runSync(
      logger.logFetchFailed('down.example', 'http://stats.test/x', 'refused')
    );

    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(consoleSpy).toHaveBeenNthCalledWith(
      1,
      '[stage_failed] [TableAbsentError] keywords: No keywords found'
    );
    expect(consoleSpy).toHaveBeenNthCalledWith(
      2,
      '[fetch_failed] [down.example] refused'
    );
  });

  it('should summarise failed stages on completion', () => {
    const consoleSpy = vi
      .spyOn(console, 'log')
      .mockImplementation(() => undefined);
    const logger = makeSiteInfoLogger();

    Effect.runSync(logger.logParseComplete(['keywords', 'subdomains'], 4));

    expect(consoleSpy).toHaveBeenCalledWith(
      '[parse_complete] Parsed with failures in keywords, subdomains (4ms)'
    );
  });
});
