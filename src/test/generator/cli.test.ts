import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

vi.mock('../../../generator/safe-logger.js', () => ({
  logger: {
    log: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
  getLogLevel: vi.fn(() => 'info'),
  setLogLevel: vi.fn(),
}));

import * as fs from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, parseCliArgs, runCli } from '../../../generator/cli.js';
import { logger, setLogLevel } from '../../../generator/safe-logger.js';
import { collectionXml, readFixture, routeFetch, thingXml, xmlResponse } from './bgg-test-utils.js';

const env = {
  BGG_API_BASE: 'https://bgg.test/xmlapi2',
  BGG_RATE_LIMIT_DELAY_MS: '0',
  BGG_BACKOFF_BASE_MS: '0',
  BGG_MAX_ATTEMPTS: '2',
};

function fixtureServer() {
  return routeFetch((url) => {
    if (url.pathname.endsWith('/collection')) return xmlResponse(readFixture('collection.xml'));
    return xmlResponse(readFixture('things.xml'));
  });
}

describe('parseCliArgs', () => {
  it('should read long and short flags', () => {
    expect(parseCliArgs(['-u', 'meeple_fan', '-t', '0.5', '-o', 'out', '--batch-size', '10', '--concurrency', '2', '-v'])).toEqual({
      username: 'meeple_fan',
      outDir: path.resolve('out'),
      configFile: undefined,
      edgeThreshold: 0.5,
      batchSize: 10,
      batchConcurrency: 2,
      verbose: true,
    });
  });

  it('should default the output directory to data', () => {
    const args = parseCliArgs(['--username', 'meeple_fan']);
    expect(args).toMatchObject({ outDir: path.resolve('data'), verbose: false, edgeThreshold: undefined });
  });

  it('should recognise --help', () => {
    expect(parseCliArgs(['--help'])).toBe('help');
  });

  it('should reject a non-numeric threshold', () => {
    expect(() => parseCliArgs(['-u', 'meeple_fan', '-t', 'high'])).toThrow('--edge-threshold expects a number, got "high"');
  });
});

describe('runCli', () => {
  let outDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  const readJson = (file: string): unknown => JSON.parse(fs.readFileSync(path.join(outDir, file), 'utf-8'));

  it('should generate both files and exit 0', async () => {
    const code = await runCli(['--username', 'meeple_fan', '--out-dir', outDir], { env, fetchFn: fixtureServer() });

    expect(code).toBe(EXIT_OK);
    expect(readJson('edges.json')).toEqual([{ source: '101', target: '202', weight: 0.46613943829328663 }]);
    expect(readJson('nodes.json')).toHaveLength(3);
    expect(setLogLevel).toHaveBeenCalledWith('info');
  });

  it('should pass the threshold flag through to the graph', async () => {
    const code = await runCli(['-u', 'meeple_fan', '-o', outDir, '-t', '0.5'], { env, fetchFn: fixtureServer() });

    expect(code).toBe(EXIT_OK);
    expect(readJson('edges.json')).toEqual([]);
  });

  it('should write empty arrays for an empty collection', async () => {
    const fetchFn = routeFetch(() => xmlResponse('<items totalitems="0"></items>'));

    const code = await runCli(['-u', 'new_user', '-o', outDir], { env, fetchFn });

    expect(code).toBe(EXIT_OK);
    expect(readJson('nodes.json')).toEqual([]);
    expect(readJson('edges.json')).toEqual([]);
  });

  it('should exit 1 for an unknown user', async () => {
    const fetchFn = routeFetch(() =>
      xmlResponse('<errors><error><message>Invalid username specified</message></error></errors>'),
    );

    const code = await runCli(['-u', 'nobody', '-o', outDir], { env, fetchFn });

    expect(code).toBe(EXIT_FAILURE);
    expect(logger.error).toHaveBeenCalledWith(
      '[Generator] collection failed: Collection for "nobody" is unavailable: Invalid username specified',
    );
    expect(fs.readdirSync(outDir)).toEqual([]);
  });

  it('should exit 1 when BGG keeps failing', async () => {
    const fetchFn = routeFetch(() => xmlResponse('unavailable', 503));

    const code = await runCli(['-u', 'meeple_fan', '-o', outDir], { env, fetchFn });

    expect(code).toBe(EXIT_FAILURE);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should exit 2 without a username', async () => {
    const fetchFn = fixtureServer();

    const code = await runCli(['-o', outDir], { env, fetchFn });

    expect(code).toBe(EXIT_USAGE);
    expect(logger.error).toHaveBeenCalledWith(`[Generator] --username is required\n\n${USAGE}`);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should exit 2 for an unknown flag', async () => {
    const code = await runCli(['-u', 'meeple_fan', '--colour'], { env, fetchFn: fixtureServer() });

    expect(code).toBe(EXIT_USAGE);
  });

  it('should exit 2 for an out-of-range threshold', async () => {
    const fetchFn = fixtureServer();

    const code = await runCli(['-u', 'meeple_fan', '-o', outDir, '-t', '1.5'], { env, fetchFn });

    expect(code).toBe(EXIT_USAGE);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should exit 2 for an invalid environment value', async () => {
    const code = await runCli(['-u', 'meeple_fan', '-o', outDir], {
      env: { ...env, BGG_BATCH_SIZE: 'lots' },
      fetchFn: fixtureServer(),
    });

    expect(code).toBe(EXIT_USAGE);
    expect(logger.error).toHaveBeenCalledWith('[Generator] BGG_BATCH_SIZE must be a number, got "lots"');
  });

  it('should print usage for --help', async () => {
    const code = await runCli(['--help'], { env });

    expect(code).toBe(EXIT_OK);
    expect(logger.log).toHaveBeenCalledWith(USAGE);
  });

  it('should switch to debug logging with --verbose', async () => {
    await runCli(['-u', 'meeple_fan', '-o', outDir, '--verbose'], { env, fetchFn: fixtureServer() });

    expect(setLogLevel).toHaveBeenCalledWith('debug');
  });

  it('should report skipped games and still exit 0', async () => {
    const fetchFn = routeFetch((url) => {
      if (url.pathname.endsWith('/collection')) {
        return xmlResponse(collectionXml([{ id: '1', name: 'One' }, { id: '2', name: 'Two' }]));
      }
      return xmlResponse(thingXml([{ id: '1', name: 'One' }]));
    });

    const code = await runCli(['-u', 'meeple_fan', '-o', outDir], { env, fetchFn });

    expect(code).toBe(EXIT_OK);
    expect(logger.warn).toHaveBeenCalledWith('[Generator] Skipped 1 games: 2');
    expect(readJson('nodes.json')).toHaveLength(1);
  });
});
