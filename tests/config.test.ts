/**
 * @file tests/config.test.ts
 * @description Configuration file persistence and flag/env/file/fallback resolution.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { parsePort } from '../src/commands/serve';
import {
  FALLBACK_HOST,
  FALLBACK_PORT,
  FALLBACK_RATE_LIMIT_MS,
  FALLBACK_SOURCE_PAGE,
  FALLBACK_USER_AGENT,
  readConfig,
  resolveExtractConfig,
  resolveServerConfig,
  writeConfig,
} from '../src/shared/config';
import { paths } from '../src/shared/paths';

const tmpConfig = () =>
  path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'curiomap-config-')), '.curiomaprc.json');

describe('config file', () => {
  it('merges updates into the stored file', () => {
    const file = tmpConfig();
    writeConfig({ userAgent: 'curiomap-test/1.0' }, file);
    const saved = writeConfig({ serverPort: 8123 }, file);
    expect(saved).toEqual({ userAgent: 'curiomap-test/1.0', serverPort: 8123 });
    expect(readConfig(file)).toEqual(saved);
  });

  it('rejects an invalid update and keeps the stored settings', () => {
    const file = tmpConfig();
    writeConfig({ userAgent: 'curiomap-test/1.0', rateLimitMs: 500 }, file);
    expect(() => writeConfig({ serverPort: 0 }, file)).toThrow(/Invalid configuration serverPort/);
    expect(() => writeConfig({ serverPort: 1.5 }, file)).toThrow(/Invalid configuration serverPort/);
    expect(readConfig(file)).toEqual({ userAgent: 'curiomap-test/1.0', rateLimitMs: 500 });
  });

  it('ignores unreadable or invalid files', () => {
    const broken = tmpConfig();
    fs.writeFileSync(broken, '{ nope');
    expect(readConfig(broken)).toEqual({});
    const invalid = tmpConfig();
    fs.writeFileSync(invalid, JSON.stringify({ serverPort: 'abc' }));
    expect(readConfig(invalid)).toEqual({});
  });
});

describe('resolveExtractConfig', () => {
  it('falls back to built-in defaults', () => {
    expect(resolveExtractConfig({}, {})).toEqual({
      userAgent: FALLBACK_USER_AGENT,
      rateLimitMs: FALLBACK_RATE_LIMIT_MS,
      timeoutMs: 15000,
      sourcePage: FALLBACK_SOURCE_PAGE,
      dataFile: path.resolve(paths.DATA_FILE),
      maxArticlesPerRegion: undefined,
    });
  });

  it('prefers flags over the config file', () => {
    const config = resolveExtractConfig(
      { rateLimitMs: 0, dataFile: 'out/data.json', userAgent: '  ' },
      { rateLimitMs: 1200, userAgent: 'from-file/1.0', maxArticlesPerRegion: 3 },
    );
    expect(config.rateLimitMs).toBe(0);
    expect(config.dataFile).toBe(path.resolve('out/data.json'));
    expect(config.userAgent).toBe('from-file/1.0');
    expect(config.maxArticlesPerRegion).toBe(3);
  });

  it('rejects a negative delay and a zero limit', () => {
    expect(() => resolveExtractConfig({ rateLimitMs: -1 }, {})).toThrow(/Invalid rate limit/);
    expect(() => resolveExtractConfig({ maxArticlesPerRegion: 0 }, {})).toThrow(
      /Invalid article limit/,
    );
  });
});

describe('resolveServerConfig', () => {
  it('layers flags over environment over file', () => {
    const cfg = { serverHost: '10.0.0.5', serverPort: 7000, descriptionCacheSeconds: 60 };
    expect(resolveServerConfig({}, cfg, {})).toMatchObject({
      host: '10.0.0.5',
      port: 7000,
      descriptionCacheSeconds: 60,
    });
    expect(
      resolveServerConfig({}, cfg, { CURIOMAP_PORT: '8080', CURIOMAP_HOST: '0.0.0.0' }),
    ).toMatchObject({ host: '0.0.0.0', port: 8080 });
    expect(resolveServerConfig({ port: 9000 }, cfg, { CURIOMAP_PORT: '8080' }).port).toBe(9000);
  });

  it('ignores a malformed port in the environment', () => {
    expect(resolveServerConfig({}, {}, { CURIOMAP_PORT: 'http' })).toMatchObject({
      host: FALLBACK_HOST,
      port: FALLBACK_PORT,
      descriptionCacheSeconds: 1800,
    });
  });
});

describe('parsePort', () => {
  it('accepts positive integers only', () => {
    expect(parsePort('8080')).toBe(8080);
    expect(() => parsePort('0')).toThrow(InvalidArgumentError);
    expect(() => parsePort('1.5')).toThrow('Port must be a positive integer.');
  });
});
