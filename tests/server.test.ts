/**
 * @file tests/server.test.ts
 * @description HTTP routes of the read API, served on an ephemeral localhost port.
 */

import type { Server } from 'node:http';
import fetch from 'node-fetch';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { DescriptionCache } from '../src/lib/description-cache';
import { createSerialScheduler } from '../src/lib/scheduler';
import { createApp } from '../src/server';
import { silentLogger } from '../src/shared/logger';
import { createCatalogService, type CatalogService } from '../src/workflows/catalog-workflow';
import { writeFixture } from './fixtures/catalog';

const listen = (service: CatalogService): Promise<{ server: Server; base: string }> =>
  new Promise((resolve, reject) => {
    const server = createApp(service, silentLogger).listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, base: `http://127.0.0.1:${port}` });
    });
    server.on('error', reject);
  });

const close = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

const service = createCatalogService({
  dataFile: writeFixture(),
  client: { fetchSummary: vi.fn(async () => null) },
  cache: new DescriptionCache(60_000),
  scheduler: createSerialScheduler(0),
  logger: silentLogger,
});

let server: Server;
let base = '';

beforeAll(async () => {
  ({ server, base } = await listen(service));
});

afterAll(async () => {
  await close(server);
});

describe('read API', () => {
  it('lists countries with a permissive CORS header', async () => {
    const response = await fetch(`${base}/api/countries`);
    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    const body = await response.json();
    expect(body).toEqual({ countries: service.listCountries() });
  });

  it('answers a CORS preflight with allowed methods and headers', async () => {
    const response = await fetch(`${base}/api/countries`, {
      method: 'OPTIONS',
      headers: {
        Origin: 'http://localhost:3000',
        'Access-Control-Request-Method': 'GET',
        'Access-Control-Request-Headers': 'content-type',
      },
    });
    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(response.headers.get('access-control-allow-methods')).toBe(
      'GET,HEAD,PUT,PATCH,POST,DELETE',
    );
    expect(response.headers.get('access-control-allow-headers')).toBe('content-type');
  });

  it('serves a country with the applied limit', async () => {
    const response = await fetch(`${base}/api/country/japan?limit=1`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      country: 'japan',
      count: 1,
      descriptions_refreshed: false,
      limit_applied: 1,
    });
  });

  it('rejects a malformed limit', async () => {
    const response = await fetch(`${base}/api/country/japan?limit=abc`);
    expect(response.status).toBe(400);
  });

  it('returns 404 for details of an unknown country', async () => {
    const response = await fetch(`${base}/api/country/Atlantis/details`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Country not found' });
  });

  it('returns details, stats and health', async () => {
    const details = await fetch(`${base}/api/country/Japan/details`);
    expect(await details.json()).toMatchObject({ country: 'Japan', article_count: 2 });
    const stats = await fetch(`${base}/api/stats`);
    expect(await stats.json()).toMatchObject({ total_articles: 3, total_countries: 2 });
    const health = await fetch(`${base}/api/health`);
    expect(await health.json()).toMatchObject({ status: 'healthy', countries_loaded: 2 });
  });

  it('clears the description cache', async () => {
    const response = await fetch(`${base}/api/clear-cache`);
    expect(await response.json()).toEqual({
      message: 'Description cache cleared! Removed 0 items',
      cache_size: 0,
    });
  });
});

describe('error handling', () => {
  it('answers 500 with the error message when a query throws', async () => {
    const failing: CatalogService = {
      ...service,
      getStats: () => {
        throw new Error('dataset unreadable');
      },
    };
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const app = createApp(failing, logger);
    const running = await new Promise<Server>((resolve) => {
      const instance = app.listen(0, '127.0.0.1', () => resolve(instance));
    });
    try {
      const address = running.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      const response = await fetch(`http://127.0.0.1:${port}/api/stats`);
      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: 'dataset unreadable' });
      expect(logger.error).toHaveBeenCalledWith('[api] Error loading stats: dataset unreadable');
    } finally {
      await close(running);
    }
  });
});
