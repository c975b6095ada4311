/**
 * @file tests/catalog-workflow.test.ts
 * @description Read-side catalog queries over a dataset file in a temp directory.
 */

import os from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { DescriptionCache } from '../src/lib/description-cache';
import { createSerialScheduler } from '../src/lib/scheduler';
import type { PageSummary } from '../src/lib/wikipedia';
import { silentLogger } from '../src/shared/logger';
import { createCatalogService, findCountry } from '../src/workflows/catalog-workflow';
import { DATASET, writeFixture } from './fixtures/catalog';

const NOW = new Date('2026-01-02T03:04:05.000Z');

const setup = (file: string = writeFixture()) => {
  const fetchSummary = vi.fn(
    async (title: string): Promise<PageSummary | null> => ({
      title,
      description: 'Fresh text',
      extract: '',
      url: `https://en.wikipedia.org/wiki/${title}`,
      thumbnail: null,
    }),
  );
  const cache = new DescriptionCache(60_000, () => 0);
  const service = createCatalogService({
    dataFile: file,
    client: { fetchSummary },
    cache,
    scheduler: createSerialScheduler(0),
    logger: silentLogger,
    now: () => NOW,
  });
  return { service, fetchSummary, cache };
};

describe('createCatalogService', () => {
  it('lists countries by article count', () => {
    const { service } = setup();
    expect(service.listCountries()).toEqual([
      {
        country: 'Japan',
        article_count: 2,
        avg_confidence: 0.65,
        regions: ['Asia'],
        sample_articles: ['Fox Shrine', 'Hidden Village'],
      },
      {
        country: 'Unidentified',
        article_count: 1,
        avg_confidence: 0,
        regions: ['Europe'],
        sample_articles: ['Odd Stone'],
      },
    ]);
  });

  it('serves articles ranked by curiosity then confidence', async () => {
    const { service, fetchSummary } = setup();
    const articles = await service.getCountryArticles('japan');
    expect(articles.map((article) => [article.title, article.curiosity_score])).toEqual([
      ['Fox Shrine', 6],
      ['Hidden Village', 6],
    ]);
    expect(articles[0]?.last_processed).toBe('2026-01-02T03:04:05.000Z');
    expect(fetchSummary).not.toHaveBeenCalled();
  });

  it('applies the limit before ranking', async () => {
    const { service } = setup();
    const articles = await service.getCountryArticles('Japan', { limit: 1 });
    expect(articles.map((article) => article.title)).toEqual(['Fox Shrine']);
  });

  it('returns no articles for an unknown country', async () => {
    const { service } = setup();
    await expect(service.getCountryArticles('Atlantis')).resolves.toEqual([]);
  });

  it('refreshes descriptions once and then serves them from the cache', async () => {
    const { service, fetchSummary, cache } = setup();
    const first = await service.getCountryArticles('Japan', { refresh: true });
    expect(first.map((article) => article.description)).toEqual(['Fresh text', 'Fresh text']);
    expect(first[0]?.description_updated).toBe('2026-01-02T03:04:05.000Z');
    expect(fetchSummary).toHaveBeenCalledWith('Fox Shrine');
    expect(cache.size).toBe(2);

    await service.getCountryArticles('Japan', { refresh: true });
    expect(fetchSummary).toHaveBeenCalledTimes(2);
  });

  it('keeps the stored description when a refresh fails', async () => {
    const { service, fetchSummary } = setup();
    fetchSummary.mockRejectedValue(new Error('offline'));
    const articles = await service.getCountryArticles('Japan', { refresh: true, limit: 1 });
    expect(articles[0]?.description).toBe('A shrine');
    expect(articles[0]?.description_updated).toBeUndefined();
  });

  it('describes one country case-insensitively', () => {
    const { service } = setup();
    expect(service.getCountryDetails('JAPAN')).toEqual({
      country: 'Japan',
      article_count: 2,
      regions: ['Asia'],
      avg_confidence: 0.65,
      min_confidence: 0.4,
      max_confidence: 0.9,
      top_categories: ['Shrines in Japan'],
      sample_articles: [
        { title: 'Fox Shrine', confidence: 0.9, region: 'Asia' },
        { title: 'Hidden Village', confidence: 0.4, region: 'Asia' },
      ],
    });
    expect(service.getCountryDetails('Atlantis')).toBeNull();
  });

  it('reports dataset statistics', () => {
    const { service } = setup();
    const stats = service.getStats();
    expect(stats).toMatchObject({
      total_countries: 2,
      total_articles: 3,
      identified_articles: 2,
      unidentified_articles: 1,
      identification_rate: 66.7,
      avg_confidence: 0.43,
      regions_covered: ['Asia', 'Europe'],
      description_cache_size: 0,
    });
    expect(stats.last_updated).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('reports health and clears the cache', async () => {
    const file = writeFixture();
    const { service } = setup(file);
    await service.getCountryArticles('Japan', { refresh: true });
    expect(service.health()).toEqual({
      status: 'healthy',
      timestamp: '2026-01-02T03:04:05.000Z',
      countries_loaded: 2,
      description_cache_size: 2,
      data_file: file,
    });
    expect(service.clearCache()).toBe(2);
    expect(service.getStats().description_cache_size).toBe(0);
  });

  it('serves an empty catalog when the dataset file is missing', () => {
    const { service } = setup(path.join(os.tmpdir(), 'curiomap-no-such-dir', 'data.json'));
    expect(service.listCountries()).toEqual([]);
    expect(service.getStats().total_articles).toBe(0);
  });
});

describe('findCountry', () => {
  it('matches names regardless of case and surrounding space', () => {
    expect(findCountry(DATASET, '  unidentified ')?.name).toBe('Unidentified');
    expect(findCountry(DATASET, 'Atlantis')).toBeNull();
  });
});
