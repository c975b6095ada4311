/**
 * @file src/workflows/catalog-workflow.ts
 * @description Read-side queries over the persisted dataset: country listings, per-country
 *              articles (optionally with live descriptions), details and statistics. Shared by the
 *              HTTP API and the `countries` command.
 */

import { UNIDENTIFIED } from '../lib/aggregator';
import { curiosityScore } from '../lib/curiosity';
import {
  allArticles,
  datasetUpdatedAt,
  readDataset,
  type ArticleRecord,
  type CountryDataset,
} from '../lib/dataset';
import { DescriptionCache, wikiTitleFromUrl } from '../lib/description-cache';
import type { FetchScheduler } from '../lib/scheduler';
import type { WikipediaClient } from '../lib/wikipedia';
import { describeError, type WorkflowLogger } from '../shared/logger';

export const DEFAULT_ARTICLE_LIMIT = 20;

export type ServedArticle = ArticleRecord & {
  curiosity_score: number;
  last_processed: string;
  description_updated?: string;
};

export interface CountryListing {
  country: string;
  article_count: number;
  avg_confidence: number;
  regions: string[];
  sample_articles: string[];
}

export interface CountryDetails {
  country: string;
  article_count: number;
  regions: string[];
  avg_confidence: number;
  min_confidence: number;
  max_confidence: number;
  top_categories: string[];
  sample_articles: Array<{ title: string; confidence: number; region: string }>;
}

export interface CatalogStats {
  total_countries: number;
  total_articles: number;
  identified_articles: number;
  unidentified_articles: number;
  identification_rate: number;
  avg_confidence: number;
  regions_covered: string[];
  last_updated: string;
  description_cache_size: number;
}

export interface CatalogHealth {
  status: 'healthy';
  timestamp: string;
  countries_loaded: number;
  description_cache_size: number;
  data_file: string;
}

export interface CountryArticlesOptions {
  refresh?: boolean;
  limit?: number;
}

export interface CatalogService {
  listCountries(): CountryListing[];
  getCountryArticles(country: string, options?: CountryArticlesOptions): Promise<ServedArticle[]>;
  getCountryDetails(country: string): CountryDetails | null;
  getStats(): CatalogStats;
  health(): CatalogHealth;
  clearCache(): number;
}

export interface CatalogServiceOptions {
  dataFile: string;
  client: Pick<WikipediaClient, 'fetchSummary'>;
  cache: DescriptionCache;
  scheduler: FetchScheduler;
  logger?: WorkflowLogger;
  now?: () => Date;
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const average = (values: number[]): number =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

const uniqueRegions = (articles: ArticleRecord[]): string[] =>
  Array.from(new Set(articles.map((article) => article.source_region || 'Unknown')));

export const findCountry = (
  dataset: CountryDataset,
  country: string,
): { name: string; articles: ArticleRecord[] } | null => {
  const target = country.trim().toLowerCase();
  const match = Object.entries(dataset).find(([name]) => name.toLowerCase() === target);
  return match ? { name: match[0], articles: match[1] } : null;
};

export const createCatalogService = (options: CatalogServiceOptions): CatalogService => {
  const { dataFile, client, cache, scheduler, logger = console, now = () => new Date() } = options;

  const load = (): CountryDataset => readDataset(dataFile, logger);

  const freshDescription = async (title: string): Promise<string | null> => {
    const key = `desc_${title}`;
    const cached = cache.get(key);
    if (cached !== undefined) return cached;
    const summary = await client.fetchSummary(title);
    if (!summary) return null;
    cache.set(key, summary.description);
    return summary.description;
  };

  const serveArticle = async (article: ArticleRecord, refresh: boolean): Promise<ServedArticle> => {
    const served: ArticleRecord & { description_updated?: string } = { ...article };
    if (refresh) {
      const title = wikiTitleFromUrl(article.url) || article.title;
      try {
        const description = await freshDescription(title);
        if (description) {
          served.description = description;
          served.description_updated = now().toISOString();
        }
      } catch (error) {
        logger.warn(`[api] failed to refresh description for ${title}: ${describeError(error)}`);
      }
    }
    return {
      ...served,
      curiosity_score: curiosityScore(served),
      last_processed: now().toISOString(),
    };
  };

  const listCountries = (): CountryListing[] =>
    Object.entries(load())
      .map(([country, articles]) => ({
        country,
        article_count: articles.length,
        avg_confidence: round(average(articles.map((article) => article.country_confidence)), 2),
        regions: uniqueRegions(articles),
        sample_articles: articles.slice(0, 3).map((article) => article.title),
      }))
      .sort((a, b) => b.article_count - a.article_count);

  const getCountryArticles = async (
    country: string,
    { refresh = false, limit = DEFAULT_ARTICLE_LIMIT }: CountryArticlesOptions = {},
  ): Promise<ServedArticle[]> => {
    const match = findCountry(load(), country);
    if (!match) {
      logger.log(`[api] no articles found for ${country}`);
      return [];
    }
    const selection = match.articles.slice(0, limit);
    logger.log(`[api] serving ${selection.length} article(s) for ${match.name}`);
    const served = refresh
      ? await scheduler.run(selection.map((article) => () => serveArticle(article, true)))
      : await Promise.all(selection.map((article) => serveArticle(article, false)));
    return served.sort(
      (a, b) =>
        b.curiosity_score - a.curiosity_score || b.country_confidence - a.country_confidence,
    );
  };

  const getCountryDetails = (country: string): CountryDetails | null => {
    const match = findCountry(load(), country);
    if (!match || !match.articles.length) return null;
    const { name, articles } = match;
    const confidences = articles.map((article) => article.country_confidence);
    return {
      country: name,
      article_count: articles.length,
      regions: uniqueRegions(articles),
      avg_confidence: round(average(confidences), 2),
      min_confidence: round(Math.min(...confidences), 2),
      max_confidence: round(Math.max(...confidences), 2),
      top_categories: Array.from(new Set(articles.flatMap((article) => article.categories))).slice(
        0,
        20,
      ),
      sample_articles: articles.slice(0, 5).map((article) => ({
        title: article.title,
        confidence: article.country_confidence,
        region: article.source_region || 'Unknown',
      })),
    };
  };

  const getStats = (): CatalogStats => {
    const dataset = load();
    const articles = allArticles(dataset);
    const unidentified = dataset[UNIDENTIFIED]?.length ?? 0;
    const identified = articles.length - unidentified;
    return {
      total_countries: Object.keys(dataset).length,
      total_articles: articles.length,
      identified_articles: identified,
      unidentified_articles: unidentified,
      identification_rate: articles.length ? round((identified / articles.length) * 100, 1) : 0,
      avg_confidence: round(average(articles.map((article) => article.country_confidence)), 2),
      regions_covered: uniqueRegions(articles),
      last_updated: datasetUpdatedAt(dataFile),
      description_cache_size: cache.size,
    };
  };

  const health = (): CatalogHealth => ({
    status: 'healthy',
    timestamp: now().toISOString(),
    countries_loaded: Object.keys(load()).length,
    description_cache_size: cache.size,
    data_file: dataFile,
  });

  return {
    listCountries,
    getCountryArticles,
    getCountryDetails,
    getStats,
    health,
    clearCache: () => cache.clear(),
  };
};
