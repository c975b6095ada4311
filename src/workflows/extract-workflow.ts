/**
 * @file src/workflows/extract-workflow.ts
 * @description Downloads the unusual-articles page, lists the articles of every region, enriches
 *              each one with its summary and categories (paced by the scheduler), attributes it to
 *              a country and buckets the records by country.
 */

import {
  aggregateByCountry,
  isIdentified,
  UNIDENTIFIED,
  type AttributedEntry,
} from '../lib/aggregator';
import {
  attributeCountry,
  type AttributionInput,
  type AttributionResult,
} from '../lib/attribution';
import type { ArticleRecord, CountryDataset } from '../lib/dataset';
import { buildArticleRecord, buildFallbackRecord } from '../lib/enrichment';
import type { FetchScheduler, Task } from '../lib/scheduler';
import type { WikipediaClient } from '../lib/wikipedia';
import { parseRegionalArticles, type RegionalArticles } from '../parsers/wiki';
import type { Gazetteer, Region } from '../shared/gazetteer';
import { describeError, type WorkflowLogger } from '../shared/logger';

export interface ArticleProgress {
  index: number;
  total: number;
  title: string;
  region: Region;
  record: ArticleRecord;
  identified: boolean;
}

export interface ExtractWorkflowOptions {
  client: WikipediaClient;
  gazetteer: Gazetteer;
  scheduler: FetchScheduler;
  sourcePage: string;
  maxArticlesPerRegion?: number;
  logger?: WorkflowLogger;
  onArticle?: (progress: ArticleProgress) => void;
}

export const limitRegionalArticles = (
  regional: RegionalArticles,
  limit?: number,
): RegionalArticles => {
  if (limit === undefined) return regional;
  return new Map(Array.from(regional, ([region, titles]) => [region, titles.slice(0, limit)]));
};

export const enrichArticle = async (
  client: WikipediaClient,
  gazetteer: Gazetteer,
  title: string,
  region: Region,
): Promise<AttributedEntry<ArticleRecord>> => {
  const [summary, categories] = await Promise.all([
    client.fetchSummary(title),
    client.fetchCategories(title),
  ]);
  const input: AttributionInput = {
    title,
    extract: summary?.extract ?? '',
    categories,
    region,
  };
  const result: AttributionResult = attributeCountry(input, gazetteer);
  return {
    input,
    result,
    payload: buildArticleRecord({ title, region, summary, categories, result }),
  };
};

export const runExtractWorkflow = async (
  options: ExtractWorkflowOptions,
): Promise<CountryDataset> => {
  const { client, gazetteer, scheduler, sourcePage, logger = console, onArticle } = options;

  logger.log(`[extract] fetching ${sourcePage}`);
  const wikitext = await client.fetchWikitext(sourcePage);
  if (!wikitext.trim()) {
    throw new Error(`Source page '${sourcePage}' returned no wikitext.`);
  }
  logger.log(`[extract] fetched ${wikitext.length} characters`);

  const regional = limitRegionalArticles(
    parseRegionalArticles(wikitext, gazetteer),
    options.maxArticlesPerRegion,
  );
  for (const region of gazetteer.regions) {
    const titles = regional.get(region);
    if (titles) {
      logger.log(`[extract] ${region}: ${titles.length} article(s)`);
    } else {
      logger.warn(`[extract] ${region}: no section or no articles`);
    }
  }
  if (!regional.size) {
    logger.warn('[extract] no regional articles found');
    return {};
  }

  const jobs = Array.from(regional).flatMap(([region, titles]) =>
    titles.map((title) => ({ region, title })),
  );
  const total = jobs.length;

  const tasks: Array<Task<AttributedEntry<ArticleRecord>>> = jobs.map(
    ({ region, title }, index) =>
      async () => {
        let entry: AttributedEntry<ArticleRecord>;
        try {
          entry = await enrichArticle(client, gazetteer, title, region);
        } catch (error) {
          logger.warn(`[extract] enrichment failed for ${title}: ${describeError(error)}`);
          entry = {
            input: { title, region },
            result: { country: null, confidence: 0 },
            payload: buildFallbackRecord(title, region),
          };
        }
        onArticle?.({
          index: index + 1,
          total,
          title,
          region,
          record: entry.payload,
          identified: isIdentified(entry.result),
        });
        return entry;
      },
  );

  const dataset = aggregateByCountry(await scheduler.run(tasks));
  const unidentified = dataset[UNIDENTIFIED]?.length ?? 0;
  logger.log(
    `[extract] attributed ${total - unidentified}/${total} article(s) across ${
      Object.keys(dataset).filter((key) => key !== UNIDENTIFIED).length
    } countr(y/ies)`,
  );
  return dataset;
};

export interface CountrySummary {
  country: string;
  articleCount: number;
  avgConfidence: number;
}

export interface DatasetSummary {
  totalArticles: number;
  identifiedArticles: number;
  unidentifiedArticles: number;
  /** Percentage in [0, 100]; 0 for an empty dataset. */
  identificationRate: number;
  countries: CountrySummary[];
}

export const summarizeDataset = (dataset: CountryDataset): DatasetSummary => {
  const entries = Object.entries(dataset);
  const totalArticles = entries.reduce((sum, [, articles]) => sum + articles.length, 0);
  const unidentifiedArticles = dataset[UNIDENTIFIED]?.length ?? 0;
  const identifiedArticles = totalArticles - unidentifiedArticles;
  const countries = entries
    .filter(([country, articles]) => country !== UNIDENTIFIED && articles.length > 0)
    .map(([country, articles]) => ({
      country,
      articleCount: articles.length,
      avgConfidence:
        articles.reduce((sum, article) => sum + article.country_confidence, 0) / articles.length,
    }))
    .sort((a, b) => a.country.localeCompare(b.country));
  return {
    totalArticles,
    identifiedArticles,
    unidentifiedArticles,
    identificationRate: totalArticles ? (identifiedArticles / totalArticles) * 100 : 0,
    countries,
  };
};
