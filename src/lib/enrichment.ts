/**
 * @file src/lib/enrichment.ts
 * @description Builds the persisted record for one article from its summary, categories and
 *              attribution result.
 */

import type { Region } from '../shared/gazetteer';
import type { AttributionResult } from './attribution';
import type { ArticleRecord } from './dataset';
import { articleUrl, type PageSummary } from './wikipedia';

export const DEFAULT_DESCRIPTION = 'Unusual Wikipedia article';
export const EXTRACT_PREVIEW_CHARS = 300;
export const STORED_CATEGORY_LIMIT = 10;

export const articleId = (title: string): string => title.toLowerCase().replace(/ /g, '_');

export const truncateExtract = (extract: string): string =>
  extract.length > EXTRACT_PREVIEW_CHARS
    ? `${extract.slice(0, EXTRACT_PREVIEW_CHARS)}...`
    : extract;

const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const hasGeographicCategory = (categories: readonly string[]): boolean =>
  categories.some((category) => {
    const lower = category.toLowerCase();
    return lower.includes('geography') || lower.includes('location');
  });

export interface EnrichmentInput {
  title: string;
  region: Region;
  summary: PageSummary | null;
  categories: readonly string[];
  result: AttributionResult;
}

export const buildArticleRecord = ({
  title,
  region,
  summary,
  categories,
  result,
}: EnrichmentInput): ArticleRecord => ({
  id: articleId(title),
  title: summary?.title ?? title,
  description: summary ? summary.description : DEFAULT_DESCRIPTION,
  extract: truncateExtract(summary?.extract ?? ''),
  url: summary?.url ?? articleUrl(title),
  thumbnail: summary?.thumbnail ?? null,
  source_region: region,
  identified_country: result.country,
  country_confidence: roundTo(result.confidence, 2),
  categories: categories.slice(0, STORED_CATEGORY_LIMIT),
  location_signals: {
    has_geographic_categories: hasGeographicCategory(categories),
    category_count: categories.length,
  },
});

export const buildFallbackRecord = (title: string, region: Region): ArticleRecord =>
  buildArticleRecord({
    title,
    region,
    summary: null,
    categories: [],
    result: { country: null, confidence: 0 },
  });
