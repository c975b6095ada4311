/**
 * @file src/lib/wikipedia.ts
 * @description Thin client over the MediaWiki action API and the REST summary endpoint. Source
 *              page failures throw; per-article summary/category failures degrade to `null` and
 *              `[]` so that attribution still runs on whatever signal is left.
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import { describeError, type WorkflowLogger } from '../shared/logger';

const WIKI_BASE_URL = 'https://en.wikipedia.org';
const WIKI_API = `${WIKI_BASE_URL}/w/api.php`;
const WIKI_REST = `${WIKI_BASE_URL}/api/rest_v1`;

export interface PageSummary {
  title: string;
  description: string;
  extract: string;
  url: string;
  thumbnail: string | null;
}

export interface WikipediaClient {
  fetchWikitext(page: string): Promise<string>;
  fetchSummary(title: string): Promise<PageSummary | null>;
  fetchCategories(title: string): Promise<string[]>;
}

export interface WikipediaClientOptions {
  userAgent: string;
  timeoutMs?: number;
  logger?: WorkflowLogger;
}

const ParseResponseSchema = z.object({
  parse: z
    .object({
      wikitext: z.object({ '*': z.string() }).optional(),
    })
    .optional(),
  error: z.object({ info: z.string().optional() }).optional(),
});

const SummaryResponseSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  extract: z.string().optional(),
  content_urls: z
    .object({ desktop: z.object({ page: z.string().optional() }).optional() })
    .optional(),
  thumbnail: z.object({ source: z.string().optional() }).optional(),
});

const CategoriesResponseSchema = z.object({
  query: z
    .object({
      pages: z.record(
        z.object({
          categories: z.array(z.object({ title: z.string() })).optional(),
        }),
      ),
    })
    .optional(),
});

export const toSlug = (title: string): string => title.trim().replace(/ /g, '_');

export const articleUrl = (title: string): string => `${WIKI_BASE_URL}/wiki/${toSlug(title)}`;

export const createWikipediaClient = (options: WikipediaClientOptions): WikipediaClient => {
  const { userAgent, timeoutMs, logger = console } = options;
  const headers = { 'User-Agent': userAgent, Accept: 'application/json' };

  const getJson = async (url: string): Promise<{ status: number; body: unknown }> => {
    const response = await fetch(url, { headers, timeout: timeoutMs });
    if (!response.ok) {
      return { status: response.status, body: null };
    }
    return { status: response.status, body: await response.json() };
  };

  const fetchWikitext = async (page: string): Promise<string> => {
    const params = new URLSearchParams({
      action: 'parse',
      page,
      format: 'json',
      prop: 'wikitext',
    });
    const { status, body } = await getJson(`${WIKI_API}?${params.toString()}`);
    if (status !== 200) {
      throw new Error(`Wikipedia API returned HTTP ${status} for '${page}'`);
    }
    const payload = ParseResponseSchema.parse(body);
    const wikitext = payload.parse?.wikitext?.['*'];
    if (wikitext === undefined) {
      const reason = payload.error?.info ?? 'no wikitext in response';
      throw new Error(`Unable to load wikitext for '${page}': ${reason}`);
    }
    return wikitext;
  };

  const fetchSummary = async (title: string): Promise<PageSummary | null> => {
    const url = `${WIKI_REST}/page/summary/${encodeURIComponent(toSlug(title))}`;
    try {
      const { status, body } = await getJson(url);
      if (status !== 200) {
        logger.warn(`[wiki] summary for ${title} returned HTTP ${status}`);
        return null;
      }
      const data = SummaryResponseSchema.parse(body);
      return {
        title: data.title ?? title,
        description: data.description ?? '',
        extract: data.extract ?? '',
        url: data.content_urls?.desktop?.page ?? articleUrl(title),
        thumbnail: data.thumbnail?.source ?? null,
      };
    } catch (error) {
      logger.warn(`[wiki] summary for ${title} failed: ${describeError(error)}`);
      return null;
    }
  };

  const fetchCategories = async (title: string): Promise<string[]> => {
    const params = new URLSearchParams({
      action: 'query',
      format: 'json',
      titles: title,
      prop: 'categories',
      cllimit: 'max',
    });
    try {
      const { status, body } = await getJson(`${WIKI_API}?${params.toString()}`);
      if (status !== 200) {
        logger.warn(`[wiki] categories for ${title} returned HTTP ${status}`);
        return [];
      }
      const pages = CategoriesResponseSchema.parse(body).query?.pages ?? {};
      return Object.values(pages).flatMap((page) =>
        (page.categories ?? []).map((category) => category.title.replace(/^Category:/, '')),
      );
    } catch (error) {
      logger.warn(`[wiki] categories for ${title} failed: ${describeError(error)}`);
      return [];
    }
  };

  return { fetchWikitext, fetchSummary, fetchCategories };
};
