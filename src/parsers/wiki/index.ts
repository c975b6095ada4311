/**
 * @file src/parsers/wiki/index.ts
 * @description Entry point for the wikitext parsers: split a page into region blocks, then list
 *              the article titles each block links to.
 */

import type { Gazetteer, Region } from '../../shared/gazetteer';
import { splitRegions, toRawSections, type SplitOptions } from './region-splitter';
import { parseSectionArticles } from './section-parser';

export type RegionalArticles = Map<Region, string[]>;

/** Regions whose heading is missing or whose block links to no article are left out. */
export const parseRegionalArticles = (
  text: string,
  gazetteer: Gazetteer,
  options: SplitOptions = {},
): RegionalArticles => {
  const result: RegionalArticles = new Map();
  if (!text) return result;
  for (const { region, markup } of toRawSections(splitRegions(text, gazetteer.regions, options))) {
    const titles = parseSectionArticles(markup, gazetteer);
    if (titles.length) {
      result.set(region, titles);
    }
  }
  return result;
};

export * from './region-splitter';
export * from './section-parser';
