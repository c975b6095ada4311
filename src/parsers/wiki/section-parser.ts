/**
 * @file src/parsers/wiki/section-parser.ts
 * @description Turns one region's wikitext into the ordered, de-duplicated list of article titles
 *              it links to.
 */

import type { Gazetteer } from '../../shared/gazetteer';

/**
 * `[[Target]]` or `[[Target|display]]`. Neither part may contain a bracket, so for nested markup
 * such as `[[File:x.jpg|thumb|[[Inner]] caption]]` only the innermost complete link matches.
 */
const WIKILINK_PATTERN = /\[\[([^[\]|]+)(?:\|[^[\]]*)?\]\]/g;

const META_NAMESPACE_PATTERN = /^(Category|Template|Help|Wikipedia):/i;

export const normalizeLinkTarget = (target: string): string =>
  target.trim().replace(/[#?].*$/s, '').trim();

export const extractLinkTargets = (markup: string): string[] =>
  Array.from(markup.matchAll(WIKILINK_PATTERN), (match) => normalizeLinkTarget(match[1]));

export const isArticleTitle = (title: string, skipPrefixes: readonly string[]): boolean => {
  if (!title) return false;
  const lower = title.toLowerCase();
  if (skipPrefixes.some((prefix) => lower.startsWith(prefix))) return false;
  return !META_NAMESPACE_PATTERN.test(title);
};

export const parseSectionArticles = (
  markup: string,
  gazetteer: Pick<Gazetteer, 'skipPrefixes'>,
): string[] => {
  const seen = new Set<string>();
  const titles: string[] = [];
  for (const target of extractLinkTargets(markup)) {
    if (seen.has(target) || !isArticleTitle(target, gazetteer.skipPrefixes)) continue;
    seen.add(target);
    titles.push(target);
  }
  return titles;
};
