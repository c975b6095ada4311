/**
 * @file src/parsers/wiki/region-splitter.ts
 * @description Locates each region's block inside a page of wikitext. A block starts after the
 *              first heading whose title equals the region name and runs until the next heading
 *              of the same or a higher level, or the end of the text.
 */

import type { Region } from '../../shared/gazetteer';

export interface WikiHeading {
  level: number;
  title: string;
  /** Offset of the first character of the heading line. */
  start: number;
  /** Offset just past the heading line (before its line break). */
  end: number;
}

export interface RawSection {
  region: Region;
  markup: string;
}

export interface SplitOptions {
  /** Heading level the regions are written at (`===` is 3). */
  level?: number;
}

const HEADING_PATTERN = /^(={1,6})[ \t]*(.+?)[ \t]*\1[ \t]*$/gm;

export const scanHeadings = (text: string): WikiHeading[] => {
  const headings: WikiHeading[] = [];
  for (const match of text.matchAll(HEADING_PATTERN)) {
    const start = match.index ?? 0;
    headings.push({
      level: match[1].length,
      title: match[2],
      start,
      end: start + match[0].length,
    });
  }
  return headings;
};

const sameTitle = (heading: string, region: string): boolean =>
  heading.trim().toLowerCase() === region.trim().toLowerCase();

export const splitRegions = (
  text: string,
  regions: readonly Region[],
  options: SplitOptions = {},
): Map<Region, string> => {
  const level = options.level ?? 3;
  const headings = scanHeadings(text);
  const sections = new Map<Region, string>();

  for (const region of regions) {
    const index = headings.findIndex(
      (heading) => heading.level === level && sameTitle(heading.title, region),
    );
    if (index === -1) continue;

    const heading = headings[index];
    const next = headings.slice(index + 1).find((candidate) => candidate.level <= level);
    sections.set(region, text.slice(heading.end, next ? next.start : text.length));
  }

  return sections;
};

export const toRawSections = (sections: Map<Region, string>): RawSection[] =>
  Array.from(sections, ([region, markup]) => ({ region, markup }));
