/**
 * @file src/shared/gazetteer.ts
 * @description Region/country membership, country synonyms and non-article link prefixes. The
 *              bundled table lives in `gazetteer.json`; callers build one immutable `Gazetteer`
 *              at startup and pass it to the parser and scorer.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { paths } from './paths';

export const REGIONS = [
  'Africa',
  'Antarctica',
  'Asia',
  'Europe',
  'Latin America and the Caribbean',
  'North America',
  'Oceania',
] as const;

export type Region = (typeof REGIONS)[number];

const RegionSchema = z.enum(REGIONS);

export const isRegion = (value: string): value is Region =>
  RegionSchema.safeParse(value).success;

const GazetteerDefinitionSchema = z.object({
  regions: z.record(RegionSchema, z.array(z.string().min(1))),
  synonyms: z.record(z.string().min(1), z.string().min(1)).default({}),
  skipPrefixes: z.array(z.string().min(1)).default([]),
});

export type GazetteerDefinition = z.input<typeof GazetteerDefinitionSchema>;

export interface Gazetteer {
  /** Regions in canonical order, restricted to those the table defines. */
  readonly regions: readonly Region[];
  /** Synonym → canonical country pairs, in table order. */
  readonly synonyms: ReadonlyArray<readonly [string, string]>;
  /** Lower-cased link prefixes that never denote an article. */
  readonly skipPrefixes: readonly string[];
  hasRegion(region: string): region is Region;
  /** Countries registered for `region`, in registration order. Throws for an unknown region. */
  countriesFor(region: Region): readonly string[];
}

export const createGazetteer = (definition: GazetteerDefinition): Gazetteer => {
  const parsed = GazetteerDefinitionSchema.parse(definition);
  const membership = new Map<Region, readonly string[]>();
  for (const region of REGIONS) {
    const countries = parsed.regions[region];
    if (countries) {
      membership.set(region, Object.freeze(Array.from(new Set(countries))));
    }
  }

  const regions = Object.freeze(REGIONS.filter((region) => membership.has(region)));
  const synonyms = Object.freeze(
    Object.entries(parsed.synonyms).map(
      ([synonym, canonical]) => Object.freeze([synonym, canonical] as const),
    ),
  );
  const skipPrefixes = Object.freeze(parsed.skipPrefixes.map((prefix) => prefix.toLowerCase()));

  const hasRegion = (region: string): region is Region => isRegion(region) && membership.has(region);

  return Object.freeze({
    regions,
    synonyms,
    skipPrefixes,
    hasRegion,
    countriesFor(region: Region): readonly string[] {
      const countries = membership.get(region);
      if (!countries) {
        throw new Error(
          `Region '${region}' is not registered in the gazetteer. Known regions: ${regions.join(', ')}`,
        );
      }
      return countries;
    },
  });
};

export const loadGazetteer = (file: string = paths.GAZETTEER_BUNDLED): Gazetteer => {
  if (!fs.existsSync(file)) {
    throw new Error(`Gazetteer file not found: ${file}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const parsed = GazetteerDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : 'root';
    throw new Error(`Invalid gazetteer ${file}: ${where}: ${issue?.message ?? 'unknown issue'}`);
  }
  return createGazetteer(parsed.data);
};
