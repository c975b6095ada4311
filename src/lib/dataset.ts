/**
 * @file src/lib/dataset.ts
 * @description Shape and persistence of the country-keyed article dataset (`data.json`).
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { describeError, type WorkflowLogger } from '../shared/logger';
import { paths } from '../shared/paths';

export const ArticleRecordSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    description: z.string().default(''),
    extract: z.string().default(''),
    url: z.string(),
    thumbnail: z.string().nullable().default(null),
    source_region: z.string(),
    identified_country: z.string().nullable(),
    country_confidence: z.number().min(0).max(1),
    categories: z.array(z.string()).default([]),
    location_signals: z
      .object({
        has_geographic_categories: z.boolean(),
        category_count: z.number().int().nonnegative(),
      })
      .default({ has_geographic_categories: false, category_count: 0 }),
  })
  .passthrough();

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

export const DatasetSchema = z.record(z.array(ArticleRecordSchema));

export type CountryDataset = z.infer<typeof DatasetSchema>;

export const readDataset = (file: string, logger: WorkflowLogger = console): CountryDataset => {
  if (!fs.existsSync(file)) {
    logger.error(`[dataset] ${file} not found. Run 'curiomap extract' first.`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    logger.error(`[dataset] unable to parse ${file}: ${describeError(error)}`);
    return {};
  }
  const parsed = DatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    logger.error(
      `[dataset] ${file} does not match the dataset shape at ${issue?.path.join('.') || 'root'}: ${issue?.message}`,
    );
    return {};
  }
  return parsed.data;
};

export const writeDataset = (file: string, dataset: CountryDataset): string => {
  paths.ensureDir(path.dirname(file));
  fs.writeFileSync(file, `${JSON.stringify(dataset, null, 2)}\n`, 'utf8');
  return file;
};

export const datasetUpdatedAt = (file: string): string => {
  if (!fs.existsSync(file)) return 'unknown';
  return fs.statSync(file).mtime.toISOString();
};

export const allArticles = (dataset: CountryDataset): ArticleRecord[] =>
  Object.values(dataset).flat();
