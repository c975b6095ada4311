/**
 * @file src/server.ts
 * @description Read-only HTTP API over the attributed dataset. Routes delegate to the catalog
 *              service; `startServer` wires the service from the resolved configuration.
 */

import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { DescriptionCache } from './lib/description-cache';
import { createSerialScheduler } from './lib/scheduler';
import { createWikipediaClient } from './lib/wikipedia';
import type { ServerConfig } from './shared/config';
import { describeError, type WorkflowLogger } from './shared/logger';
import {
  createCatalogService,
  DEFAULT_ARTICLE_LIMIT,
  type CatalogService,
} from './workflows/catalog-workflow';

export const DESCRIPTION_REFRESH_DELAY_MS = 200;

const CountryQuerySchema = z.object({
  refresh: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase() === 'true'),
  limit: z.coerce.number().int().positive().max(500).default(DEFAULT_ARTICLE_LIMIT),
});

type Handler = (req: Request, res: Response) => unknown;

export const createApp = (
  service: CatalogService,
  logger: WorkflowLogger = console,
): Express => {
  const app = express();

  app.use(cors());

  const route =
    (label: string, handler: Handler) =>
    async (req: Request, res: Response): Promise<void> => {
      try {
        await handler(req, res);
      } catch (error) {
        logger.error(`[api] Error ${label}: ${describeError(error)}`);
        if (!res.headersSent) {
          res.status(500).json({ error: describeError(error) });
        }
      }
    };

  app.get(
    '/api/countries',
    route('listing countries', (_req, res) => {
      res.json({ countries: service.listCountries() });
    }),
  );

  app.get(
    '/api/country/:country',
    route('loading country articles', async (req, res) => {
      const query = CountryQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: query.error.issues[0]?.message ?? 'Invalid query' });
        return;
      }
      const { refresh, limit } = query.data;
      const articles = await service.getCountryArticles(req.params.country, { refresh, limit });
      res.json({
        country: req.params.country,
        articles,
        count: articles.length,
        descriptions_refreshed: refresh,
        limit_applied: limit,
      });
    }),
  );

  app.get(
    '/api/country/:country/details',
    route('loading country details', (req, res) => {
      const details = service.getCountryDetails(req.params.country);
      if (!details) {
        res.status(404).json({ error: 'Country not found' });
        return;
      }
      res.json(details);
    }),
  );

  app.get(
    '/api/stats',
    route('loading stats', (_req, res) => {
      res.json(service.getStats());
    }),
  );

  app.get('/api/health', (_req: Request, res: Response) => {
    try {
      res.json(service.health());
    } catch (error) {
      res.status(500).json({
        status: 'unhealthy',
        error: describeError(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.get(
    '/api/clear-cache',
    route('clearing cache', (_req, res) => {
      const removed = service.clearCache();
      res.json({
        message: `Description cache cleared! Removed ${removed} items`,
        cache_size: 0,
      });
    }),
  );

  return app;
};

export const createServiceFromConfig = (
  config: ServerConfig,
  logger: WorkflowLogger = console,
): CatalogService =>
  createCatalogService({
    dataFile: config.dataFile,
    client: createWikipediaClient({
      userAgent: config.userAgent,
      timeoutMs: config.timeoutMs,
      logger,
    }),
    cache: new DescriptionCache(config.descriptionCacheSeconds * 1000),
    scheduler: createSerialScheduler(DESCRIPTION_REFRESH_DELAY_MS),
    logger,
  });

export const startServer = (config: ServerConfig, service: CatalogService): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = createApp(service)
      .listen(config.port, config.host, () => resolve(server))
      .on('error', reject);
  });
