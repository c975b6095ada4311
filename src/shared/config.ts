/**
 * @file src/shared/config.ts
 * @description Handles persistent curiomap configuration (.curiomaprc.json) and resolves the
 *              effective extraction/server settings from flags, environment, file and fallbacks.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { paths } from './paths';

const ConfigSchema = z.object({
  userAgent: z.string().optional(),
  rateLimitMs: z.number().nonnegative().optional(),
  requestTimeoutMs: z.number().positive().optional(),
  sourcePage: z.string().optional(),
  dataFile: z.string().optional(),
  serverHost: z.string().optional(),
  serverPort: z.number().int().positive().optional(),
  descriptionCacheSeconds: z.number().nonnegative().optional(),
  maxArticlesPerRegion: z.number().int().positive().optional(),
});

export type CuriomapConfig = z.infer<typeof ConfigSchema>;

export const CONFIG_PATH = paths.CONFIG;

export const FALLBACK_USER_AGENT = 'curiomap/0.1 (unusual-articles atlas)';
export const FALLBACK_RATE_LIMIT_MS = 800;
export const FALLBACK_TIMEOUT_MS = 15000;
export const FALLBACK_SOURCE_PAGE = 'Wikipedia:Unusual articles/Places and infrastructure';
export const FALLBACK_HOST = '127.0.0.1';
export const FALLBACK_PORT = 5000;
export const FALLBACK_DESCRIPTION_CACHE_SECONDS = 1800;

const normalize = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const readFile = (file: string): CuriomapConfig => {
  if (!fs.existsSync(file)) {
    return {};
  }
  try {
    const parsed = ConfigSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
};

export const readConfig = (file: string = CONFIG_PATH): CuriomapConfig => readFile(file);

export const writeConfig = (
  update: Partial<CuriomapConfig>,
  file: string = CONFIG_PATH,
): CuriomapConfig => {
  const parsed = ConfigSchema.safeParse({ ...readFile(file), ...update });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : 'root';
    throw new Error(`Invalid configuration ${where}: ${issue?.message ?? 'unknown issue'}`);
  }
  const next = parsed.data;
  paths.ensureDir(path.dirname(file));
  fs.writeFileSync(file, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

const parseEnvPort = (value?: string): number | undefined => {
  if (!value) return undefined;
  const port = Number(value);
  return Number.isInteger(port) && port > 0 ? port : undefined;
};

export interface ExtractConfigOverrides {
  userAgent?: string;
  rateLimitMs?: number;
  timeoutMs?: number;
  sourcePage?: string;
  dataFile?: string;
  maxArticlesPerRegion?: number;
}

export interface ExtractConfig {
  userAgent: string;
  rateLimitMs: number;
  timeoutMs: number;
  sourcePage: string;
  dataFile: string;
  maxArticlesPerRegion?: number;
}

export const resolveExtractConfig = (
  overrides: ExtractConfigOverrides = {},
  cfg: CuriomapConfig = readConfig(),
): ExtractConfig => {
  const rateLimitMs = overrides.rateLimitMs ?? cfg.rateLimitMs ?? FALLBACK_RATE_LIMIT_MS;
  if (!Number.isFinite(rateLimitMs) || rateLimitMs < 0) {
    throw new Error(`Invalid rate limit '${rateLimitMs}'. Expected a non-negative number of ms.`);
  }
  const maxArticlesPerRegion = overrides.maxArticlesPerRegion ?? cfg.maxArticlesPerRegion;
  if (maxArticlesPerRegion !== undefined && !(maxArticlesPerRegion > 0)) {
    throw new Error(`Invalid article limit '${maxArticlesPerRegion}'. Expected a positive integer.`);
  }
  return {
    userAgent: normalize(overrides.userAgent) ?? normalize(cfg.userAgent) ?? FALLBACK_USER_AGENT,
    rateLimitMs,
    timeoutMs: overrides.timeoutMs ?? cfg.requestTimeoutMs ?? FALLBACK_TIMEOUT_MS,
    sourcePage:
      normalize(overrides.sourcePage) ?? normalize(cfg.sourcePage) ?? FALLBACK_SOURCE_PAGE,
    dataFile: path.resolve(
      normalize(overrides.dataFile) ?? normalize(cfg.dataFile) ?? paths.DATA_FILE,
    ),
    maxArticlesPerRegion,
  };
};

export interface ServerConfigOverrides {
  host?: string;
  port?: number;
  dataFile?: string;
  userAgent?: string;
}

export interface ServerConfig {
  host: string;
  port: number;
  dataFile: string;
  userAgent: string;
  timeoutMs: number;
  descriptionCacheSeconds: number;
}

export const resolveServerConfig = (
  overrides: ServerConfigOverrides = {},
  cfg: CuriomapConfig = readConfig(),
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig => {
  const port =
    overrides.port ?? parseEnvPort(env.CURIOMAP_PORT) ?? cfg.serverPort ?? FALLBACK_PORT;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid port '${port}'.`);
  }
  return {
    host:
      normalize(overrides.host) ??
      normalize(env.CURIOMAP_HOST) ??
      normalize(cfg.serverHost) ??
      FALLBACK_HOST,
    port,
    dataFile: path.resolve(
      normalize(overrides.dataFile) ?? normalize(cfg.dataFile) ?? paths.DATA_FILE,
    ),
    userAgent: normalize(overrides.userAgent) ?? normalize(cfg.userAgent) ?? FALLBACK_USER_AGENT,
    timeoutMs: cfg.requestTimeoutMs ?? FALLBACK_TIMEOUT_MS,
    descriptionCacheSeconds:
      cfg.descriptionCacheSeconds ?? FALLBACK_DESCRIPTION_CACHE_SECONDS,
  };
};
