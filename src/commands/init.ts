/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the Wikipedia user agent, fetch
 *              pacing, dataset location and API binding in `.curiomaprc.json`.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import prompts from 'prompts';
import {
  CONFIG_PATH,
  FALLBACK_HOST,
  FALLBACK_PORT,
  FALLBACK_RATE_LIMIT_MS,
  FALLBACK_SOURCE_PAGE,
  FALLBACK_USER_AGENT,
  readConfig,
  writeConfig,
  type CuriomapConfig,
} from '../shared/config';
import { paths } from '../shared/paths';
import { parsePort } from './serve';

type InitOptions = {
  userAgent?: string;
  rateLimit?: number;
  page?: string;
  dataFile?: string;
  host?: string;
  port?: number;
  yes?: boolean;
};

const normalize = (value?: string | null) =>
  value && value.trim().length ? value.trim() : undefined;

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
};

const initCommand = new Command('init')
  .description('Configure the Wikipedia user agent, fetch pacing, dataset file and API binding')
  .option('--user-agent <value>', 'User-Agent sent to Wikipedia')
  .option('--rate-limit <ms>', 'Delay between article fetches in milliseconds', parseNumber)
  .option('--page <title>', 'Source page holding the regional sections')
  .option('--data-file <path>', 'Where extracted datasets are written and served from')
  .option('--host <host>', 'API host interface')
  .option('--port <number>', 'API port', parsePort)
  .option('-y, --yes', 'Accept defaults for everything not passed as a flag')
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };
    const skip = (flagValue: unknown): boolean => flagValue !== undefined || Boolean(options.yes);

    const responses: Partial<Record<string, unknown>> = await prompts(
      [
        {
          type: skip(options.userAgent) ? null : 'text',
          name: 'userAgent',
          message: 'User-Agent for Wikipedia requests (include a contact)',
          initial: existing.userAgent ?? FALLBACK_USER_AGENT,
        },
        {
          type: skip(options.rateLimit) ? null : 'number',
          name: 'rateLimitMs',
          message: 'Delay between article fetches (ms)',
          initial: existing.rateLimitMs ?? FALLBACK_RATE_LIMIT_MS,
          validate: (value: number) => (value >= 0 ? true : 'Delay must be zero or more.'),
        },
        {
          type: skip(options.page) ? null : 'text',
          name: 'sourcePage',
          message: 'Source page',
          initial: existing.sourcePage ?? FALLBACK_SOURCE_PAGE,
        },
        {
          type: skip(options.dataFile) ? null : 'text',
          name: 'dataFile',
          message: 'Dataset file',
          initial: existing.dataFile ?? paths.DATA_FILE,
        },
        {
          type: skip(options.host) ? null : 'text',
          name: 'serverHost',
          message: 'API host',
          initial: existing.serverHost ?? FALLBACK_HOST,
        },
        {
          type: skip(options.port) ? null : 'number',
          name: 'serverPort',
          message: 'API port',
          initial: existing.serverPort ?? FALLBACK_PORT,
          validate: (value: number) =>
            Number.isInteger(value) && value > 0 ? true : 'Port must be a positive integer.',
        },
      ],
      { onCancel },
    );

    const text = (key: string): string | undefined => {
      const value = responses[key];
      return typeof value === 'string' ? normalize(value) : undefined;
    };
    const numeric = (key: string): number | undefined => {
      const value = responses[key];
      return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
    };

    const update: Partial<CuriomapConfig> = {
      userAgent: normalize(options.userAgent) ?? text('userAgent') ?? existing.userAgent,
      rateLimitMs: options.rateLimit ?? numeric('rateLimitMs') ?? existing.rateLimitMs,
      sourcePage: normalize(options.page) ?? text('sourcePage') ?? existing.sourcePage,
      dataFile: normalize(options.dataFile) ?? text('dataFile') ?? existing.dataFile,
      serverHost: normalize(options.host) ?? text('serverHost') ?? existing.serverHost,
      serverPort: options.port ?? numeric('serverPort') ?? existing.serverPort,
    };

    const saved = writeConfig(update);
    console.log(chalk.green(`Configuration saved to ${CONFIG_PATH}`));
    Object.entries(saved).forEach(([key, value]) => {
      if (value !== undefined) {
        console.log(`  ${key}: ${String(value)}`);
      }
    });
  });

export default initCommand;
