/**
 * @file src/commands/serve.ts
 * @description Starts the read API over the configured dataset.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { resolveServerConfig } from '../shared/config';
import { describeError } from '../shared/logger';
import { createServiceFromConfig, startServer } from '../server';

const ENDPOINTS = [
  'GET /api/countries                List all countries with metadata',
  'GET /api/country/<name>           Articles for a country (?limit=, ?refresh=true)',
  'GET /api/country/<name>/details   Detailed country information',
  'GET /api/stats                    Dataset statistics',
  'GET /api/health                   Health check',
  'GET /api/clear-cache              Clear the description cache',
];

export const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new InvalidArgumentError('Port must be a positive integer.');
  }
  return port;
};

const serveCommand = new Command('serve')
  .description('Serve the attributed dataset over HTTP')
  .option('-p, --port <number>', 'Port to listen on', parsePort)
  .option('--host <host>', 'Host interface to bind')
  .option('-f, --file <path>', 'Dataset file (default: configured data file)')
  .action(async (options: { port?: number; host?: string; file?: string }) => {
    const config = resolveServerConfig({
      port: options.port,
      host: options.host,
      dataFile: options.file,
    });
    const service = createServiceFromConfig(config);
    const stats = service.getStats();
    if (!stats.total_articles) {
      console.warn(
        chalk.yellow(`[api] ${config.dataFile} holds no articles. Run 'curiomap extract' first.`),
      );
    }

    try {
      await startServer(config, service);
    } catch (error) {
      console.error(chalk.red(`[api] Failed to start server: ${describeError(error)}`));
      process.exitCode = 1;
      return;
    }

    console.log(chalk.green(`[api] Listening on http://${config.host}:${config.port}`));
    console.log(
      `[api] ${stats.total_countries} countries, ${stats.total_articles} articles, ${stats.identification_rate}% identified`,
    );
    ENDPOINTS.forEach((line) => console.log(chalk.gray(`  ${line}`)));
  });

export default serveCommand;
