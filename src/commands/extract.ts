/**
 * @file src/commands/extract.ts
 * @description CLI wiring for the extraction workflow. Business logic lives in
 *              `src/workflows/extract-workflow.ts`.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { UNIDENTIFIED } from '../lib/aggregator';
import { writeDataset } from '../lib/dataset';
import { createSerialScheduler } from '../lib/scheduler';
import { createWikipediaClient } from '../lib/wikipedia';
import { resolveExtractConfig, type ExtractConfig } from '../shared/config';
import { loadGazetteer, type Gazetteer } from '../shared/gazetteer';
import { describeError, type WorkflowLogger } from '../shared/logger';
import { runExtractWorkflow } from '../workflows/extract-workflow';
import { printDatasetSummary } from './summary';

interface ExtractCliOptions {
  limit?: number;
  output?: string;
  rateLimit?: number;
  page?: string;
  gazetteer?: string;
}

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, received '${value}'.`);
  }
  return parsed;
};

const extractCommand = new Command('extract')
  .description('Fetch the unusual-articles page, attribute every article to a country, save JSON')
  .option('-l, --limit <number>', 'Maximum articles per region (for quick runs)', parseInteger)
  .option('-o, --output <file>', 'Where to write the dataset (default: configured data file)')
  .option('--rate-limit <ms>', 'Delay between article fetches in milliseconds', parseInteger)
  .option('--page <title>', 'Source page holding the regional sections')
  .option('--gazetteer <file>', 'Alternate gazetteer JSON file')
  .action(async (options: ExtractCliOptions) => {
    let config: ExtractConfig;
    let gazetteer: Gazetteer;
    try {
      config = resolveExtractConfig({
        maxArticlesPerRegion: options.limit,
        dataFile: options.output,
        rateLimitMs: options.rateLimit,
        sourcePage: options.page,
      });
      gazetteer = loadGazetteer(options.gazetteer);
    } catch (error) {
      console.error(chalk.red(`[extract] ${describeError(error)}`));
      process.exitCode = 1;
      return;
    }

    const spinner = ora(`[extract] fetching ${config.sourcePage}`).start();
    const logger: WorkflowLogger = {
      log: (message: string) => {
        spinner.text = message;
      },
      warn: (message: string) => {
        spinner.warn(chalk.yellow(message)).start();
      },
      error: (message: string) => {
        spinner.fail(chalk.red(message)).start();
      },
    };

    try {
      const dataset = await runExtractWorkflow({
        client: createWikipediaClient({
          userAgent: config.userAgent,
          timeoutMs: config.timeoutMs,
          logger,
        }),
        gazetteer,
        scheduler: createSerialScheduler(config.rateLimitMs),
        sourcePage: config.sourcePage,
        maxArticlesPerRegion: config.maxArticlesPerRegion,
        logger,
        onArticle: ({ index, total, title, record, identified }) => {
          const target = identified ? (record.identified_country ?? UNIDENTIFIED) : UNIDENTIFIED;
          spinner.text = `[extract] ${index}/${total}: ${title} → ${target} (confidence: ${record.country_confidence})`;
        },
      });

      if (!Object.keys(dataset).length) {
        spinner.warn('[extract] nothing to save');
        return;
      }
      writeDataset(config.dataFile, dataset);
      spinner.succeed(`[extract] saved ${config.dataFile}`);
      printDatasetSummary(dataset);
    } catch (error) {
      spinner.fail(chalk.red(`[extract] ${describeError(error)}`));
      process.exitCode = 1;
    }
  });

export default extractCommand;
