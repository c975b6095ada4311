/**
 * @file src/commands/summary.ts
 * @description Prints identification statistics for a dataset file.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { readDataset, type CountryDataset } from '../lib/dataset';
import { resolveExtractConfig } from '../shared/config';
import { summarizeDataset } from '../workflows/extract-workflow';

export const printDatasetSummary = (dataset: CountryDataset): void => {
  const summary = summarizeDataset(dataset);
  if (!summary.totalArticles) {
    console.log(chalk.yellow('No data to summarize.'));
    return;
  }

  console.log(chalk.bold('\nSummary'));
  console.log(
    [
      `Total articles: ${summary.totalArticles}`,
      `Identified: ${summary.identifiedArticles}`,
      `Unidentified: ${summary.unidentifiedArticles}`,
      `Identification rate: ${summary.identificationRate.toFixed(1)}%`,
    ].join(' · '),
  );

  if (summary.countries.length) {
    console.log(chalk.bold('\nCountries/territories with articles:'));
    summary.countries.forEach(({ country, articleCount, avgConfidence }) => {
      console.log(
        `  ${country}: ${articleCount} article(s) ${chalk.gray(`(avg confidence: ${avgConfidence.toFixed(2)})`)}`,
      );
    });
  }

  if (summary.unidentifiedArticles) {
    console.log(
      chalk.yellow(
        `\nUnidentified articles: ${summary.unidentifiedArticles} (need manual review for country assignment)`,
      ),
    );
  }
};

const summaryCommand = new Command('summary')
  .description('Print identification statistics for an extracted dataset')
  .option('-f, --file <path>', 'Dataset file (default: configured data file)')
  .action((options: { file?: string }) => {
    const { dataFile } = resolveExtractConfig({ dataFile: options.file });
    printDatasetSummary(readDataset(dataFile));
  });

export default summaryCommand;
