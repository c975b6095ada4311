/**
 * @file src/commands/countries.ts
 * @description Lists the countries of a dataset, or the details of one country.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { DescriptionCache } from '../lib/description-cache';
import { createSerialScheduler } from '../lib/scheduler';
import { createWikipediaClient } from '../lib/wikipedia';
import { resolveServerConfig } from '../shared/config';
import {
  createCatalogService,
  type CatalogService,
  type CountryDetails,
} from '../workflows/catalog-workflow';

const printDetails = (details: CountryDetails): void => {
  console.log(chalk.bold(`# ${details.country}`));
  console.log(
    [
      `Articles: ${details.article_count}`,
      `Regions: ${details.regions.join(', ')}`,
      `Confidence: avg ${details.avg_confidence.toFixed(2)}, min ${details.min_confidence.toFixed(2)}, max ${details.max_confidence.toFixed(2)}`,
    ].join(' · '),
  );
  if (details.sample_articles.length) {
    console.log(chalk.bold('\nSample articles:'));
    details.sample_articles.forEach((article) => {
      console.log(` - ${article.title} ${chalk.gray(`(${article.region}, ${article.confidence})`)}`);
    });
  }
  if (details.top_categories.length) {
    console.log(chalk.bold('\nCategories:'));
    console.log(chalk.gray(details.top_categories.join(', ')));
  }
};

const printListing = (service: CatalogService): void => {
  const countries = service.listCountries();
  if (!countries.length) {
    console.log(chalk.yellow('No countries in dataset.'));
    return;
  }
  countries.forEach((entry) => {
    console.log(
      `${chalk.bold(entry.country)}: ${entry.article_count} article(s) ${chalk.gray(
        `(avg confidence ${entry.avg_confidence.toFixed(2)}; e.g. ${entry.sample_articles.join(', ')})`,
      )}`,
    );
  });
};

const countriesCommand = new Command('countries')
  .description('List countries in the dataset, or show details for one country')
  .argument('[country]', 'Country or territory name (case-insensitive)')
  .option('-f, --file <path>', 'Dataset file (default: configured data file)')
  .action((country: string | undefined, options: { file?: string }) => {
    const config = resolveServerConfig({ dataFile: options.file });
    const service = createCatalogService({
      dataFile: config.dataFile,
      client: createWikipediaClient({ userAgent: config.userAgent, timeoutMs: config.timeoutMs }),
      cache: new DescriptionCache(config.descriptionCacheSeconds * 1000),
      scheduler: createSerialScheduler(0),
    });

    if (!country) {
      printListing(service);
      return;
    }
    const details = service.getCountryDetails(country);
    if (!details) {
      console.error(chalk.red(`Country '${country}' not found in ${config.dataFile}.`));
      process.exitCode = 1;
      return;
    }
    printDetails(details);
  });

export default countriesCommand;
