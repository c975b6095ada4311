#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the curiomap CLI: extract unusual Wikipedia articles by region, attribute
 *              each one to a country, and browse or serve the resulting dataset.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture user agent, pacing, dataset location and API binding in `.curiomaprc.json`.
 *   - `extract`: fetch the source page, attribute every article, write the dataset.
 *   - `summary`: print identification statistics for a dataset.
 *   - `countries`: list countries, or show one country's details.
 *   - `serve`: start the read API.
 *
 * @example
 *   curiomap init --yes --user-agent "curiomap/0.1 (me@example.org)"
 *   curiomap extract --limit 5
 *   curiomap countries "Hong Kong"
 *   curiomap serve --port 5000
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import fs from 'node:fs';
import path from 'node:path';
import countriesCommand from './commands/countries';
import extractCommand from './commands/extract';
import initCommand from './commands/init';
import serveCommand from './commands/serve';
import summaryCommand from './commands/summary';
import { describeError } from './shared/logger';

const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();
program
  .name('curiomap')
  .description('Attribute unusual Wikipedia articles to countries and serve the result')
  .version(version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(extractCommand);
program.addCommand(summaryCommand);
program.addCommand(countriesCommand);
program.addCommand(serveCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('curiomap', { font: 'Standard' });
  console.log(chalk.hex('#f4b860')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`[error] ${describeError(error)}`));
    process.exit(1);
  });
}
