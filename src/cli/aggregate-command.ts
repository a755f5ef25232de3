import type { Command } from 'commander';
import * as path from 'path';
import chalk from 'chalk';
import { loadConfig, parseAggregateOptions } from '../boundaries/index';
import { runAggregation } from '../aggregation/aggregate';
import { error as logError, log } from '../output/logger';
import { handleUnknownError } from '../errors/index';

/*
 * Registers `aggregate`: joins the per-attribute verified records into one
 * data file and one sources file per run.
 */
export function registerAggregateCommand(program: Command): void {
  program
    .command('aggregate')
    .description('Join verified attribute records into per-person data and sources files')
    .option('--prefix <name>', 'Output file prefix', 'people')
    .option('--output-dir <dir>', 'Directory for the joined files (default: OutputDir)')
    .option('--config <path>', 'Path to a custom .factledger.ini config file')
    .action((rawOptions: unknown) => {
      try {
        const options = parseAggregateOptions(rawOptions);
        const config = loadConfig(process.cwd(), options.config);
        const outputDir = options.outputDir ? path.resolve(process.cwd(), options.outputDir) : config.outputDir;
        const result = runAggregation({ inputDir: config.outputDir, outputDir, prefix: options.prefix });

        log(chalk.green(`✓ Aggregated ${result.people} ${result.people === 1 ? 'person' : 'people'}`));
        log(`  Data:    ${result.dataPath}`);
        log(`  Sources: ${result.sourcesPath}`);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Aggregating records');
        logError(`Error: ${err.message}`);
        process.exit(1);
      }
    });
}
