/**
 * netsynth command-line interface
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { SampleGenerator } from '../generator/SampleGenerator';
import { SampleValidator } from '../domain/validation/SampleValidator';
import { formatSummary, summarize, type TableSummary } from '../analysis/summary';
import { writeCsv } from '../io/csv';
import { loadRunConfig, parseIntegerOption, type RunConfig, type RunConfigInput } from '../config/RunConfig';
import { isNetsynthError, wrapError } from '../core/errors';
import type { SeedingStrategy } from '../domain/types/sample';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface GenerateResult {
  output: string;
  summary: TableSummary;
}

interface GenerateFlags {
  samples?: number;
  seed?: number;
  output?: string;
  config?: string;
  seeding?: SeedingStrategy;
  includeServerDelay?: boolean;
  quiet?: boolean;
}

const RULE = '='.repeat(70);

/**
 * Generate, validate, persist and summarize one table
 */
export async function runGenerate(config: Readonly<RunConfig>, logger: Logger): Promise<GenerateResult> {
  logger.info(RULE);
  logger.info('SYNTHETIC CDN DATA GENERATOR');
  logger.info(RULE);
  logger.info(`Generating ${config.sampleCount} synthetic samples (seed ${config.seed}, ${config.seeding})...`);

  const generator = new SampleGenerator({
    parameters: config.parameters,
    seeding: config.seeding,
  });
  const table = generator.generate(config.sampleCount, config.seed);
  SampleValidator.validateTable(table);

  await writeCsv(config.output, table, { includeServerDelay: config.includeServerDelay });
  logger.info(`✓ Saved ${table.size} rows to '${config.output}'`);

  const summary = summarize(table);
  logger.info('');
  logger.info(formatSummary(summary));

  return { output: config.output, summary };
}

export function createProgram(logger: Logger = console): Command {
  const program = new Command();

  program
    .name('netsynth')
    .description('Seeded generator of correlated synthetic network performance samples')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => logger.info(text.trimEnd()),
      writeErr: (text) => logger.error(text.trimEnd()),
    });

  program
    .command('generate')
    .description('Generate a sample table and write it as CSV')
    .option('-n, --samples <count>', 'number of rows to generate (default 500)', parseCliInteger)
    .option('-s, --seed <seed>', 'seed for the random stream (default 42)', parseCliInteger)
    .option('-o, --output <path>', 'CSV file to write (default synthetic_cdn_data.csv)')
    .option('-c, --config <file>', 'JSON run configuration')
    .option('--seeding <strategy>', 'sequential or per-row', parseSeeding)
    .option('--include-server-delay', 'add a server_delay column to the CSV')
    .option('-q, --quiet', 'only report errors')
    .action(async (flags: GenerateFlags) => {
      const overrides: RunConfigInput = {
        sampleCount: flags.samples,
        seed: flags.seed,
        output: flags.output,
        seeding: flags.seeding,
        includeServerDelay: flags.includeServerDelay,
      };

      const config = await loadRunConfig({ file: flags.config, overrides });
      await runGenerate(config, flags.quiet ? quietLogger(logger) : logger);
    });

  return program;
}

/**
 * Parse argv and run; returns the process exit code
 */
export async function main(argv: string[], logger: Logger = console): Promise<number> {
  try {
    await createProgram(logger).parseAsync(argv);
    return 0;
  } catch (error) {
    // Commander has already reported its own usage errors
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const wrapped = wrapError(error);
    logger.error(isNetsynthError(error) ? wrapped.toString() : `❌ ${wrapped.message}`);
    return 1;
  }
}

function quietLogger(logger: Logger): Logger {
  return {
    info: () => undefined,
    warn: (message) => logger.warn(message),
    error: (message) => logger.error(message),
  };
}

function parseCliInteger(value: string): number {
  try {
    return parseIntegerOption('option', value);
  } catch {
    throw new InvalidArgumentError('Not an integer.');
  }
}

function parseSeeding(value: string): SeedingStrategy {
  if (value !== 'sequential' && value !== 'per-row') {
    throw new InvalidArgumentError("Expected 'sequential' or 'per-row'.");
  }
  return value;
}
