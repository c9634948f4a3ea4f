#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { DomainController } from './controllers/DomainController';
import { DEFAULT_CONFIG_PATH, resolveScanOptions, type IScanOptions } from './config/ScanOptions';
import { toError } from './errors';

type CliOptions = {
  config: string;
  concurrency: number;
  timeout?: number;
  strict: boolean;
  verbose: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be zero or a positive integer.');
  }
  return parsed;
}

/**
 * Build the command-line program
 */
export function createProgram(): Command {
  return new Command()
    .name('domain-scout')
    .description('Check for available domain names')
    .version('1.0.0')
    .argument('<input_file>', 'File containing list of base strings')
    .option('--config <path>', 'Configuration file path', DEFAULT_CONFIG_PATH)
    .option('--concurrency <n>', 'Number of WHOIS queries in flight at once', parsePositiveInt, 1)
    .option(
      '--timeout <ms>',
      'Per-query timeout in milliseconds (default: none, or 10000 when --concurrency is above 1; 0 only without --concurrency)',
      parseNonNegativeInt
    )
    .option('--strict', 'Report failed queries as inconclusive instead of available', false)
    .option('--verbose', 'Print resolved options and per-query timings', false);
}

/**
 * Parse command-line arguments into scan options
 * @param argv - Full argv, node binary and script included
 * @param program - Program to parse with, for callers that override exit handling
 */
export function parseArguments(argv: string[], program: Command = createProgram()): IScanOptions {
  program.parse(argv);
  const opts = program.opts<CliOptions>();
  const [inputPath] = program.args;

  return resolveScanOptions({
    inputPath: inputPath ?? '',
    configPath: opts.config,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeout,
    strictVerdicts: opts.strict,
    verbose: opts.verbose
  });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const options = parseArguments(argv);
  await new DomainController().run(options);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${toError(error).message}`);
    process.exit(1);
  });
}
