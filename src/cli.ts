#!/usr/bin/env node
/**
 * dnsblast command line
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { DEFAULTS, MAX_TIMEOUT_MS, MISMATCH_POLICIES, RECORD_TYPES, parseServerAddress } from './config';
import { ConfigError, errorMessage } from './errors';
import { DnsLoadTester } from './load-tester';
import { logger } from './logger';
import { LoadTestOptions } from './types';

type CliOptions = {
  threads: number;
  number: number;
  domains: string;
  record: string;
  server: string;
  timeout: number;
  debug: number;
  mismatch: string;
};

function integerArg(min: number, max?: number): (value: string) => number {
  return (value: string) => {
    const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (!(parsed >= min) || (max !== undefined && parsed > max)) {
      const range = max === undefined ? `>= ${min}` : `in [${min}, ${max}]`;
      throw new InvalidArgumentError(`Expected an integer ${range}.`);
    }
    return parsed;
  };
}

function debugArg(value: string): number {
  if (value !== '0' && value !== '1' && value !== '2') {
    throw new InvalidArgumentError('Expected 0, 1 or 2.');
  }
  return parseInt(value, 10);
}

function serverArg(value: string): string {
  try {
    parseServerAddress(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name('dnsblast')
    .description('Fire concurrent DNS queries at a resolver and report outcome counts')
    .option('-p, --threads <count>', 'number of workers', integerArg(1), DEFAULTS.threads)
    .option('-n, --number <count>', 'queries per worker', integerArg(0), DEFAULTS.queries)
    .option('-d, --domains <file>', 'file of domains to pick from, one per line', DEFAULTS.domainsFile)
    .addOption(
      new Option('-r, --record <type>', 'record type to query')
        .choices(RECORD_TYPES)
        .default(DEFAULTS.recordType)
    )
    .requiredOption('-s, --server <address>', 'resolver address, ip:port', serverArg)
    .option('-t, --timeout <ms>', 'timeout for each request in milliseconds', integerArg(1, MAX_TIMEOUT_MS), DEFAULTS.timeout)
    .option('-v, --debug <level>', '0: summary only, 1: progress, 2: every query', debugArg, DEFAULTS.verbosity)
    .addOption(
      new Option('--mismatch <policy>', 'receive window after a reply with the wrong id')
        .choices(MISMATCH_POLICIES)
        .default(DEFAULTS.mismatchPolicy)
    );
}

/**
 * Parse command line arguments (without the node and script entries) into load test options
 */
export function parseCliOptions(argv: string[], program: Command = createProgram()): LoadTestOptions {
  program.parse(argv, { from: 'user' });
  const opts = program.opts<CliOptions>();

  return {
    server: opts.server,
    threads: opts.threads,
    queries: opts.number,
    domainsFile: opts.domains,
    recordType: opts.record,
    timeout: opts.timeout,
    verbosity: opts.debug,
    mismatchPolicy: opts.mismatch
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliOptions(argv);

  try {
    await new DnsLoadTester(options).run();
    return 0;
  } catch (error) {
    const label = error instanceof ConfigError ? 'Configuration error' : 'Error';
    logger.error(chalk.red(`${label}: ${errorMessage(error)}`));
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error(chalk.red(errorMessage(error)));
      process.exitCode = 1;
    }
  );
}
