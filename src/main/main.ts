#!/usr/bin/env node
/**
 * Command-line entry point. Parses `<source> [destination]`, then hands the
 * resolved paths to the run driver.
 */
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { DEFAULT_DESTINATION } from '../common/buckets';
import { COLLISION_POLICIES, isCollisionPolicy } from './config';
import { EXIT_FATAL, EXIT_OK, runSort, type RunOptions } from './run';
import { createSortLogger } from '../utils/sortLogger';
import type { CollisionPolicy } from '../types/sort';

export const EXIT_USAGE = 64;

type CliOptions = {
  onCollision: CollisionPolicy;
  verbose?: boolean;
  quiet?: boolean;
};

const parseCollisionPolicy = (value: string): CollisionPolicy => {
  if (!isCollisionPolicy(value)) {
    throw new InvalidArgumentError(`Expected one of: ${COLLISION_POLICIES.join(', ')}.`);
  }
  return value;
};

export const runCli = async (argv: string[], options: RunOptions = {}): Promise<number> => {
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name('extension-sorter')
    .description('Move every file under <source> into <destination>/<extension>/')
    .argument('<source>', 'directory to sort')
    .argument('[destination]', 'destination root', DEFAULT_DESTINATION)
    .option(
      '--on-collision <policy>',
      `what to do when a file with the same name is already sorted (${COLLISION_POLICIES.join(' | ')})`,
      parseCollisionPolicy,
      'overwrite',
    )
    .option('-v, --verbose', 'log every move')
    .option('-q, --quiet', 'only log issues and the completion line')
    .exitOverride()
    .configureOutput({
      outputError: (message, write) => write(chalk.red(message)),
    })
    .action(async (source: string, destination: string) => {
      const opts = program.opts<CliOptions>();
      const outcome = await runSort(
        {
          source,
          destination,
          collisionPolicy: opts.onCollision,
          verbose: opts.verbose,
          quiet: opts.quiet,
        },
        options,
      );
      exitCode = outcome.exitCode;
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
};

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      createSortLogger().logError(error);
      process.exitCode = EXIT_FATAL;
    });
}
