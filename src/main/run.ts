import { resolveSortConfig, type SortConfig, type SortConfigInput } from './config';
import { ensureDestination, validateSource } from './preflight';
import { sortTree, type SortOptions } from './sorter';
import { createSortLogger, type SortLogger } from '../utils/sortLogger';
import type { PreflightFailure, SortReport } from '../types/sort';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

export interface RunOutcome {
  exitCode: number;
  config: SortConfig;
  report?: SortReport;
  fatal?: PreflightFailure;
}

export interface RunOptions extends Pick<SortOptions, 'moveFile' | 'readDirectory'> {
  logger?: SortLogger;
}

/**
 * Validates both roots, sorts the tree and reports the aggregated outcome.
 * Local move and read failures do not change the exit code.
 */
export const runSort = async (
  input: SortConfigInput,
  options: RunOptions = {},
): Promise<RunOutcome> => {
  const config = resolveSortConfig(input);
  const logger = options.logger ?? createSortLogger(config.logLevel);

  const source = await validateSource(config.source);
  if (!source.ok) {
    logger.logFatal(source.failure);
    return { exitCode: EXIT_FATAL, config, fatal: source.failure };
  }

  const destination = await ensureDestination(config.destination);
  if (!destination.ok) {
    logger.logFatal(destination.failure);
    return { exitCode: EXIT_FATAL, config, fatal: destination.failure };
  }

  logger.logRunStart(source.path, destination.path);
  const startedAt = Date.now();
  const report = await sortTree(source.path, destination.path, {
    collisionPolicy: config.collisionPolicy,
    onResult: logger.logResult,
    onIssue: logger.logIssue,
    moveFile: options.moveFile,
    readDirectory: options.readDirectory,
  });
  logger.logSummary(report, Date.now() - startedAt);

  return { exitCode: EXIT_OK, config, report };
};
