import util from 'util';
import { bold, cyan, dim, green, red, yellow } from 'colorette';
import type { LogLevel } from '../main/config';
import type {
  PreflightFailure,
  SortIssue,
  SortMoveResult,
  SortReport,
} from '../types/sort';

const numberFormatter = new Intl.NumberFormat('en-US');

const timestamp = () => dim(new Date().toISOString());

const formatDuration = (durationMs: number) => `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

const formatNumber = (value: number) => numberFormatter.format(value);

const plural = (count: number, noun: string) => `${formatNumber(count)} ${noun}${count === 1 ? '' : 's'}`;

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.log(`   ${line}`));
  });
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.error(`   ${line}`));
  });
};

export interface BucketSummary {
  bucket: string;
  count: number;
  /** Most frequent MIME type among the files moved into the bucket */
  mimeType: string | null;
}

export const summariseBuckets = (results: SortMoveResult[]): BucketSummary[] => {
  const buckets = new Map<string, { count: number; mimeCounts: Map<string, number> }>();
  results.forEach((result) => {
    if (result.status !== 'moved') return;
    const entry = buckets.get(result.bucket) ?? { count: 0, mimeCounts: new Map<string, number>() };
    entry.count += 1;
    if (result.mimeType) {
      entry.mimeCounts.set(result.mimeType, (entry.mimeCounts.get(result.mimeType) ?? 0) + 1);
    }
    buckets.set(result.bucket, entry);
  });

  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([bucket, entry]) => {
      let mimeType: string | null = null;
      let best = 0;
      for (const [type, count] of entry.mimeCounts) {
        if (count > best) {
          best = count;
          mimeType = type;
        }
      }
      return { bucket, count: entry.count, mimeType };
    });
};

const issueHeadline = (issue: SortIssue) =>
  issue.kind === 'move' ? `Could not move ${issue.path}` : `Could not read directory ${issue.path}`;

const fatalHeadline = (failure: PreflightFailure) =>
  failure.kind === 'source-invalid'
    ? `Source directory is invalid: ${failure.path}`
    : `Could not create destination directory: ${failure.path}`;

export interface SortLogger {
  logRunStart: (source: string, destination: string) => void;
  logResult: (result: SortMoveResult) => void;
  logIssue: (issue: SortIssue) => void;
  logFatal: (failure: PreflightFailure) => void;
  logSummary: (report: SortReport, durationMs: number) => void;
  logError: (error: unknown) => void;
}

export const createSortLogger = (level: LogLevel = 'normal'): SortLogger => {
  const isVerbose = level === 'verbose';
  const isQuiet = level === 'quiet';

  const logRunStart = (source: string, destination: string) => {
    if (isQuiet) return;
    emit(`${cyan('[sort]')} ${bold('Sorting files by extension')}`, [
      `Source: ${source}`,
      `Destination: ${destination}`,
    ]);
  };

  const logResult = (result: SortMoveResult) => {
    if (!isVerbose || result.status === 'failed') return;
    if (result.status === 'skipped') {
      emit(`${yellow('[skip]')} ${result.sourcePath}`, [`Reason: ${result.message ?? 'skipped'}`]);
      return;
    }
    const via = result.method === 'copy' ? dim(' (copied across devices)') : '';
    emit(`${green('[move]')} ${result.sourcePath} -> ${result.targetPath}${via}`);
  };

  const logIssue = (issue: SortIssue) => {
    const details = [`Reason: ${issue.message}`];
    if (issue.code) {
      details.push(`Code: ${issue.code}`);
    }
    emitError(`${red('[issue]')} ${issueHeadline(issue)}`, details);
  };

  const logFatal = (failure: PreflightFailure) => {
    const details = [`Reason: ${failure.message}`];
    if (failure.code) {
      details.push(`Code: ${failure.code}`);
    }
    emitError(`${red('[fatal]')} ${fatalHeadline(failure)}`, details);
  };

  const logSummary = (report: SortReport, durationMs: number) => {
    const moved = report.results.filter((result) => result.status === 'moved').length;
    const skipped = report.results.filter((result) => result.status === 'skipped').length;
    const failed = report.results.filter((result) => result.status === 'failed').length;
    const header = report.ok
      ? green('Sorting complete')
      : yellow(`Sorting complete with ${plural(report.issues.length, 'issue')}`);

    if (isQuiet) {
      emit(header);
      return;
    }

    const details = [
      `Moved: ${formatNumber(moved)}, skipped: ${formatNumber(skipped)}, failed: ${formatNumber(failed)}`,
      `Directories walked: ${formatNumber(report.directoriesVisited)}`,
    ];
    report.excluded.forEach((excludedPath) => {
      details.push(`Excluded destination: ${excludedPath}`);
    });
    const buckets = summariseBuckets(report.results);
    if (buckets.length) {
      details.push('Buckets:');
      buckets.forEach((bucket) => {
        const type = bucket.mimeType ? ` (${bucket.mimeType})` : '';
        details.push(`  ${bucket.bucket}: ${plural(bucket.count, 'file')}${type}`);
      });
    }
    details.push(`Duration: ${formatDuration(durationMs)}`);
    emit(header, details);
  };

  const logError = (error: unknown) => {
    const err = error instanceof Error ? error : new Error(util.inspect(error));
    emitError(`${red('[error]')} Unexpected failure`, [err.stack ?? err.message]);
  };

  return { logRunStart, logResult, logIssue, logFatal, logSummary, logError };
};
