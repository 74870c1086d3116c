import fs from 'fs/promises';
import path from 'path';
import { lookup as lookupMimeType } from 'mime-types';
import { bucketNameFor } from '../common/buckets';
import { errorCode, errorMessage } from '../common/errors';
import { moveFile, type MoveFileFn } from './mover';
import type {
  CollisionPolicy,
  SortIssue,
  SortMoveResult,
  SortReport,
} from '../types/sort';

export type ReadDirectoryFn = (directoryPath: string) => Promise<string[]>;

export interface SortOptions {
  collisionPolicy?: CollisionPolicy;
  /** Called once per file, in the order files are handled. */
  onResult?: (result: SortMoveResult) => void;
  onIssue?: (issue: SortIssue) => void;
  moveFile?: MoveFileFn;
  readDirectory?: ReadDirectoryFn;
}

type EntryKind = 'dir' | 'file' | 'other';

const defaultReadDirectory: ReadDirectoryFn = (directoryPath) => fs.readdir(directoryPath);

const classifyEntry = async (entryPath: string): Promise<EntryKind> => {
  try {
    const stats = await fs.stat(entryPath);
    if (stats.isDirectory()) return 'dir';
    if (stats.isFile()) return 'file';
    return 'other';
  } catch {
    // Broken symlinks and entries that vanish mid-walk are neither.
    return 'other';
  }
};

const canonicalPath = async (targetPath: string) => {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return path.resolve(targetPath);
  }
};

/**
 * Walks `sourceRoot` depth first and moves every regular file into
 * `destinationRoot/<bucket>/<name>`. The destination root is never entered,
 * even when it lives inside the source tree. Local failures are recorded on
 * the report; nothing here throws for a single unreadable directory or file.
 */
export const sortTree = async (
  sourceRoot: string,
  destinationRoot: string,
  options: SortOptions = {},
): Promise<SortReport> => {
  const policy = options.collisionPolicy ?? 'overwrite';
  const move = options.moveFile ?? moveFile;
  const readDirectory = options.readDirectory ?? defaultReadDirectory;

  const report: SortReport = {
    sourceRoot,
    destinationRoot,
    results: [],
    issues: [],
    directoriesVisited: 0,
    excluded: [],
    ignored: [],
    ok: true,
  };

  const recordIssue = (issue: SortIssue) => {
    report.issues.push(issue);
    options.onIssue?.(issue);
  };

  const recordResult = (result: SortMoveResult) => {
    report.results.push(result);
    options.onResult?.(result);
  };

  const sortFile = async (filePath: string) => {
    const name = path.basename(filePath);
    const bucket = bucketNameFor(name);
    const targetDir = path.join(destinationRoot, bucket);
    const targetPath = path.join(targetDir, name);
    const mimeType = lookupMimeType(name) || null;

    const currentDirCanonical = await canonicalPath(path.dirname(filePath));
    if (currentDirCanonical === (await canonicalPath(targetDir))) {
      recordResult({
        sourcePath: filePath,
        targetPath,
        bucket,
        status: 'skipped',
        mimeType,
        message: 'already in place',
      });
      return;
    }

    try {
      await fs.mkdir(targetDir, { recursive: true });
      const outcome = await move(filePath, targetPath, policy);
      if (outcome.status === 'skipped') {
        recordResult({
          sourcePath: filePath,
          targetPath: outcome.targetPath,
          bucket,
          status: 'skipped',
          mimeType,
          message: outcome.message,
        });
        return;
      }
      recordResult({
        sourcePath: filePath,
        targetPath: outcome.targetPath,
        bucket,
        status: 'moved',
        mimeType,
        method: outcome.method,
      });
    } catch (error: unknown) {
      const message = errorMessage(error);
      recordIssue({ kind: 'move', path: filePath, message, code: errorCode(error) });
      recordResult({
        sourcePath: filePath,
        targetPath,
        bucket,
        status: 'failed',
        mimeType,
        message,
      });
    }
  };

  const pending: string[] = [sourceRoot];

  while (pending.length > 0) {
    const currentDir = pending.pop();
    if (currentDir === undefined) break;

    let names: string[];
    try {
      names = await readDirectory(currentDir);
    } catch (error: unknown) {
      recordIssue({
        kind: 'directory-read',
        path: currentDir,
        message: errorMessage(error),
        code: errorCode(error),
      });
      // eslint-disable-next-line no-continue
      continue;
    }
    report.directoriesVisited += 1;

    const subdirectories: string[] = [];
    for (const name of names) {
      const entryPath = path.join(currentDir, name);
      const kind = await classifyEntry(entryPath);

      if (kind === 'dir') {
        // Resolved on every visit: the tree changes as files leave it.
        const entryCanonical = await canonicalPath(entryPath);
        const destinationCanonical = await canonicalPath(destinationRoot);
        if (entryCanonical === destinationCanonical) {
          report.excluded.push(entryPath);
        } else {
          subdirectories.push(entryPath);
        }
      } else if (kind === 'file') {
        await sortFile(entryPath);
      } else {
        report.ignored.push(entryPath);
      }
    }

    // Reversed so the first listed subdirectory is walked first.
    for (let index = subdirectories.length - 1; index >= 0; index -= 1) {
      pending.push(subdirectories[index]);
    }
  }

  report.ok = report.issues.length === 0;
  return report;
};
