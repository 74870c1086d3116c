import fs from 'fs/promises';
import path from 'path';
import { errorCode } from '../common/errors';
import type { CollisionPolicy, MoveOutcome } from '../types/sort';

const pathExists = async (targetPath: string) => {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/**
 * First free sibling of `targetPath` of the form `stem (n).ext`.
 */
export const nextFreePath = async (targetPath: string): Promise<string> => {
  const parsed = path.parse(targetPath);
  for (let index = 1; ; index += 1) {
    const candidate = path.join(parsed.dir, `${parsed.name} (${index})${parsed.ext}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
};

const copyEntry = async (sourcePath: string, targetPath: string) => {
  const stats = await fs.lstat(sourcePath);
  if (stats.isSymbolicLink()) {
    const linkTarget = await fs.readlink(sourcePath);
    await fs.rm(targetPath, { force: true });
    await fs.symlink(linkTarget, targetPath);
    return;
  }
  await fs.copyFile(sourcePath, targetPath);
  try {
    await fs.utimes(targetPath, stats.atime, stats.mtime);
  } catch (error: unknown) {
    await fs.rm(targetPath, { force: true });
    throw error;
  }
};

const copyThenUnlink = async (sourcePath: string, targetPath: string) => {
  await copyEntry(sourcePath, targetPath);
  try {
    await fs.unlink(sourcePath);
  } catch (error: unknown) {
    // The source must stay the only copy.
    await fs.rm(targetPath, { force: true });
    throw error;
  }
};

/**
 * Moves a single file, falling back to copy + unlink when the target lives on
 * another device. The copy keeps access and modification times; a symlink is
 * recreated as a link rather than copied through.
 */
export const moveFile = async (
  sourcePath: string,
  targetPath: string,
  policy: CollisionPolicy = 'overwrite',
): Promise<MoveOutcome> => {
  let finalPath = targetPath;
  if (policy !== 'overwrite' && (await pathExists(targetPath))) {
    if (policy === 'skip') {
      return { status: 'skipped', targetPath, message: 'target already exists' };
    }
    finalPath = await nextFreePath(targetPath);
  }

  try {
    await fs.rename(sourcePath, finalPath);
    return { status: 'moved', targetPath: finalPath, method: 'rename' };
  } catch (error: unknown) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
  }

  await copyThenUnlink(sourcePath, finalPath);
  return { status: 'moved', targetPath: finalPath, method: 'copy' };
};

export type MoveFileFn = typeof moveFile;
