import fs from 'fs/promises';
import path from 'path';
import { errorCode, errorMessage } from '../common/errors';
import type { PreflightResult } from '../types/sort';

export const validateSource = async (sourcePath: string): Promise<PreflightResult> => {
  const absolute = path.resolve(sourcePath);
  try {
    const stats = await fs.stat(absolute);
    if (!stats.isDirectory()) {
      return {
        ok: false,
        failure: {
          kind: 'source-invalid',
          path: absolute,
          message: 'Source is not a directory',
          code: 'ENOTDIR',
        },
      };
    }
  } catch (error: unknown) {
    const code = errorCode(error);
    return {
      ok: false,
      failure: {
        kind: 'source-invalid',
        path: absolute,
        message: code === 'ENOENT' ? 'Source directory does not exist' : errorMessage(error),
        code,
      },
    };
  }
  return { ok: true, path: absolute };
};

export const ensureDestination = async (destinationPath: string): Promise<PreflightResult> => {
  const absolute = path.resolve(destinationPath);
  try {
    await fs.mkdir(absolute, { recursive: true });
    const stats = await fs.stat(absolute);
    if (!stats.isDirectory()) {
      return {
        ok: false,
        failure: {
          kind: 'destination-uncreatable',
          path: absolute,
          message: 'Destination exists and is not a directory',
          code: 'ENOTDIR',
        },
      };
    }
  } catch (error: unknown) {
    return {
      ok: false,
      failure: {
        kind: 'destination-uncreatable',
        path: absolute,
        message: errorMessage(error),
        code: errorCode(error),
      },
    };
  }
  return { ok: true, path: absolute };
};
