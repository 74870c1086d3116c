import path from 'path';
import { DEFAULT_DESTINATION } from '../common/buckets';
import type { CollisionPolicy } from '../types/sort';

export type LogLevel = 'quiet' | 'normal' | 'verbose';

export interface SortConfig {
  source: string;
  destination: string;
  collisionPolicy: CollisionPolicy;
  logLevel: LogLevel;
  cwd: string;
}

export const COLLISION_POLICIES: readonly CollisionPolicy[] = ['overwrite', 'skip', 'rename'];

export const isCollisionPolicy = (value: unknown): value is CollisionPolicy =>
  COLLISION_POLICIES.some((policy) => policy === value);

export interface SortConfigInput {
  source: string;
  destination?: string;
  collisionPolicy?: string;
  verbose?: boolean;
  quiet?: boolean;
  cwd?: string;
}

/**
 * Resolves both paths against `cwd` and validates the collision policy.
 * Throws on an unknown policy; callers treat that as a usage error.
 */
export const resolveSortConfig = (input: SortConfigInput): SortConfig => {
  const cwd = input.cwd ?? process.cwd();
  const policy = input.collisionPolicy ?? 'overwrite';
  if (!isCollisionPolicy(policy)) {
    throw new Error(
      `Unknown collision policy "${policy}" (expected one of: ${COLLISION_POLICIES.join(', ')})`,
    );
  }

  let logLevel: LogLevel = 'normal';
  if (input.quiet) {
    logLevel = 'quiet';
  } else if (input.verbose) {
    logLevel = 'verbose';
  }

  return {
    source: path.resolve(cwd, input.source),
    destination: path.resolve(cwd, input.destination ?? DEFAULT_DESTINATION),
    collisionPolicy: policy,
    logLevel,
    cwd,
  };
};
