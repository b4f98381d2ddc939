/**
 * Two-phase renamer.
 *
 * Every source is first parked in a fresh staging directory inside the base, then moved to its
 * destination. Because no destination is written while any source still sits at its original
 * path, overlapping and cyclic mappings (A → B, B → A) cannot clobber each other.
 */

import { existsSync, mkdirSync, mkdtempSync, renameSync, rmdirSync } from 'fs';
import { basename, dirname, join } from 'path';
import { AppError, logger } from './logger.js';
import type { PairReporter, RenameMapping } from './types.js';

const log = logger.child('renamer');

export const STAGING_PREFIX = '.relame-staging-';

export interface ExecuteOptions {
  /** Directory the staging area is created in; must share a filesystem with every path */
  base: string;
  /** Called once per completed pair; omit to suppress reporting */
  report?: PairReporter;
}

type Pair = { source: string; destination: string };

function renameFailure(message: string, error: unknown, pair: Pair): AppError {
  return new AppError(
    `${message}: ${error instanceof Error ? error.message : String(error)}`,
    'RENAME_FAILED',
    1,
    pair
  );
}

function move(from: string, to: string, pair: Pair): void {
  try {
    renameSync(from, to);
  } catch (error) {
    throw renameFailure(`Failed to move ${from} to ${to}`, error, pair);
  }
}

function ensureParent(path: string, pair: Pair): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (error) {
    throw renameFailure(`Failed to create ${dirname(path)}`, error, pair);
  }
}

/**
 * Throws NOT_FOUND for the first source that is gone, before anything is staged.
 */
export function assertSourcesExist(mapping: RenameMapping): void {
  for (const [source, destination] of mapping) {
    if (!existsSync(source)) {
      throw new AppError(`No such file or directory: ${source}`, 'NOT_FOUND', 1, { source, destination });
    }
  }
}

export function executeMapping(mapping: RenameMapping, options: ExecuteOptions): void {
  if (mapping.size === 0) {
    return;
  }

  assertSourcesExist(mapping);

  const staging = mkdtempSync(join(options.base, STAGING_PREFIX));
  log.debug(`Staging ${mapping.size} entr${mapping.size === 1 ? 'y' : 'ies'}`, { staging });

  const staged: (Pair & { parked: string })[] = [];
  let index = 0;
  for (const [source, destination] of mapping) {
    // The index keeps same-named destinations in different directories apart.
    const parked = join(staging, `${index}_${basename(destination)}`);
    move(source, parked, { source, destination });
    staged.push({ source, destination, parked });
    index += 1;
  }

  for (const { source, destination, parked } of staged) {
    ensureParent(destination, { source, destination });
    move(parked, destination, { source, destination });
    options.report?.(source, destination);
  }

  rmdirSync(staging);
}

/**
 * destination → source for every pair.
 */
export function invertMapping(mapping: RenameMapping): RenameMapping {
  const inverse: RenameMapping = new Map();
  for (const [source, destination] of mapping) {
    inverse.set(destination, source);
  }
  return inverse;
}
