/**
 * Batch operations: flatten, reindex, revert and history.
 *
 * Each operation classifies first, then plans, then executes, so the plan never sees a
 * half-renamed directory.
 */

import { existsSync, readdirSync, rmdirSync } from 'fs';
import { dirname, resolve, sep } from 'path';
import { groupEntries } from './grouper.js';
import { logger, AppError } from './logger.js';
import { COMMON_LABEL, OperationLog, REVERT_LABEL, toMapping } from './operation-log.js';
import { planFlatten, planReindex, validateMapping, type ReindexOptions } from './planner.js';
import { assertSourcesExist, executeMapping, invertMapping } from './renamer.js';
import type { Entry, LogEntry, MimeOracle, PairReporter, RenameMapping } from './types.js';

const log = logger.child('relame');

export interface RelameOptions {
  operationLog: OperationLog;
  oracle: MimeOracle;
  report?: PairReporter;
}

export interface OperationResult {
  mapping: RenameMapping;
  /** False for dry runs and empty plans */
  applied: boolean;
}

function depth(path: string): number {
  return path.split(sep).length;
}

/**
 * Remove the given directories that are empty, deepest first.
 */
export function pruneEmptyDirectories(directories: Iterable<string>): string[] {
  const removed: string[] = [];
  const ordered = [...new Set(directories)].sort((a, b) => depth(b) - depth(a));
  for (const directory of ordered) {
    if (existsSync(directory) && readdirSync(directory).length === 0) {
      rmdirSync(directory);
      removed.push(directory);
    }
  }
  return removed;
}

export class Relame {
  private operationLog: OperationLog;
  private oracle: MimeOracle;
  private report?: PairReporter;

  constructor(options: RelameOptions) {
    this.operationLog = options.operationLog;
    this.oracle = options.oracle;
    this.report = options.report;
  }

  private apply(base: string, mapping: RenameMapping, dryRun: boolean): OperationResult {
    if (mapping.size === 0) {
      log.info('Nothing to rename', { base });
      return { mapping, applied: false };
    }

    if (dryRun) {
      for (const [source, destination] of mapping) {
        this.report?.(source, destination);
      }
      return { mapping, applied: false };
    }

    // A log that cannot be appended to must stop the run before anything moves.
    this.operationLog.load(COMMON_LABEL);
    executeMapping(mapping, { base, report: this.report });
    this.operationLog.dump(mapping, COMMON_LABEL);
    log.info(`Renamed ${mapping.size} entr${mapping.size === 1 ? 'y' : 'ies'}`, { base });
    return { mapping, applied: true };
  }

  /**
   * Pull every file under base up into base, then drop the emptied subdirectories.
   */
  async flatten(base: string, dryRun = false): Promise<OperationResult> {
    const root = resolve(base);
    const groups = await groupEntries(root, { recursive: true, oracle: this.oracle });

    const files: Entry[] = [];
    const directories: string[] = [];
    for (const [kind, entries] of groups) {
      if (kind === 'directory') {
        directories.push(...entries.map(entry => entry.path));
      } else {
        files.push(...entries);
      }
    }

    const result = this.apply(root, planFlatten(root, files), dryRun);
    if (result.applied) {
      const removed = pruneEmptyDirectories(directories);
      log.debug(`Removed ${removed.length} empty director${removed.length === 1 ? 'y' : 'ies'}`);
    }
    return result;
  }

  async reindex(base: string, options: ReindexOptions, dryRun = false): Promise<OperationResult> {
    const root = resolve(base);
    const groups = await groupEntries(root, { recursive: false, oracle: this.oracle });
    return this.apply(root, planReindex(root, groups, options), dryRun);
  }

  /**
   * Undo the most recent logged operation and record the undo under the revert label.
   */
  revert(): OperationResult {
    const entries = this.operationLog.load(COMMON_LABEL);
    const last = entries[entries.length - 1];
    if (last === undefined) {
      throw new AppError(
        `Nothing to revert: ${this.operationLog.pathFor(COMMON_LABEL)} has no entries`,
        'LOG_CORRUPT',
        1,
        { path: this.operationLog.pathFor(COMMON_LABEL) }
      );
    }

    const inverse = invertMapping(toMapping(last));
    validateMapping(inverse);
    assertSourcesExist(inverse);
    this.operationLog.load(REVERT_LABEL);

    this.operationLog.popLog(COMMON_LABEL);
    const base = commonDirectory([...inverse.keys(), ...inverse.values()]);
    executeMapping(inverse, { base, report: this.report });
    this.operationLog.dump(inverse, REVERT_LABEL);

    // Type directories created by the reverted operation are left empty.
    pruneEmptyDirectories([...inverse.keys()].map(source => dirname(source)));
    return { mapping: inverse, applied: true };
  }

  history(label: string = COMMON_LABEL): LogEntry[] {
    return this.operationLog.load(label);
  }
}

/**
 * Deepest directory containing every path's parent.
 */
export function commonDirectory(paths: string[]): string {
  const parents = paths.map(path => dirname(path).split(sep));
  const first = parents[0] ?? [];
  let length = first.length;
  for (const parts of parents) {
    let shared = 0;
    while (shared < Math.min(length, parts.length) && parts[shared] === first[shared]) {
      shared += 1;
    }
    length = shared;
  }
  return first.slice(0, length).join(sep) || sep;
}
