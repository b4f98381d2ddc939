/**
 * Operation log: one JSON array of executed mappings per label, stored as `{root}/{label}.log`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { AppError, logger } from './logger.js';
import type { LogEntry, RenameMapping } from './types.js';

const log = logger.child('operation-log');

export const COMMON_LABEL = 'common';
export const REVERT_LABEL = 'revert';

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(item => typeof item === 'string')
  );
}

export function toLogEntry(mapping: RenameMapping): LogEntry {
  const entry: LogEntry = {};
  for (const [source, destination] of mapping) {
    entry[resolve(source)] = resolve(destination);
  }
  return entry;
}

export function toMapping(entry: LogEntry): RenameMapping {
  return new Map(Object.entries(entry));
}

export class OperationLog {
  private root: string;

  constructor(root: string) {
    this.root = root;
  }

  pathFor(label: string): string {
    return join(this.root, `${label}.log`);
  }

  private read(label: string): LogEntry[] {
    const path = this.pathFor(label);
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new AppError(
        `Cannot read log ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'LOG_CORRUPT',
        1,
        { path }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new AppError(
        `Log ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'LOG_CORRUPT',
        1,
        { path }
      );
    }

    if (!Array.isArray(parsed) || !parsed.every(isLogEntry)) {
      throw new AppError(
        `Log ${path} must be an array of objects mapping path strings to path strings`,
        'LOG_CORRUPT',
        1,
        { path }
      );
    }

    return parsed;
  }

  private write(label: string, entries: LogEntry[]): void {
    const path = this.pathFor(label);
    try {
      mkdirSync(this.root, { recursive: true });
      writeFileSync(path, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new AppError(
        `Cannot write log ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'LOG_WRITE_FAILURE',
        1,
        { path }
      );
    }
    log.debug(`Wrote ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'} to ${path}`);
  }

  /**
   * Append a mapping to the label's log, or start the log afresh when `overwrite` is set.
   */
  dump(mapping: RenameMapping, label: string = COMMON_LABEL, overwrite = false): LogEntry {
    const existing = overwrite || !existsSync(this.pathFor(label)) ? [] : this.read(label);
    const entry = toLogEntry(mapping);
    this.write(label, [...existing, entry]);
    return entry;
  }

  /**
   * Remove and return the most recent entry.
   */
  popLog(label: string = COMMON_LABEL): LogEntry {
    const entries = this.read(label);
    const last = entries.pop();
    if (last === undefined) {
      throw new AppError(`Log ${this.pathFor(label)} has no entries to revert`, 'LOG_CORRUPT', 1, {
        path: this.pathFor(label),
      });
    }
    this.write(label, entries);
    return last;
  }

  /**
   * Entries oldest first; a label that was never written has none.
   */
  load(label: string = COMMON_LABEL): LogEntry[] {
    if (!existsSync(this.pathFor(label))) {
      return [];
    }
    return this.read(label);
  }
}
