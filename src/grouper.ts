/**
 * Grouper: partitions a directory's entries into typed buckets.
 */

import { lstatSync, statSync } from 'fs';
import { basename, extname } from 'path';
import fg from 'fast-glob';
import { classify, isClassifiable } from './classifier.js';
import { AppError, errnoCode, logger } from './logger.js';
import { createGroups, type BucketKind, type Entry, type Groups, type MimeOracle } from './types.js';

const log = logger.child('grouper');

export interface GroupOptions {
  recursive: boolean;
  oracle: MimeOracle;
}

const SUFFIX_BUCKETS: Record<string, BucketKind> = {
  '.gif': 'gif',
  '.pdf': 'pdf',
  '.psd': 'psd',
};

export function stem(path: string): string {
  return basename(path, extname(path));
}

export function assertDirectory(path: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(path).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new AppError(`No such directory: ${path}`, 'NOT_FOUND', 1, { path });
    }
    throw error;
  }
  if (!isDirectory) {
    throw new AppError(`Not a directory: ${path}`, 'NOT_A_DIRECTORY', 1, { path });
  }
}

/**
 * Bucket for a classified entry. Extension-specific kinds win over MIME categories,
 * cover images over plain images.
 */
export function bucketOf(entry: Entry): BucketKind {
  if (entry.isDirectory) return 'directory';

  const bySuffix = SUFFIX_BUCKETS[entry.suffix];
  if (bySuffix) return bySuffix;

  switch (entry.kind) {
    case 'image':
      return stem(entry.path).trim().toLowerCase().startsWith('cover') ? 'cover' : 'image';
    case 'video':
      return 'video';
    case 'audio':
      return 'audio';
    default:
      return 'unknown';
  }
}

/**
 * Absolute paths under base in sorted order; one level unless recursive.
 */
export async function listEntries(base: string, recursive: boolean): Promise<string[]> {
  const paths = await fg(recursive ? '**' : '*', {
    cwd: base,
    onlyFiles: false,
    dot: true,
    followSymbolicLinks: false,
    absolute: true,
    unique: true,
  });
  return paths.sort();
}

export async function groupEntries(base: string, options: GroupOptions): Promise<Groups> {
  assertDirectory(base);

  const groups = createGroups();
  const paths = await listEntries(base, options.recursive);

  for (const path of paths) {
    if (!isClassifiable(lstatSync(path))) {
      log.warn(`Skipping entry that is neither a file nor a directory: ${path}`);
      continue;
    }
    const entry = await classify(path, options.oracle);
    groups.get(bucketOf(entry))?.push(entry);
  }

  log.debug('Grouped entries', {
    base,
    counts: Object.fromEntries([...groups].map(([kind, entries]) => [kind, entries.length])),
  });

  return groups;
}
