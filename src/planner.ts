/**
 * Rename planner: computes source → destination mappings for flatten and the reindex modes.
 * Nothing here touches the filesystem except read-only existence checks.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { basename, dirname, join, relative, sep } from 'path';
import { stem } from './grouper.js';
import { AppError, logger } from './logger.js';
import { sequence } from './sequencer.js';
import { bucket, TYPE_BUCKETS, type Entry, type Groups, type RenameMapping, type TypeBucket } from './types.js';

const log = logger.child('planner');

export interface ReindexOptions {
  directories: boolean;
  covers: boolean;
  types: TypeBucket[];
  align: number;
}

export interface IndexedName {
  serial: number | null;
  name: string;
}

export const TYPE_DIRECTORY: Record<TypeBucket, string> = {
  image: 'image',
  video: 'video',
  audio: 'audio',
  gif: 'gif',
  pdf: 'pdf',
  psd: 'psd',
  unknown: 'others',
};

export function padWidth(align: number, count: number): number {
  return Math.max(align, String(count).length);
}

export function formatSerial(serial: number, width: number): string {
  return String(serial).padStart(width, '0');
}

/**
 * Split "12 - Holiday" into serial 12 and name "Holiday"; names without leading digits have no serial.
 */
export function parseIndexedName(value: string): IndexedName {
  const match = /^(\d+)(.*)$/s.exec(value);
  if (!match) {
    return { serial: null, name: value };
  }
  return { serial: Number.parseInt(match[1], 10), name: match[2].replace(/^[-\s]+/, '') };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Checks a mapping before execution: unique destinations, and no destination that already
 * exists unless it is itself being moved away.
 */
export function validateMapping(mapping: RenameMapping): void {
  const seen = new Set<string>();
  for (const [source, destination] of mapping) {
    if (seen.has(destination)) {
      throw new AppError(
        `Two entries would be renamed to ${destination}`,
        'DESTINATION_COLLISION',
        1,
        { source, destination }
      );
    }
    seen.add(destination);

    if (destination !== source && !mapping.has(destination) && existsSync(destination)) {
      throw new AppError(
        `Destination already exists: ${destination}`,
        'DESTINATION_COLLISION',
        1,
        { source, destination }
      );
    }
  }
}

function addPair(mapping: RenameMapping, source: string, destination: string): void {
  if (source !== destination) {
    mapping.set(source, destination);
  }
}

/**
 * Every file under base moved to base itself, named by its relative path joined with "_".
 */
export function planFlatten(base: string, files: Entry[]): RenameMapping {
  const mapping: RenameMapping = new Map();
  for (const entry of files) {
    const flatName = relative(base, entry.path).split(sep).join('_');
    addPair(mapping, entry.path, join(base, flatName));
  }
  validateMapping(mapping);
  log.debug(`Planned flatten of ${mapping.size} file(s)`, { base });
  return mapping;
}

/**
 * Renumber direct child directories: already-numbered ones first by (serial, name),
 * then the rest by name.
 */
export function planDirectoryReindex(directories: Entry[], align: number): RenameMapping {
  const indexed: { entry: Entry; serial: number; name: string }[] = [];
  const unindexed: { entry: Entry; name: string }[] = [];

  for (const entry of directories) {
    const parsed = parseIndexedName(basename(entry.path));
    if (parsed.serial === null) {
      unindexed.push({ entry, name: parsed.name });
    } else {
      indexed.push({ entry, serial: parsed.serial, name: parsed.name });
    }
  }

  indexed.sort((a, b) => a.serial - b.serial || compareText(a.name, b.name));
  unindexed.sort((a, b) => compareText(a.name, b.name));

  const ordered = [...indexed, ...unindexed];
  const width = padWidth(align, ordered.length);
  const mapping: RenameMapping = new Map();

  ordered.forEach(({ entry, name }, index) => {
    const serial = formatSerial(index + 1, width);
    const newName = name ? `${serial} - ${name}` : serial;
    addPair(mapping, entry.path, join(dirname(entry.path), newName));
  });

  return mapping;
}

/**
 * "cover", "cover 2", "cover 3", ... in case-insensitive stem order.
 */
export function planCoverReindex(covers: Entry[]): RenameMapping {
  const ordered = [...covers].sort((a, b) =>
    compareText(stem(a.path).toLowerCase(), stem(b.path).toLowerCase())
  );
  const mapping: RenameMapping = new Map();

  ordered.forEach((entry, index) => {
    const name = index === 0 ? 'cover' : `cover ${index + 1}`;
    addPair(mapping, entry.path, join(dirname(entry.path), `${name}${entry.suffix}`));
  });

  return mapping;
}

function assertUsableTarget(target: string): void {
  if (!existsSync(target)) return;
  if (!statSync(target).isDirectory()) {
    throw new AppError(`Target exists and is not a directory: ${target}`, 'DESTINATION_COLLISION', 1, { target });
  }
  if (readdirSync(target).length > 0) {
    throw new AppError(`Target directory is not empty: ${target}`, 'NON_EMPTY_TARGET', 1, { target });
  }
}

/**
 * Move one bucket into base/<type>/ as 01.jpg, 02.png, ... in sequenced order.
 */
export function planTypeReindex(base: string, type: TypeBucket, entries: Entry[], align: number): RenameMapping {
  const mapping: RenameMapping = new Map();
  if (entries.length === 0) {
    return mapping;
  }

  const target = join(base, TYPE_DIRECTORY[type]);
  assertUsableTarget(target);

  const width = padWidth(align, entries.length);
  sequence(entries).forEach((entry, index) => {
    addPair(mapping, entry.path, join(target, `${formatSerial(index + 1, width)}${entry.suffix}`));
  });

  return mapping;
}

/**
 * All requested reindex modes combined into one validated mapping.
 */
export function planReindex(base: string, groups: Groups, options: ReindexOptions): RenameMapping {
  const parts: RenameMapping[] = [];

  if (options.directories) {
    parts.push(planDirectoryReindex(bucket(groups, 'directory'), options.align));
  }
  if (options.covers) {
    parts.push(planCoverReindex(bucket(groups, 'cover')));
  }
  for (const type of TYPE_BUCKETS) {
    if (options.types.includes(type)) {
      parts.push(planTypeReindex(base, type, bucket(groups, type), options.align));
    }
  }

  const mapping: RenameMapping = new Map();
  for (const part of parts) {
    for (const [source, destination] of part) {
      mapping.set(source, destination);
    }
  }

  validateMapping(mapping);
  log.debug(`Planned reindex of ${mapping.size} entr${mapping.size === 1 ? 'y' : 'ies'}`, {
    base,
    directories: options.directories,
    covers: options.covers,
    types: options.types,
  });
  return mapping;
}
