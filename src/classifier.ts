/**
 * Classifier: turns one filesystem path into an Entry.
 */

import { lstatSync, type Stats } from 'fs';
import { extname } from 'path';
import { AppError, errnoCode } from './logger.js';
import type { Entry, MimeOracle, MimeType } from './types.js';

type SubtypeRule = [needle: string, suffix: string];

// Checked in order; the first subtype containing the needle wins.
const IMAGE_RULES: SubtypeRule[] = [
  ['jpeg', '.jpg'],
  ['png', '.png'],
  ['bmp', '.bmp'],
  ['webp', '.webp'],
  ['svg+xml', '.svg'],
  ['tiff', '.tif'],
];

const VIDEO_RULES: SubtypeRule[] = [
  ['mp4', '.mp4'],
  ['x-matroska', '.mkv'],
  ['quicktime', '.mov'],
  ['x-msvideo', '.avi'],
  ['x-ms-wmv', '.wmv'],
  ['webm', '.webm'],
  ['mpeg', '.mpeg'],
];

const AUDIO_RULES: SubtypeRule[] = [
  ['mpeg', '.mp3'],
  ['wav', '.wav'],
  ['aac', '.aac'],
  ['flac', '.flac'],
  ['ogg', '.ogg'],
  ['mp4', '.m4a'],
  ['x-ms-wma', '.wma'],
];

// Independent of the primary type: image/gif, application/pdf, image/vnd.adobe.photoshop, ...
const SHARED_RULES: SubtypeRule[] = [
  ['gif', '.gif'],
  ['pdf', '.pdf'],
  ['photoshop', '.psd'],
  ['x-psd', '.psd'],
];

const RULES_BY_TYPE: Record<string, SubtypeRule[]> = {
  image: IMAGE_RULES,
  video: VIDEO_RULES,
  audio: AUDIO_RULES,
};

/**
 * Canonical extension for a MIME pair, or the path's own extension lower-cased.
 * "mpeg" is resolved by primary type: video/mpeg is .mpeg, audio/mpeg is .mp3.
 */
export function normalizeSuffix(mimeType: MimeType, path: string): string {
  const rules = [...SHARED_RULES, ...(RULES_BY_TYPE[mimeType.type] ?? [])];
  const match = rules.find(([needle]) => mimeType.subtype.includes(needle));
  return match ? match[1] : extname(path).toLowerCase();
}

function statEntry(path: string): Stats {
  try {
    return lstatSync(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
      throw new AppError(`No such file or directory: ${path}`, 'NOT_FOUND', 1, { path });
    }
    throw error;
  }
}

function describeStats(stats: Stats): string {
  if (stats.isSymbolicLink()) return 'symbolic link';
  if (stats.isSocket()) return 'socket';
  if (stats.isFIFO()) return 'FIFO';
  if (stats.isBlockDevice() || stats.isCharacterDevice()) return 'device file';
  return 'special file';
}

/**
 * Whether a path is something the classifier accepts, without classifying it.
 */
export function isClassifiable(stats: Stats): boolean {
  return stats.isFile() || stats.isDirectory();
}

export async function classify(path: string, oracle: MimeOracle): Promise<Entry> {
  const stats = statEntry(path);

  if (stats.isDirectory()) {
    return { path, isDirectory: true, kind: '', suffix: '' };
  }

  if (!stats.isFile()) {
    throw new AppError(
      `Expected a regular file or directory, got a ${describeStats(stats)}: ${path}`,
      'INVALID_ENTRY_TYPE',
      1,
      { path }
    );
  }

  const mimeType = await oracle.detect(path);
  return {
    path,
    isDirectory: false,
    kind: mimeType.type,
    suffix: normalizeSuffix(mimeType, path),
  };
}
