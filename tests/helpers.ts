import { mkdirSync, mkdtempSync, readdirSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, relative } from 'path';
import { splitMime } from '../src/mime-oracle.js';
import type { MimeOracle, MimeType } from '../src/types.js';

const MIME_BY_EXTENSION: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  mp4: 'video/mp4',
  mkv: 'video/x-matroska',
  mpg: 'video/mpeg',
  mp3: 'audio/mpeg',
  flac: 'audio/flac',
  pdf: 'application/pdf',
  psd: 'image/vnd.adobe.photoshop',
  txt: 'text/plain',
};

/**
 * Oracle answering from the file extension only, so fixtures can be plain text.
 */
export class ExtensionOracle implements MimeOracle {
  calls: string[] = [];

  async detect(path: string): Promise<MimeType> {
    this.calls.push(path);
    const extension = path.split('.').pop()?.toLowerCase() ?? '';
    return splitMime(MIME_BY_EXTENSION[extension] ?? 'application/octet-stream');
  }
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `relame-${prefix}-`));
}

/**
 * Create files (content defaults to the relative path) and directories (trailing "/").
 */
export function createTree(root: string, paths: string[]): void {
  for (const path of paths) {
    const absolute = join(root, path);
    if (path.endsWith('/')) {
      mkdirSync(absolute, { recursive: true });
    } else {
      mkdirSync(dirname(absolute), { recursive: true });
      writeFileSync(absolute, path);
    }
  }
}

/**
 * Relative paths of every file and directory under root, sorted; directories end in "/".
 */
export function listTree(root: string): string[] {
  const found: string[] = [];
  const walk = (dir: string): void => {
    for (const name of readdirSync(dir)) {
      const absolute = join(dir, name);
      if (statSync(absolute).isDirectory()) {
        found.push(`${relative(root, absolute)}/`);
        walk(absolute);
      } else {
        found.push(relative(root, absolute));
      }
    }
  };
  walk(root);
  return found.sort();
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
