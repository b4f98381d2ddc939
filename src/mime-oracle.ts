/**
 * MIME detection: magic bytes first, file extension second.
 */

import { fileTypeFromFile } from 'file-type';
import mime from 'mime-types';
import type { MimeOracle, MimeType } from './types.js';

const FALLBACK_MIME = 'application/octet-stream';

export function splitMime(value: string): MimeType {
  const [type, ...rest] = value.toLowerCase().split('/');
  return { type: type ?? '', subtype: rest.join('/') };
}

export class FileTypeOracle implements MimeOracle {
  async detect(path: string): Promise<MimeType> {
    const sniffed = await fileTypeFromFile(path);
    if (sniffed) {
      return splitMime(sniffed.mime);
    }

    const byExtension = mime.lookup(path);
    return splitMime(byExtension === false ? FALLBACK_MIME : byExtension);
  }
}
