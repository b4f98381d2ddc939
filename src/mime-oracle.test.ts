import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FileTypeOracle, splitMime } from './mime-oracle.js';
import { makeTempDir } from '../tests/helpers.js';

describe('splitMime', () => {
  it('splits and lower-cases a MIME string', () => {
    expect(splitMime('Image/SVG+XML')).toEqual({ type: 'image', subtype: 'svg+xml' });
    expect(splitMime('weird')).toEqual({ type: 'weird', subtype: '' });
  });
});

describe('FileTypeOracle', () => {
  let root: string;
  const oracle = new FileTypeOracle();

  beforeEach(() => {
    root = makeTempDir('oracle');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('trusts magic bytes over a misleading extension', async () => {
    const path = join(root, 'actually-a-gif.txt');
    writeFileSync(path, Buffer.from('GIF89a\x01\x00\x01\x00\x00\x00\x00\x00\x00\x00', 'latin1'));

    await expect(oracle.detect(path)).resolves.toEqual({ type: 'image', subtype: 'gif' });
  });

  it('falls back to the extension for text formats', async () => {
    const path = join(root, 'notes.txt');
    writeFileSync(path, 'plain words\n');

    await expect(oracle.detect(path)).resolves.toEqual({ type: 'text', subtype: 'plain' });
  });

  it('reports octet-stream when nothing matches', async () => {
    const path = join(root, 'blob.zzqx');
    writeFileSync(path, 'plain words\n');

    await expect(oracle.detect(path)).resolves.toEqual({ type: 'application', subtype: 'octet-stream' });
  });
});
