import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { rmSync } from 'fs';
import { join } from 'path';
import { parseArgs, run, type CliIO } from './cli.js';
import { ExtensionOracle, catchError, createTree, listTree, makeTempDir } from '../tests/helpers.js';

describe('parseArgs', () => {
  it('collects reindex switches', () => {
    const options = parseArgs(['reindex', 'album', '-D', '-C', '-i', '-a', '--pdf', '--align', '3', '--dry-run'], '/media');

    expect(options).toMatchObject({
      command: 'reindex',
      base: '/media/album',
      directories: true,
      covers: false,
      types: ['image', 'audio', 'pdf'],
      align: 3,
      dryRun: true,
    });
  });

  it('defaults the base to the working directory', () => {
    expect(parseArgs(['flatten', '--quiet'], '/media/usb')).toMatchObject({
      command: 'flatten',
      base: '/media/usb',
      verbosity: 'quiet',
    });
  });

  it('rejects unknown commands and options', () => {
    expect(catchError(() => parseArgs(['shuffle']))).toMatchObject({ code: 'USAGE_ERROR' });
    expect(catchError(() => parseArgs(['flatten', '-i']))).toMatchObject({ code: 'USAGE_ERROR' });
    expect(catchError(() => parseArgs(['revert', 'somewhere']))).toMatchObject({ code: 'USAGE_ERROR' });
    expect(catchError(() => parseArgs(['revert', '--dry-run']))).toMatchObject({ code: 'USAGE_ERROR' });
    expect(catchError(() => parseArgs(['history', '--dry-run']))).toMatchObject({ code: 'USAGE_ERROR' });
  });

  it('rejects a non-numeric alignment', () => {
    expect(catchError(() => parseArgs(['reindex', '--align', 'wide']))).toMatchObject({ code: 'USAGE_ERROR' });
    expect(catchError(() => parseArgs(['reindex', '--align']))).toMatchObject({ code: 'USAGE_ERROR' });
  });
});

describe('run', () => {
  let home: string;
  let base: string;
  let stdout: string[];
  let stderr: string[];
  let confirm: Mock<(message: string) => Promise<boolean>>;

  function io(overrides: Partial<CliIO> = {}): CliIO {
    return {
      stdout: line => stdout.push(line),
      stderr: line => stderr.push(line),
      confirm,
      oracle: new ExtensionOracle(),
      env: {
        RELAME_CONFIG: join(home, 'no-config.yaml'),
        RELAME_LOG_ROOT: join(home, 'logs'),
        LOG_LEVEL: 'error',
      },
      home,
      cwd: home,
      color: false,
      ...overrides,
    };
  }

  beforeEach(() => {
    home = makeTempDir('cli');
    base = join(home, 'album');
    createTree(home, ['album/foo/', 'album/bar/']);
    stdout = [];
    stderr = [];
    confirm = vi.fn(async (_message: string) => true);
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    expect(await run(['--help'], io())).toBe(0);
    expect(stdout[0]).toMatch(/^Usage:/);
  });

  it('reindexes, prints each pair and reverts', async () => {
    expect(await run(['reindex', 'album', '-D', '--align', '3'], io())).toBe(0);

    expect(stdout).toEqual([
      `- ${join(base, 'bar')}\n+ ${join(base, '001 - bar')}`,
      `- ${join(base, 'foo')}\n+ ${join(base, '002 - foo')}`,
    ]);
    expect(listTree(base)).toEqual(['001 - bar/', '002 - foo/']);
    expect(confirm).not.toHaveBeenCalled();

    stdout = [];
    expect(await run(['revert', '--quiet'], io())).toBe(0);

    expect(stdout).toEqual([]);
    expect(listTree(base)).toEqual(['bar/', 'foo/']);
  });

  it('lists the history of a label', async () => {
    await run(['reindex', 'album', '-D', '--quiet'], io());

    expect(await run(['history'], io())).toBe(0);

    expect(stdout).toEqual([
      '#1 (2 pairs)',
      `- ${join(base, 'bar')}\n+ ${join(base, '01 - bar')}`,
      `- ${join(base, 'foo')}\n+ ${join(base, '02 - foo')}`,
    ]);
  });

  it('asks before touching a directory outside home and exits cleanly when declined', async () => {
    confirm.mockResolvedValue(false);

    const code = await run(['reindex', base, '-D'], io({ home: join(home, 'elsewhere') }));

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledOnce();
    expect(stdout).toEqual(['Aborted.']);
    expect(listTree(base)).toEqual(['bar/', 'foo/']);
  });

  it('reports a missing base as a fatal error', async () => {
    const code = await run(['flatten', 'missing'], io());

    expect(code).toBe(1);
    expect(stderr).toEqual([`error [NOT_FOUND] No such directory: ${join(home, 'missing')}`]);
  });

  it('says when there is nothing to rename', async () => {
    expect(await run(['flatten', 'album'], io())).toBe(0);
    expect(stdout).toEqual(['Nothing to rename.']);
  });

  it('fails when reverting with an empty log', async () => {
    expect(await run(['revert'], io())).toBe(1);
    expect(stderr[0]).toMatch(/^error \[LOG_CORRUPT\] Nothing to revert/);
  });
});
