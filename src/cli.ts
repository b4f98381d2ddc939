#!/usr/bin/env node
/**
 * relame: reversible batch renaming for media directories.
 */

import { config } from 'dotenv';
import { existsSync, realpathSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, DEFAULT_CONFIG_PATH, expandHome } from './config.js';
import { AppError, formatError, handleError, logger, type LogLevel } from './logger.js';
import { FileTypeOracle } from './mime-oracle.js';
import { COMMON_LABEL, OperationLog } from './operation-log.js';
import type { ReindexOptions } from './planner.js';
import { Relame } from './relame.js';
import { createPairReporter, formatHistory } from './report.js';
import { confirmBase, createTerminalConfirm } from './safety.js';
import type { Confirm, MimeOracle, TypeBucket } from './types.js';

type Command = 'flatten' | 'reindex' | 'revert' | 'history';

type Verbosity = 'quiet' | 'normal' | 'verbose';

export interface CliOptions {
  command: Command;
  base: string;
  verbosity: Verbosity;
  dryRun: boolean;
  directories: boolean;
  covers: boolean;
  types: TypeBucket[];
  align?: number;
  label: string;
  configPath?: string;
  help: boolean;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  confirm: Confirm;
  oracle: MimeOracle;
  env: NodeJS.ProcessEnv;
  home: string;
  cwd: string;
  color: boolean;
}

const USAGE = `Usage:
  relame flatten [BASE] [--dry-run] [--quiet|--verbose]
  relame reindex [BASE] [-D] [-c|-C] [-i] [-v] [-a] [--gif] [--pdf] [--psd] [--unknown]
                 [--align N] [--dry-run] [--quiet|--verbose]
  relame revert [--quiet|--verbose]
  relame history [--label LABEL]

Options:
  -D            renumber subdirectories ("01 - name")
  -c, -C        rename cover images (default) / leave them alone
  -i, -v, -a    move images / videos / audio into numbered type directories
  --gif, --pdf, --psd, --unknown
                same for GIFs, PDFs, Photoshop files and everything else ("others")
  --align N     minimum number of digits in serials
  --config PATH configuration file (YAML or JSON)`;

const COMMANDS: Command[] = ['flatten', 'reindex', 'revert', 'history'];

const TYPE_FLAGS: Record<string, TypeBucket> = {
  '-i': 'image',
  '-v': 'video',
  '-a': 'audio',
  '--gif': 'gif',
  '--pdf': 'pdf',
  '--psd': 'psd',
  '--unknown': 'unknown',
};

function usageError(message: string): AppError {
  return new AppError(`${message}\n\n${USAGE}`, 'USAGE_ERROR', 1);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined) {
    throw usageError(`${flag} expects a value`);
  }
  return value;
}

function defaultOptions(command: Command, cwd: string): CliOptions {
  return {
    command,
    base: cwd,
    verbosity: 'normal',
    dryRun: false,
    directories: false,
    covers: true,
    types: [],
    label: COMMON_LABEL,
    help: false,
  };
}

export function parseArgs(argv: string[], cwd: string = process.cwd()): CliOptions {
  const args = [...argv];
  const first = args.shift();

  if (first === undefined || first === '-h' || first === '--help') {
    return { ...defaultOptions('history', cwd), help: true };
  }
  if (!isCommand(first)) {
    throw usageError(`Unknown command: ${first}`);
  }

  const options = defaultOptions(first, cwd);
  let baseSeen = false;

  for (let arg = args.shift(); arg !== undefined; arg = args.shift()) {
    const typeFlag = TYPE_FLAGS[arg];
    if (typeFlag && options.command === 'reindex') {
      if (!options.types.includes(typeFlag)) options.types.push(typeFlag);
      continue;
    }

    switch (arg) {
      case '-q':
      case '--quiet':
        options.verbosity = 'quiet';
        break;
      case '--verbose':
        options.verbosity = 'verbose';
        break;
      case '--dry-run':
        if (options.command === 'revert' || options.command === 'history') {
          throw usageError(`--dry-run is not available for ${options.command}`);
        }
        options.dryRun = true;
        break;
      case '-D':
        options.directories = true;
        break;
      case '-c':
        options.covers = true;
        break;
      case '-C':
        options.covers = false;
        break;
      case '--align': {
        const value = takeValue(args, arg);
        if (!/^\d+$/.test(value) || Number(value) < 1) {
          throw usageError(`--align expects a positive integer, got "${value}"`);
        }
        options.align = Number(value);
        break;
      }
      case '--label':
        options.label = takeValue(args, arg);
        break;
      case '--config':
        options.configPath = takeValue(args, arg);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw usageError(`Unknown option for ${options.command}: ${arg}`);
        }
        if (baseSeen || options.command === 'revert' || options.command === 'history') {
          throw usageError(`Unexpected argument: ${arg}`);
        }
        options.base = resolve(cwd, arg);
        baseSeen = true;
        break;
    }
  }

  return options;
}

function levelFor(verbosity: Verbosity, configured: LogLevel): LogLevel {
  if (verbosity === 'verbose') return 'debug';
  if (verbosity === 'quiet') return 'error';
  return configured;
}

/**
 * Runs one command and returns the process exit code.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  try {
    const options = parseArgs(argv, io.cwd);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }

    const configPath = options.configPath
      ? resolve(io.cwd, expandHome(options.configPath, io.home))
      : io.env.RELAME_CONFIG?.trim() || DEFAULT_CONFIG_PATH;
    const manager = new ConfigManager(configPath, io.env, io.home);
    const validation = manager.validate();
    if (!validation.valid) {
      throw new AppError(`Invalid configuration in ${manager.getPath()}: ${validation.errors.join('; ')}`, 'USAGE_ERROR', 1);
    }
    const settings = manager.getAll();
    logger.setMinLevel(levelFor(options.verbosity, settings.logLevel));

    const relame = new Relame({
      operationLog: new OperationLog(settings.logRoot),
      oracle: io.oracle,
      report: options.verbosity === 'quiet' ? undefined : createPairReporter(io.stdout, { color: io.color }),
    });

    if (options.command === 'history') {
      formatHistory(options.label, relame.history(options.label), { color: io.color }).forEach(io.stdout);
      return 0;
    }

    if (options.command === 'revert') {
      relame.revert();
      return 0;
    }

    const policy = { home: io.home, safeRoots: settings.safeRoots };
    if (!(await confirmBase(options.base, policy, io.confirm))) {
      io.stdout('Aborted.');
      return 0;
    }

    const result =
      options.command === 'flatten'
        ? await relame.flatten(options.base, options.dryRun)
        : await relame.reindex(options.base, reindexOptions(options, settings.align), options.dryRun);

    if (result.mapping.size === 0 && options.verbosity !== 'quiet') {
      io.stdout('Nothing to rename.');
    }
    return 0;
  } catch (error) {
    const appError = handleError(error, 'cli');
    io.stderr(formatError(appError, io.color));
    return appError.exitCode;
  }
}

function reindexOptions(options: CliOptions, configuredAlign: number): ReindexOptions {
  return {
    directories: options.directories,
    covers: options.covers,
    types: options.types,
    align: options.align ?? configuredAlign,
  };
}

export async function main(): Promise<void> {
  config({ override: false });

  process.exitCode = await run(process.argv.slice(2), {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    confirm: createTerminalConfirm(),
    oracle: new FileTypeOracle(),
    env: process.env,
    home: homedir(),
    cwd: process.cwd(),
    color: Boolean(process.stdout.isTTY),
  });
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath =
  process.argv[1] && existsSync(process.argv[1]) ? realpathSync(resolve(process.argv[1])) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
