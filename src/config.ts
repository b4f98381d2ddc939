/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import YAML from 'js-yaml';
import { logger, isLogLevel, type LogLevel } from './logger.js';

export interface AppConfig {
  /** Directory holding one `{label}.log` file per operation label */
  logRoot: string;
  /** Minimum zero-padding width for reindexed serials */
  align: number;
  /** Directories under which no confirmation is asked */
  safeRoots: string[];
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'relame', 'config.yaml');

export const DEFAULT_CONFIG: AppConfig = {
  logRoot: join(homedir(), '.log', 'relame'),
  align: 2,
  safeRoots: ['/media'],
  logLevel: 'warn'
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private home: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env, home: string = homedir()) {
    this.configPath = configPath;
    this.home = home;
    this.config = this.applyEnv(this.loadConfig(), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let config: unknown;

      if (this.configPath.endsWith('.json')) {
        config = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        config = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), isRecord(config) ? config : {});
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence).
   * Values of the wrong shape are ignored.
   */
  private mergeConfigs(defaults: AppConfig, user: Record<string, unknown>): AppConfig {
    const merged: AppConfig = { ...defaults };

    if (typeof user.logRoot === 'string') {
      merged.logRoot = expandHome(user.logRoot, this.home);
    }
    if (typeof user.align === 'number') {
      merged.align = user.align;
    }
    if (Array.isArray(user.safeRoots)) {
      merged.safeRoots = user.safeRoots
        .filter((root): root is string => typeof root === 'string')
        .map(root => resolve(expandHome(root, this.home)));
    }
    if (isLogLevel(user.logLevel)) {
      merged.logLevel = user.logLevel;
    }

    return merged;
  }

  private applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    const next = { ...config };
    const logRoot = env.RELAME_LOG_ROOT?.trim();
    if (logRoot) {
      next.logRoot = expandHome(logRoot, this.home);
    }
    const align = env.RELAME_ALIGN?.trim();
    if (align && /^\d+$/.test(align)) {
      next.align = Number(align);
    }
    if (isLogLevel(env.LOG_LEVEL)) {
      next.logLevel = env.LOG_LEVEL;
    }
    return next;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!Number.isInteger(this.config.align) || this.config.align < 1 || this.config.align > 32) {
      errors.push('align must be an integer between 1 and 32');
    }

    if (!this.config.logRoot.trim()) {
      errors.push('logRoot must not be empty');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
