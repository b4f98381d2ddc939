import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigManager, DEFAULT_CONFIG, expandHome } from './config.js';
import { makeTempDir } from '../tests/helpers.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = makeTempDir('config');
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  describe('Initialization', () => {
    it('should load defaults if the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), {});

      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
      expect(manager.getPath()).toBe(join(configDir, 'missing.yaml'));
    });

    it('should hand out copies', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), {});
      manager.getAll().safeRoots.push('/elsewhere');

      expect(manager.getAll().safeRoots).toEqual(['/media']);
    });
  });

  describe('YAML Configuration', () => {
    it('should merge YAML values over defaults', () => {
      const path = join(configDir, 'config.yaml');
      writeFileSync(path, 'align: 4\nlogRoot: ~/relame-logs\nsafeRoots:\n  - /mnt/photos\n');

      const config = new ConfigManager(path, {}).getAll();

      expect(config.align).toBe(4);
      expect(config.logRoot).toBe(join(homedir(), 'relame-logs'));
      expect(config.safeRoots).toEqual(['/mnt/photos']);
      expect(config.logLevel).toBe(DEFAULT_CONFIG.logLevel);
    });

    it('should expand ~ against the given home directory', () => {
      const path = join(configDir, 'config.yaml');
      writeFileSync(path, 'logRoot: ~/relame-logs\nsafeRoots:\n  - ~/Pictures\n');

      const config = new ConfigManager(path, {}, '/home/tester').getAll();

      expect(config.logRoot).toBe('/home/tester/relame-logs');
      expect(config.safeRoots).toEqual(['/home/tester/Pictures']);
      expect(new ConfigManager(path, { RELAME_LOG_ROOT: '~/env-logs' }, '/home/tester').getAll().logRoot).toBe(
        '/home/tester/env-logs'
      );
    });

    it('should ignore values of the wrong type', () => {
      const path = join(configDir, 'config.yaml');
      writeFileSync(path, 'align: three\nlogLevel: loud\n');

      const config = new ConfigManager(path, {}).getAll();

      expect(config.align).toBe(2);
      expect(config.logLevel).toBe('warn');
    });
  });

  describe('JSON Configuration', () => {
    it('should load JSON configuration', () => {
      const path = join(configDir, 'config.json');
      writeFileSync(path, JSON.stringify({ logLevel: 'debug', align: 3 }));

      const config = new ConfigManager(path, {}).getAll();

      expect(config.logLevel).toBe('debug');
      expect(config.align).toBe(3);
    });

    it('should fall back to defaults on malformed JSON', () => {
      const path = join(configDir, 'config.json');
      writeFileSync(path, '{ broken');

      expect(new ConfigManager(path, {}).getAll()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('Environment overrides', () => {
    it('should prefer environment values over the file', () => {
      const path = join(configDir, 'config.json');
      writeFileSync(path, JSON.stringify({ align: 3, logRoot: '/var/relame' }));

      const config = new ConfigManager(path, {
        RELAME_LOG_ROOT: '/tmp/relame-logs',
        RELAME_ALIGN: '5',
        LOG_LEVEL: 'info',
      }).getAll();

      expect(config.logRoot).toBe('/tmp/relame-logs');
      expect(config.align).toBe(5);
      expect(config.logLevel).toBe('info');
    });
  });

  describe('Configuration Validation', () => {
    it('should accept the defaults', () => {
      expect(new ConfigManager(join(configDir, 'missing.yaml'), {}).validate()).toEqual({ valid: true, errors: [] });
    });

    it('should reject an out-of-range align', () => {
      const path = join(configDir, 'config.json');
      writeFileSync(path, JSON.stringify({ align: 0 }));

      expect(new ConfigManager(path, {}).validate()).toEqual({
        valid: false,
        errors: ['align must be an integer between 1 and 32'],
      });
    });
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~/logs', '/home/test')).toBe('/home/test/logs');
    expect(expandHome('~', '/home/test')).toBe('/home/test');
    expect(expandHome('/srv/~x', '/home/test')).toBe('/srv/~x');
  });
});
