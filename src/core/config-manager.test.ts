import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigManager, GRAPH_BASE_URL, OAUTH_REDIRECT_URI, type ConfigEnvironment } from './config-manager.js';
import { ErrInvalidConfig } from '../errors/errors.js';

let dir: string;

const environment = (env: NodeJS.ProcessEnv = {}, platform: NodeJS.Platform = 'linux'): ConfigEnvironment => ({
  env,
  homeDir: path.join(dir, 'home'),
  platform,
});

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'acl-inspector-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('ConfigManager', () => {
  describe('locate', () => {
    test('explicit path wins', () => {
      const config = ConfigManager.locate(path.join(dir, 'a.yaml'), environment({ ACL_INSPECTOR_CONFIG: path.join(dir, 'b.yaml') }));
      expect(config.getConfigPath()).toBe(path.join(dir, 'a.yaml'));
    });

    test('environment variable next', () => {
      const config = ConfigManager.locate(undefined, environment({ ACL_INSPECTOR_CONFIG: path.join(dir, 'b.yaml') }));
      expect(config.getConfigPath()).toBe(path.join(dir, 'b.yaml'));
    });

    test('XDG config home, then ~/.config', () => {
      expect(ConfigManager.locate(undefined, environment({ XDG_CONFIG_HOME: path.join(dir, 'xdg') })).getConfigPath()).toBe(
        path.join(dir, 'xdg', 'acl-inspector', 'config.yaml'),
      );
      expect(ConfigManager.locate(undefined, environment()).getConfigPath()).toBe(
        path.join(dir, 'home', '.config', 'acl-inspector', 'config.yaml'),
      );
    });
  });

  describe('readConfig', () => {
    test('defaults when the file is missing', () => {
      const config = new ConfigManager(path.join(dir, 'config.yaml'), environment()).readConfig();
      expect(config.graph).toEqual({ baseUrl: GRAPH_BASE_URL, timeoutMs: 30_000 });
      expect(config.oauth.redirectUri).toBe(OAUTH_REDIRECT_URI);
      expect(config.oauth.clientId).toBe('');
      expect(config.tokens.ownedTokenPath).toBe(path.join(dir, 'token.json'));
      expect(config.tokens.foreignConfigPath).toBe(path.join(dir, 'home', '.config', 'rclone', 'rclone.conf'));
      expect(config.debug).toBe(false);
    });

    test('rclone config under APPDATA on Windows', () => {
      const config = new ConfigManager(path.join(dir, 'config.yaml'), environment({ APPDATA: path.join(dir, 'appdata') }, 'win32')).readConfig();
      expect(config.tokens.foreignConfigPath).toBe(path.join(dir, 'appdata', 'rclone', 'rclone.conf'));
    });

    test('file values, relative and home paths', () => {
      const configPath = path.join(dir, 'config.yaml');
      fs.writeFileSync(
        configPath,
        [
          'graph:',
          '  timeoutMs: 5000',
          'oauth:',
          '  clientId: test-client',
          'tokens:',
          '  ownedTokenPath: tokens/owned.json',
          '  foreignConfigPath: ~/rclone.conf',
          '  defaultRemote: work',
          'debug: true',
          '',
        ].join('\n'),
      );
      const config = new ConfigManager(configPath, environment()).readConfig();
      expect(config.graph.timeoutMs).toBe(5000);
      expect(config.oauth.clientId).toBe('test-client');
      expect(config.tokens).toEqual({
        ownedTokenPath: path.join(dir, 'tokens', 'owned.json'),
        foreignConfigPath: path.join(dir, 'home', 'rclone.conf'),
        defaultRemote: 'work',
      });
      expect(config.debug).toBe(true);
    });

    test('environment overrides the file', () => {
      const configPath = path.join(dir, 'config.yaml');
      fs.writeFileSync(configPath, 'oauth:\n  clientId: from-file\n');
      const config = new ConfigManager(
        configPath,
        environment({
          ACL_INSPECTOR_CLIENT_ID: 'from-env',
          ACL_INSPECTOR_CLIENT_SECRET: 'test-secret',
          ACL_INSPECTOR_TOKEN_FILE: path.join(dir, 'env-token.json'),
          RCLONE_CONFIG: path.join(dir, 'env-rclone.conf'),
          ACL_INSPECTOR_DEBUG: '1',
        }),
      ).readConfig();
      expect(config.oauth.clientId).toBe('from-env');
      expect(config.oauth.clientSecret).toBe('test-secret');
      expect(config.tokens.ownedTokenPath).toBe(path.join(dir, 'env-token.json'));
      expect(config.tokens.foreignConfigPath).toBe(path.join(dir, 'env-rclone.conf'));
      expect(config.debug).toBe(true);
    });

    test('unknown keys are rejected', () => {
      const configPath = path.join(dir, 'config.yaml');
      fs.writeFileSync(configPath, 'graph:\n  baseURL: https://example.test\n');
      const manager = new ConfigManager(configPath, environment());
      expect(() => manager.readConfig()).toThrow(/Invalid configuration/);
      try {
        manager.readConfig();
      } catch (err) {
        expect(ErrInvalidConfig.is(err)).toBe(true);
      }
    });

    test('empty file reads as defaults', () => {
      const configPath = path.join(dir, 'config.yaml');
      fs.writeFileSync(configPath, '');
      expect(new ConfigManager(configPath, environment()).readConfigFile()).toEqual({});
    });
  });
});
