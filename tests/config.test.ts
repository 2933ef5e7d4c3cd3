// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, expect, it, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

import {
  loadGlobalConfig,
  loadWorkspaceConfig,
  parseConfig,
  validateConfig,
  mergeConfig,
  normalizeHost,
  resolveConfig,
  getDefaultConfig,
  type WorkspaceConfig,
} from '../src/config/index.js';

describe('Configuration', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lmctl-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('LMCTL_LOG_DIR', '');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('loadWorkspaceConfig', () => {
    it('returns null when no config file exists', () => {
      expect(loadWorkspaceConfig(testDir)).toEqual({ config: null, configPath: null });
    });

    it('loads .lmctl.json', () => {
      const configPath = path.join(testDir, '.lmctl.json');
      fs.writeFileSync(configPath, JSON.stringify({ host: 'gpu-box:11434', tail: 50 }));

      expect(loadWorkspaceConfig(testDir)).toEqual({ config: { host: 'gpu-box:11434', tail: 50 }, configPath });
    });

    it('warns and returns null for invalid JSON', () => {
      fs.writeFileSync(path.join(testDir, '.lmctl.json'), '{ not json');

      expect(loadWorkspaceConfig(testDir).config).toBeNull();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('loadGlobalConfig', () => {
    it('reads config.json from the given directory', () => {
      fs.writeFileSync(path.join(testDir, 'config.json'), JSON.stringify({ registryUrl: 'https://registry.example.com' }));

      const { config, configPath } = loadGlobalConfig(testDir);

      expect(config).toEqual({ registryUrl: 'https://registry.example.com' });
      expect(configPath).toBe(path.join(testDir, 'config.json'));
    });

    it('returns null when the file is missing', () => {
      expect(loadGlobalConfig(testDir).config).toBeNull();
    });
  });

  describe('parseConfig', () => {
    it('keeps known fields of the right type', () => {
      expect(parseConfig({ host: 'h', logDir: '/logs', pollIntervalMs: 100, registryUrl: 'https://r', tail: 3, extra: 1 }, 'x')).toEqual({
        host: 'h',
        logDir: '/logs',
        pollIntervalMs: 100,
        registryUrl: 'https://r',
        tail: 3,
      });
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('drops mistyped fields with a warning', () => {
      expect(parseConfig({ host: 5, tail: '10', logDir: '/x' }, 'cfg.json')).toEqual({ logDir: '/x' });
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Ignoring mistyped fields in cfg.json: host, tail'));
    });

    it('ignores non-object documents', () => {
      expect(parseConfig([1, 2], 'cfg.json')).toEqual({});
    });
  });

  describe('validateConfig', () => {
    it('returns no warnings for a valid config', () => {
      expect(validateConfig({ host: 'localhost', registryUrl: 'https://ollama.com', pollIntervalMs: 500, tail: 0 })).toEqual([]);
    });

    it('reports every invalid field', () => {
      const config: WorkspaceConfig = { host: ' ', registryUrl: 'not a url', pollIntervalMs: 0, tail: -1 };
      expect(validateConfig(config)).toEqual([
        'host must not be empty',
        'registryUrl is not a valid URL: "not a url"',
        'pollIntervalMs must be a positive number',
        'tail must be a non-negative integer',
      ]);
    });
  });

  describe('normalizeHost', () => {
    it.each([
      [undefined, 'http://127.0.0.1:11434'],
      ['', 'http://127.0.0.1:11434'],
      ['localhost', 'http://localhost:11434'],
      ['localhost:8080', 'http://localhost:8080'],
      [':11435', 'http://127.0.0.1:11435'],
      ['http://example.com', 'http://example.com:80'],
      ['https://models.example.com', 'https://models.example.com:443'],
      ['http://127.0.0.1:11434/', 'http://127.0.0.1:11434'],
      ['example.com/ollama/', 'http://example.com:11434/ollama'],
      ['[::1]:4000', 'http://[::1]:4000'],
      ['::1', 'http://[::1]:11434'],
      ['example.com:abc', 'http://127.0.0.1:11434'],
    ])('normalizes %s', (input, expected) => {
      expect(normalizeHost(input)).toBe(expected);
    });
  });

  describe('mergeConfig', () => {
    it('applies defaults', () => {
      expect(mergeConfig(null, null)).toEqual(getDefaultConfig());
      expect(getDefaultConfig()).toMatchObject({
        host: 'http://127.0.0.1:11434',
        pollIntervalMs: 250,
        registryUrl: 'https://ollama.com',
        tail: 0,
      });
    });

    it('prefers CLI over environment over workspace over global', () => {
      const global: WorkspaceConfig = { host: 'global', tail: 1, pollIntervalMs: 1000 };
      const workspace: WorkspaceConfig = { host: 'workspace', tail: 2 };

      expect(mergeConfig(global, workspace).host).toBe('http://workspace:11434');
      expect(mergeConfig(global, workspace, {}, { OLLAMA_HOST: 'env' }).host).toBe('http://env:11434');
      expect(mergeConfig(global, workspace, { host: 'cli' }, { OLLAMA_HOST: 'env' }).host).toBe('http://cli:11434');

      const merged = mergeConfig(global, workspace);
      expect(merged.tail).toBe(2);
      expect(merged.pollIntervalMs).toBe(1000);
    });

    it('takes the log directory from the environment and the CLI', () => {
      expect(mergeConfig({ logDir: '/global' }, null, {}, { LMCTL_LOG_DIR: '/env' }).logDir).toBe('/env');
      expect(mergeConfig({ logDir: '/global' }, null, { logDir: '/cli' }, { LMCTL_LOG_DIR: '/env' }).logDir).toBe('/cli');
    });

    it('ignores invalid values', () => {
      const merged = mergeConfig({ pollIntervalMs: -5, tail: 1.5, host: '  ' }, null);
      expect(merged.pollIntervalMs).toBe(250);
      expect(merged.tail).toBe(0);
      expect(merged.host).toBe('http://127.0.0.1:11434');
    });
  });

  describe('resolveConfig', () => {
    it('merges global and workspace files', () => {
      const home = path.join(testDir, 'home');
      const workspace = path.join(testDir, 'workspace');
      fs.mkdirSync(home);
      fs.mkdirSync(workspace);
      fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ host: 'global', tail: 5 }));
      fs.writeFileSync(path.join(workspace, '.lmctl.json'), JSON.stringify({ host: 'workspace:9000' }));
      vi.stubEnv('LMCTL_HOME', home);

      const config = resolveConfig({}, workspace);

      expect(config.host).toBe('http://workspace:9000');
      expect(config.tail).toBe(5);
    });

    it('warns about invalid values', () => {
      const home = path.join(testDir, 'home');
      fs.mkdirSync(home);
      fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ tail: -3 }));
      vi.stubEnv('LMCTL_HOME', home);

      resolveConfig({}, testDir);

      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining(`${path.join(home, 'config.json')}: tail must be a non-negative integer`)
      );
    });
  });
});
