import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  CONFIG_ENV,
  DEFAULT_CONFIG,
  DEFAULT_MESSAGES,
  defaultConfigPath,
  getPackageRoot,
  isDebug,
  isEnabled,
  loadConfig,
  resolveSettings,
  resolveTemplates,
  writeConfig,
} from '../../src/config.js';
import { createTempDir, cleanupTempDir, writeConfigFile } from '../helpers/fs-helpers.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = createTempDir();
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  cleanupTempDir(tmpDir);
});

// ── Loading ──

describe('loadConfig', () => {
  it('returns the parsed document as-is', () => {
    const configPath = writeConfigFile(
      tmpDir,
      JSON.stringify({ voice: 'en-GB-SoniaNeural', custom: 1 }),
    );
    const config = loadConfig(configPath);
    expect(config).toEqual({ voice: 'en-GB-SoniaNeural', custom: 1 });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('returns defaults and logs once if file does not exist', () => {
    const config = loadConfig(path.join(tmpDir, 'nope.json'));
    expect(config).toBe(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0]?.[0]).toMatch(/^Config error, using defaults: ENOENT/);
  });

  it('returns defaults on invalid JSON', () => {
    const configPath = writeConfigFile(tmpDir, 'not json');
    expect(loadConfig(configPath)).toBe(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('returns defaults when the document is not an object', () => {
    const configPath = writeConfigFile(tmpDir, '[1, 2]');
    expect(loadConfig(configPath)).toBe(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledWith(
      `Config error, using defaults: ${configPath} must contain a JSON object`,
    );
  });
});

describe('DEFAULT_CONFIG', () => {
  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_MESSAGES)).toBe(true);
  });

  it('has the documented defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      enabled: true,
      voice: 'en-US-GuyNeural',
      rate: '+0%',
      volume: '+0%',
      pitch: '+0Hz',
      debug: false,
      messages: {
        prompt_submit: 'On it.',
        stop: 'Done. {summary}',
        notification_permission_prompt: 'Need your permission. {message}',
        notification_idle_prompt: 'Waiting for your input.',
        notification_default: '{message}',
      },
    });
  });
});

describe('writeConfig', () => {
  it('writes pretty JSON ending with newline', () => {
    const configPath = path.join(tmpDir, 'deep', 'nested', 'config.json');
    writeConfig(configPath, { voice: 'en-US-JennyNeural' });
    expect(fs.readFileSync(configPath, 'utf8')).toBe('{\n  "voice": "en-US-JennyNeural"\n}\n');
  });

  it('round-trips through loadConfig', () => {
    const configPath = path.join(tmpDir, 'config.json');
    writeConfig(configPath, DEFAULT_CONFIG);
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });
});

// ── Path resolution ──

describe('defaultConfigPath', () => {
  it('points beside the program', () => {
    vi.stubEnv(CONFIG_ENV, '');
    expect(defaultConfigPath()).toBe(path.join(getPackageRoot(), 'config.json'));
  });

  it('honours CLAUDE_VOICE_CONFIG', () => {
    vi.stubEnv(CONFIG_ENV, '/etc/claude-voice.json');
    expect(defaultConfigPath()).toBe('/etc/claude-voice.json');
  });
});

// ── Queries ──

describe('isEnabled / isDebug', () => {
  it('defaults to enabled, not debug', () => {
    expect(isEnabled({})).toBe(true);
    expect(isDebug({})).toBe(false);
  });

  it('reads explicit flags', () => {
    expect(isEnabled({ enabled: false })).toBe(false);
    expect(isDebug({ debug: true })).toBe(true);
  });

  it('reads flags from the file by truthiness', () => {
    expect(isEnabled(loadConfig(writeConfigFile(tmpDir, '{"enabled": 0}')))).toBe(false);
    expect(isEnabled(loadConfig(writeConfigFile(tmpDir, '{"enabled": "yes"}')))).toBe(true);
    expect(isEnabled(loadConfig(writeConfigFile(tmpDir, '{"enabled": null}')))).toBe(false);
    expect(isDebug(loadConfig(writeConfigFile(tmpDir, '{"debug": 1}')))).toBe(true);
    expect(isDebug(loadConfig(writeConfigFile(tmpDir, '{"debug": ""}')))).toBe(false);
  });
});

describe('resolveSettings', () => {
  it('fills missing speech options with defaults', () => {
    expect(resolveSettings({ rate: '+20%' })).toEqual({
      voice: 'en-US-GuyNeural',
      rate: '+20%',
      volume: '+0%',
      pitch: '+0Hz',
    });
  });
});

describe('resolveTemplates', () => {
  it('returns defaults when messages is missing', () => {
    expect(resolveTemplates({})).toEqual(DEFAULT_MESSAGES);
  });

  it('overlays a partial messages mapping per key', () => {
    const templates = resolveTemplates({ messages: { stop: 'Finished. {summary}' } });
    expect(templates.stop).toBe('Finished. {summary}');
    expect(templates.prompt_submit).toBe('On it.');
  });

  it('keeps extra notification keys and ignores non-string values', () => {
    const templates = resolveTemplates({
      messages: { notification_auth_success: 'Logged in.', prompt_submit: 42 },
    });
    expect(templates['notification_auth_success']).toBe('Logged in.');
    expect(templates.prompt_submit).toBe('On it.');
  });
});
