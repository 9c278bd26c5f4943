import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { MessageTemplates, VoiceConfig, VoiceSettings } from './types.js';

export const DEFAULT_MESSAGES: Readonly<MessageTemplates> = Object.freeze({
  prompt_submit: 'On it.',
  stop: 'Done. {summary}',
  notification_permission_prompt: 'Need your permission. {message}',
  notification_idle_prompt: 'Waiting for your input.',
  notification_default: '{message}',
});

export const DEFAULT_SETTINGS: Readonly<VoiceSettings> = Object.freeze({
  voice: 'en-US-GuyNeural',
  rate: '+0%',
  volume: '+0%',
  pitch: '+0Hz',
});

export const DEFAULT_CONFIG: Readonly<VoiceConfig> = Object.freeze({
  enabled: true,
  ...DEFAULT_SETTINGS,
  debug: false,
  messages: DEFAULT_MESSAGES,
});

/** Environment variable that points the hook at a different config.json */
export const CONFIG_ENV = 'CLAUDE_VOICE_CONFIG';

// ── Path resolution ──

/** Locate the package root (config.json and debug.log live here) */
export function getPackageRoot(): string {
  // src/config.ts under vitest, dist/config.js once built: one level down either way
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
}

/** config.json beside the program, unless CLAUDE_VOICE_CONFIG says otherwise */
export function defaultConfigPath(): string {
  return process.env[CONFIG_ENV] || path.join(getPackageRoot(), 'config.json');
}

export function defaultDebugLogPath(): string {
  return path.join(getPackageRoot(), 'debug.log');
}

// ── Loading ──

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load config.json. Any failure (missing file, bad JSON, not an object) prints
 * one diagnostic and yields the built-in defaults.
 */
export function loadConfig(configPath = defaultConfigPath()): VoiceConfig {
  try {
    const raw = fs.readFileSync(configPath, 'utf8');
    const config: VoiceConfig = JSON.parse(raw);

    if (!isRecord(config)) {
      throw new Error(`${configPath} must contain a JSON object`);
    }

    return config;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Config error, using defaults: ${reason}`);
    return DEFAULT_CONFIG;
  }
}

/** Write config.json, creating parent directories */
export function writeConfig(configPath: string, config: VoiceConfig): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n');
}

// ── Queries ──

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/** Any truthy `enabled` keeps speaking; a missing one means enabled */
export function isEnabled(config: VoiceConfig): boolean {
  return config.enabled === undefined ? true : Boolean(config.enabled);
}

export function isDebug(config: VoiceConfig): boolean {
  return Boolean(config.debug);
}

/** Speech parameters with defaults filled in */
export function resolveSettings(config: VoiceConfig): VoiceSettings {
  return {
    voice: stringOr(config.voice, DEFAULT_SETTINGS.voice),
    rate: stringOr(config.rate, DEFAULT_SETTINGS.rate),
    volume: stringOr(config.volume, DEFAULT_SETTINGS.volume),
    pitch: stringOr(config.pitch, DEFAULT_SETTINGS.pitch),
  };
}

/** Default templates overlaid with the user's string-valued `messages` entries */
export function resolveTemplates(config: VoiceConfig): MessageTemplates {
  const templates: MessageTemplates = { ...DEFAULT_MESSAGES };
  if (!isRecord(config.messages)) return templates;

  for (const [key, value] of Object.entries(config.messages)) {
    if (typeof value === 'string') {
      templates[key] = value;
    }
  }

  return templates;
}
