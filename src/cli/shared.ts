import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { getPackageRoot } from '../config.js';
import type { ClaudeHookMatcher, ClaudeSettings, HookEvent } from '../types.js';

/** Events the handler speaks for */
export const HOOK_EVENTS: readonly HookEvent[] = ['UserPromptSubmit', 'Stop', 'Notification'];

/**
 * Embedded in every command we register so our hooks can be found again
 * regardless of install path
 */
export const HOOK_MARKER = '#claude-voice';

export type InstallMode = 'global' | 'project';

/** Resolve the mode from --global / --project, or null when neither was given */
export function resolveMode(options: { global?: boolean; project?: boolean }): InstallMode | null {
  if (options.global) return 'global';
  if (options.project) return 'project';
  return null;
}

/** Claude Code settings file for a mode */
export function getSettingsPath(mode: InstallMode): string {
  return mode === 'global'
    ? path.join(os.homedir(), '.claude', 'settings.json')
    : path.join(process.cwd(), '.claude', 'settings.local.json');
}

export function getHandlerPath(): string {
  return path.join(getPackageRoot(), 'dist', 'handler.js');
}

/** The command line Claude Code runs for every registered event */
export function buildHookCommand(handlerPath: string, configPath?: string): string {
  const configArg = configPath ? ` --config "${configPath}"` : '';
  return `node "${handlerPath}"${configArg} ${HOOK_MARKER}`;
}

function readSettings(settingsPath: string): ClaudeSettings {
  if (!fs.existsSync(settingsPath)) return {};
  try {
    return JSON.parse(fs.readFileSync(settingsPath, 'utf8'));
  } catch {
    // Start fresh if corrupt
    return {};
  }
}

function writeSettings(settingsPath: string, settings: ClaudeSettings): void {
  fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
  fs.writeFileSync(settingsPath, JSON.stringify(settings, null, 2) + '\n');
}

function isOurs(matcher: ClaudeHookMatcher): boolean {
  return matcher.hooks.some((h) => h.command.includes(HOOK_MARKER));
}

/** Register the handler for every spoken event, replacing earlier claude-voice entries */
export function registerHooks(settingsPath: string, command: string): void {
  const settings = readSettings(settingsPath);
  const hooks = settings.hooks ?? {};

  for (const event of HOOK_EVENTS) {
    const kept = (hooks[event] ?? []).filter((m) => !isOurs(m));
    kept.push({ matcher: '', hooks: [{ type: 'command', command }] });
    hooks[event] = kept;
  }

  settings.hooks = hooks;
  writeSettings(settingsPath, settings);
}

/** Remove claude-voice entries. Returns how many matchers were removed. */
export function removeHooks(settingsPath: string): number {
  if (!fs.existsSync(settingsPath)) return 0;

  const settings = readSettings(settingsPath);
  const hooks = settings.hooks;
  if (!hooks) return 0;

  let removed = 0;
  for (const [event, matchers] of Object.entries(hooks)) {
    const kept = matchers.filter((m) => !isOurs(m));
    removed += matchers.length - kept.length;

    if (kept.length === 0) {
      delete hooks[event];
    } else {
      hooks[event] = kept;
    }
  }

  if (Object.keys(hooks).length === 0) {
    delete settings.hooks;
  }

  writeSettings(settingsPath, settings);
  return removed;
}
