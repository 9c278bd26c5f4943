import { isDebug, isEnabled, isRecord, loadConfig, resolveSettings } from './config.js';
import { appendDebugLog } from './debug-log.js';
import { resolveMessage } from './messages.js';
import { speak } from './speaker.js';
import type { HookInput, VoiceSettings } from './types.js';

export type HookOutcome =
  | { status: 'disabled' }
  | { status: 'silent' }
  | { status: 'spoken'; message: string };

export interface HookOptions {
  /** Defaults to config.json beside the program */
  configPath?: string;
  /** Defaults to debug.log beside the program */
  debugLogPath?: string;
  /** Swappable for tests; defaults to Edge TTS + play-sound */
  speak?: (text: string, settings: VoiceSettings) => Promise<void>;
}

/** Parse the stdin blob. Blank input is an empty event; malformed JSON throws. */
export function parseEvent(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('hook input must be a JSON object');
  }
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Pick the fields the resolver understands; wrongly-typed fields count as absent */
export function toHookInput(event: Record<string, unknown>): HookInput {
  return {
    hook_event_name: optionalString(event.hook_event_name),
    session_id: optionalString(event.session_id),
    transcript_path: optionalString(event.transcript_path),
    cwd: optionalString(event.cwd),
    message: optionalString(event.message),
    notification_type: optionalString(event.notification_type),
    stop_hook_active: typeof event.stop_hook_active === 'boolean' ? event.stop_hook_active : undefined,
    transcript_summary: optionalString(event.transcript_summary),
    last_assistant_message: optionalString(event.last_assistant_message),
  };
}

/** Handle one hook invocation end to end */
export async function runHook(raw: string, options: HookOptions = {}): Promise<HookOutcome> {
  const event = parseEvent(raw);
  const config = loadConfig(options.configPath);

  if (isDebug(config)) {
    appendDebugLog(event, options.debugLogPath);
  }

  if (!isEnabled(config)) {
    return { status: 'disabled' };
  }

  const message = resolveMessage(toHookInput(event), config);
  if (!message) {
    return { status: 'silent' };
  }

  const say = options.speak ?? speak;
  await say(message, resolveSettings(config));
  return { status: 'spoken', message };
}
