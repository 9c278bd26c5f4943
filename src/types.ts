/** Hook events that produce a spoken message */
export type HookEvent = 'UserPromptSubmit' | 'Stop' | 'Notification';

/** JSON payload from Claude Code hooks via stdin */
export interface HookInput {
  hook_event_name?: string;
  session_id?: string;
  transcript_path?: string;
  cwd?: string;
  // Notification
  message?: string;
  notification_type?: string;
  // Stop
  stop_hook_active?: boolean;
  transcript_summary?: string;
  last_assistant_message?: string;
}

/** Template keys under `messages` in config.json */
export type MessageKey =
  | 'prompt_submit'
  | 'stop'
  | 'notification_permission_prompt'
  | 'notification_idle_prompt'
  | 'notification_default';

/** Default templates plus any extra `notification_<type>` entries the user adds */
export type MessageTemplates = Record<MessageKey, string> & Record<string, string>;

/** The config.json file beside the program. Every field is optional. */
export interface VoiceConfig {
  /** Global kill switch, read for truthiness */
  enabled?: boolean | number | string | null;
  /** Edge neural voice name, e.g. en-US-GuyNeural */
  voice?: string;
  /** Relative speaking rate, e.g. +10% */
  rate?: string;
  /** Relative volume, e.g. -20% */
  volume?: string;
  /** Relative pitch, e.g. +2Hz */
  pitch?: string;
  /** Append every raw event to debug.log, read for truthiness */
  debug?: boolean | number | string | null;
  messages?: Record<string, unknown>;
}

/** Speech parameters handed to the synthesizer */
export interface VoiceSettings {
  voice: string;
  rate: string;
  volume: string;
  pitch: string;
}

/** Structure of Claude Code settings.json hooks section */
export interface ClaudeHookEntry {
  type: 'command';
  command: string;
  async?: boolean;
  timeout?: number;
}

export interface ClaudeHookMatcher {
  matcher: string;
  hooks: ClaudeHookEntry[];
}

export interface ClaudeSettings {
  hooks?: Record<string, ClaudeHookMatcher[]>;
  [key: string]: unknown;
}
