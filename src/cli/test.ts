import { loadConfig, resolveSettings, resolveTemplates } from '../config.js';
import { resolveMessage } from '../messages.js';
import { speak } from '../speaker.js';
import type { HookInput } from '../types.js';

interface TestOptions {
  config?: string;
  type?: string;
  message?: string;
  summary?: string;
  dryRun?: boolean;
}

/** Build the event Claude Code would send for `event` */
export function buildSampleEvent(event: string, options: TestOptions): HookInput {
  return {
    hook_event_name: event,
    session_id: 'claude-voice-test',
    notification_type: options.type,
    message: options.message,
    transcript_summary: options.summary,
  };
}

export async function testCommand(
  event: string | undefined,
  options: TestOptions,
): Promise<void> {
  const config = loadConfig(options.config);

  if (!event) {
    // List all templates
    console.log('Templates:');
    for (const [key, template] of Object.entries(resolveTemplates(config))) {
      console.log(`  ${key.padEnd(32)} ${template}`);
    }
    console.log('\nTest an event: claude-voice test <UserPromptSubmit|Stop|Notification>');
    return;
  }

  const message = resolveMessage(buildSampleEvent(event, options), config);
  if (!message) {
    console.error(`Nothing to say for "${event}"`);
    process.exit(1);
  }

  console.log(`  "${message}"`);
  if (options.dryRun) return;

  await speak(message, resolveSettings(config));
}
