import { resolveTemplates } from './config.js';
import { summarizeText, summarizeTranscript } from './transcript.js';
import type { HookInput, VoiceConfig } from './types.js';

export const MAX_MESSAGE_LENGTH = 200;

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

/**
 * Fill `{name}` placeholders in one pass. Names missing from `values` are left
 * as written; substituted text is never scanned again.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) =>
    Object.hasOwn(values, name) ? (values[name] ?? placeholder) : placeholder,
  );
}

/**
 * Cap text at `maxLength` characters. Prefers ending on the last period when it
 * falls in the back half of the cut; otherwise clips and appends a period.
 */
export function capLength(text: string, maxLength = MAX_MESSAGE_LENGTH): string {
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, maxLength);
  const lastPeriod = cut.lastIndexOf('.');
  if (lastPeriod > Math.floor(maxLength / 2)) {
    return cut.slice(0, lastPeriod + 1);
  }
  return cut.trimEnd() + '.';
}

function stopSummary(event: HookInput): string {
  if (event.transcript_summary) return event.transcript_summary;
  if (event.last_assistant_message) {
    const summary = summarizeText(event.last_assistant_message);
    if (summary) return summary;
  }
  if (event.transcript_path) return summarizeTranscript(event.transcript_path);
  return '';
}

/** Turn a hook event into the sentence to speak, or undefined when it stays quiet */
export function resolveMessage(event: HookInput, config: VoiceConfig): string | undefined {
  const templates = resolveTemplates(config);

  switch (event.hook_event_name) {
    case 'UserPromptSubmit':
      return templates.prompt_submit;

    case 'Stop': {
      // Claude is already continuing because of a Stop hook
      if (event.stop_hook_active === true) return undefined;

      const summary = stopSummary(event);
      const text = summary
        ? renderTemplate(templates.stop, { summary })
        : renderTemplate(templates.stop, { summary: '' }).trim();
      return capLength(text);
    }

    case 'Notification': {
      const key = `notification_${event.notification_type ?? ''}`;
      const template = templates[key] ?? templates.notification_default;
      const text = renderTemplate(template, { message: event.message ?? 'Notification' });
      return capLength(text);
    }

    default:
      return undefined;
  }
}
