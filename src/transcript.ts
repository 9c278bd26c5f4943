import fs from 'node:fs';

export const MAX_SUMMARY_LENGTH = 150;

interface ContentBlock {
  type?: string;
  text?: unknown;
}

interface TranscriptEntry {
  type?: string;
  message?: {
    content?: string | ContentBlock[];
  };
}

/** Text of the last text block in an assistant entry, if any */
function lastTextBlock(entry: TranscriptEntry): string | undefined {
  const content = entry.message?.content;
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return undefined;

  let text: string | undefined;
  for (const block of content) {
    if (block?.type === 'text' && typeof block.text === 'string') {
      text = block.text;
    }
  }
  return text;
}

/**
 * Reduce an assistant turn to one speakable line: the last non-empty line,
 * since that is usually where the conclusion or the question sits.
 */
export function summarizeText(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const snippet = lines[lines.length - 1] ?? '';

  if (snippet.length <= MAX_SUMMARY_LENGTH) return snippet;

  const period = snippet.indexOf('.');
  if (period > 0 && period < MAX_SUMMARY_LENGTH) {
    return snippet.slice(0, period + 1);
  }
  return snippet.slice(0, MAX_SUMMARY_LENGTH);
}

/**
 * Summarize the latest assistant text in a transcript JSONL file.
 * Returns '' when nothing usable is found or the file can't be read.
 */
export function summarizeTranscript(transcriptPath: string): string {
  let raw: string;
  try {
    raw = fs.readFileSync(transcriptPath, 'utf8');
  } catch {
    return '';
  }

  let lastText = '';
  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let entry: TranscriptEntry | null;
    try {
      entry = JSON.parse(trimmed);
    } catch {
      // Skip malformed lines
      continue;
    }

    if (entry?.type !== 'assistant') continue;
    const text = lastTextBlock(entry);
    if (text !== undefined) lastText = text;
  }

  if (!lastText.trim()) return '';
  return summarizeText(lastText);
}
