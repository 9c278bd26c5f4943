import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { soundPlayer, type AudioPlayer } from './player.js';
import { EdgeSynthesizer, type SpeechSynthesizer } from './synthesizer.js';
import type { VoiceSettings } from './types.js';

export interface SpeakCollaborators {
  synthesizer: SpeechSynthesizer;
  player: AudioPlayer;
}

export function defaultCollaborators(): SpeakCollaborators {
  return { synthesizer: new EdgeSynthesizer(), player: soundPlayer };
}

/** Create a private temp directory for one synthesized clip */
export function createAudioDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'claude-voice-'));
}

function removeQuietly(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch {
    // left for the OS to clean up
  }
}

/**
 * Synthesize `text` into a temp MP3, play it and remove it again.
 * Synthesis and playback errors propagate; cleanup errors don't.
 */
export async function speak(
  text: string,
  settings: VoiceSettings,
  collaborators: SpeakCollaborators = defaultCollaborators(),
): Promise<void> {
  const audioDir = createAudioDir();

  try {
    const audioPath = await collaborators.synthesizer.synthesize(text, settings, audioDir);
    await collaborators.player.play(audioPath);
  } finally {
    removeQuietly(audioDir);
  }
}
