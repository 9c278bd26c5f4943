import { MsEdgeTTS, OUTPUT_FORMAT } from 'msedge-tts';
import type { VoiceSettings } from './types.js';

/** Turns text into an audio file */
export interface SpeechSynthesizer {
  /** Write synthesized MP3 audio for `text` into `outputDir` and resolve its path */
  synthesize(text: string, settings: VoiceSettings, outputDir: string): Promise<string>;
}

const SSML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/** The service receives text inside an SSML document, so markup characters must be entities */
export function escapeSsml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => SSML_ENTITIES[char] ?? char);
}

// lang-REGION-NameNeural, e.g. en-US-GuyNeural
const VOICE_NAME = /^[a-z]{2,}-[A-Z]{2,}-.+Neural$/;

/** Microsoft Edge neural voices over the read-aloud websocket service */
export class EdgeSynthesizer implements SpeechSynthesizer {
  async synthesize(text: string, settings: VoiceSettings, outputDir: string): Promise<string> {
    if (!VOICE_NAME.test(settings.voice)) {
      throw new Error(`Invalid voice "${settings.voice}"`);
    }

    const tts = new MsEdgeTTS();
    await tts.setMetadata(settings.voice, OUTPUT_FORMAT.AUDIO_24KHZ_48KBITRATE_MONO_MP3);
    const { audioFilePath } = await tts.toFile(outputDir, escapeSsml(text), {
      rate: settings.rate,
      volume: settings.volume,
      pitch: settings.pitch,
    });
    return audioFilePath;
  }
}
