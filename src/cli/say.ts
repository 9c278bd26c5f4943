import { loadConfig, resolveSettings } from '../config.js';
import { capLength } from '../messages.js';
import { speak } from '../speaker.js';

interface SayOptions {
  config?: string;
}

export async function sayCommand(text: string, options: SayOptions): Promise<void> {
  const settings = resolveSettings(loadConfig(options.config));
  console.log(`  Speaking with ${settings.voice}...`);
  await speak(capLength(text), settings);
}
