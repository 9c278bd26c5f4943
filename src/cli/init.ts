import fs from 'node:fs';
import { DEFAULT_CONFIG, DEFAULT_SETTINGS, defaultConfigPath, loadConfig, writeConfig } from '../config.js';
import { select, VOICE_OPTIONS } from './prompt.js';
import {
  buildHookCommand,
  getHandlerPath,
  getSettingsPath,
  registerHooks,
  resolveMode,
} from './shared.js';

interface InitOptions {
  global?: boolean;
  project?: boolean;
  voice?: string;
  config?: string;
}

async function chooseVoice(explicit?: string): Promise<string | undefined> {
  if (explicit) return explicit;
  if (!process.stdin.isTTY) return undefined;
  return select('Pick a voice', VOICE_OPTIONS);
}

export async function initCommand(options: InitOptions): Promise<void> {
  const mode = resolveMode(options);
  if (!mode) {
    console.log('Please specify --global or --project:\n');
    console.log('  claude-voice init --global   # Speak for all projects');
    console.log('  claude-voice init --project  # Speak for the current project only');
    process.exit(1);
  }

  const configPath = options.config ?? defaultConfigPath();

  // 1. Write config. An existing file keeps its settings, but a voice that was
  // never changed from the default is still offered the picker.
  if (fs.existsSync(configPath)) {
    const existing = loadConfig(configPath);
    const current = existing.voice ?? DEFAULT_SETTINGS.voice;
    const voice = options.voice ?? (current === DEFAULT_SETTINGS.voice ? await chooseVoice() : undefined);

    if (voice && voice !== current) {
      writeConfig(configPath, { ...existing, voice });
      console.log(`  Config: set voice to ${voice} in ${configPath}`);
    } else {
      console.log(`  Config already exists at ${configPath}, skipping.`);
    }
  } else {
    const voice = await chooseVoice(options.voice);
    writeConfig(configPath, { ...DEFAULT_CONFIG, ...(voice ? { voice } : {}) });
    console.log(`  Config: ${configPath}`);
  }

  // 2. Register hooks in Claude settings
  const settingsPath = getSettingsPath(mode);
  const command = buildHookCommand(getHandlerPath(), options.config);
  registerHooks(settingsPath, command);
  console.log(`  Hooks: registered in ${settingsPath}`);

  console.log('\n  claude-voice installed successfully!\n');
  console.log(`  Edit your config: ${configPath}`);
  console.log('  Test it:          claude-voice test Stop --summary "All tests pass."');
}
