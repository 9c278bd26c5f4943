import { getSettingsPath, removeHooks, resolveMode } from './shared.js';

interface UninstallOptions {
  global?: boolean;
  project?: boolean;
}

export async function uninstallCommand(options: UninstallOptions): Promise<void> {
  const mode = resolveMode(options);
  if (!mode) {
    console.log('Please specify --global or --project:\n');
    console.log('  claude-voice uninstall --global   # Remove hooks from global settings');
    console.log('  claude-voice uninstall --project  # Remove hooks from project settings');
    process.exit(1);
  }

  const settingsPath = getSettingsPath(mode);
  const removed = removeHooks(settingsPath);

  if (removed > 0) {
    console.log(`  Removed ${removed} hook(s) from ${settingsPath}`);
  } else {
    console.log('  No claude-voice hooks found in settings.');
  }

  console.log('\n  claude-voice uninstalled.');
}
