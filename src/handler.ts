#!/usr/bin/env node

/**
 * claude-voice hook handler
 *
 * Called by Claude Code hooks with:
 *   node handler.js [--config <path/to/config.json>]
 *
 * Reads hook JSON from stdin, resolves a message and speaks it.
 * Always exits 0 so a failed notification never looks like a failed hook.
 */

import { runHook } from './hook.js';

function parseArgs(argv: string[]): { config?: string } {
  let config: string | undefined;

  for (let i = 2; i < argv.length; i++) {
    if (argv[i] === '--config') {
      config = argv[++i];
    }
  }

  return { config };
}

async function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk) => { data += chunk; });
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', reject);
    if (process.stdin.isTTY) resolve('');
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const raw = await readStdin();
  await runHook(raw, { configPath: args.config });
}

main()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`claude-voice error: ${message}`);
  })
  .finally(() => process.exit(0));
