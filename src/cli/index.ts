#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './init.js';
import { testCommand } from './test.js';
import { sayCommand } from './say.js';
import { uninstallCommand } from './uninstall.js';

const program = new Command();

program
  .name('claude-voice')
  .description('Spoken notifications for Claude Code sessions')
  .version('0.1.0');

program
  .command('init')
  .description('Write config.json and install claude-voice hooks into Claude Code')
  .option('--global', 'Register hooks in ~/.claude/settings.json')
  .option('--project', 'Register hooks in .claude/settings.local.json')
  .option('--voice <name>', 'Edge neural voice (skips interactive picker)')
  .option('-c, --config <path>', 'Path to config.json')
  .action(initCommand);

program
  .command('test [event]')
  .description('Speak the message for a sample event (or list all templates)')
  .option('-c, --config <path>', 'Path to config.json')
  .option('--type <notification_type>', 'Notification type, e.g. permission_prompt')
  .option('--message <text>', 'Notification message')
  .option('--summary <text>', 'Stop summary')
  .option('--dry-run', 'Print the message without speaking it')
  .action(testCommand);

program
  .command('say <text>')
  .description('Speak arbitrary text with the configured voice')
  .option('-c, --config <path>', 'Path to config.json')
  .action(sayCommand);

program
  .command('uninstall')
  .description('Remove claude-voice hooks from Claude Code')
  .option('--global', 'Remove from global settings')
  .option('--project', 'Remove from project settings')
  .action(uninstallCommand);

await program.parseAsync();

// An idle TTS websocket can keep the event loop alive after speaking
process.exit(0);
