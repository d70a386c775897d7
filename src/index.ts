#!/usr/bin/env tsx
/**
 * vted - VT100 Text Editor
 *
 * Entry point for the application.
 */

import * as fs from 'fs';
import * as tty from 'tty';
import { HELP_TEXT, VERSION, parseArgs } from './cli.ts';
import { settings } from './config/settings.ts';
import { loadUserConfig } from './config/user-config.ts';
import { formatError } from './core/errors.ts';
import { splitLines } from './core/file-io.ts';
import { debugLog, setDebugEnabled } from './debug.ts';
import { runSession, type SessionSource } from './state/session-manager.ts';
import { NodeTerminal, type TerminalInputStream, type TerminalOutputStream } from './terminal/node-terminal.ts';

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(HELP_TEXT);
      return 0;
    case 'version':
      console.log(`vted v${VERSION}`);
      return 0;
    case 'error':
      console.error(`vted: ${command.message}`);
      console.error('Try vted --help');
      return 2;
    case 'edit':
      break;
  }

  setDebugEnabled(command.debug);
  debugLog(`[Main] Starting vted v${VERSION}`);

  await loadUserConfig(settings);
  settings.update({ 'editor.tabSize': command.tabSize, 'editor.undoLimit': command.undoLimit });

  const sources: SessionSource[] = [...command.files];
  let input: TerminalInputStream = process.stdin;
  let output: TerminalOutputStream = process.stdout;

  // Piped text becomes the first buffer; keys then come from the terminal itself
  if (sources.length === 0 && !process.stdin.isTTY) {
    sources.push(splitLines(fs.readFileSync(0, 'utf8')));
    input = new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
  }
  // Keep the screen off stdout when stdout carries the result
  if (!process.stdout.isTTY) {
    output = new tty.WriteStream(fs.openSync('/dev/tty', 'w'));
  }

  const terminal = new NodeTerminal(input, output);
  terminal.enterRawMode();

  const result = await runSession(terminal, sources, {
    settings,
    greeting: `vted v${VERSION}  ^Q quit, ^S save`,
  }).finally(() => terminal.leaveRawMode());

  if (result.type === 'content') {
    for (const line of result.lines) {
      process.stdout.write(line + '\n');
    }
  }
  debugLog('[Main] Exit');
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(`vted: ${formatError(error)}`);
    process.exit(1);
  });
