/**
 * Command Line
 *
 * Parses the arguments given to `vted`. Parsing never exits the process;
 * the entry point decides what to do with the result.
 */

export const VERSION = '0.1.0';

export const HELP_TEXT = `
vted - VT100 Text Editor

Usage: vted [options] [file...]

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log
  --tab-size <n>          Indent width for new buffers
  --undo <n>              Undo history length per buffer

Each file opens in its own buffer. With no files and piped input, the input
becomes an unnamed buffer that is printed to stdout on exit.

Keys:
  ^S save   ^O open   ^W next buffer   ^Q quit
  ^F find   ^N find again   ^R replace   ^G goto line
  ^L mark   ^X cut   ^D copy   ^V paste   ^Z undo
  ^K match bracket   ^A options   ^T top   ^B bottom
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'edit'; files: string[]; debug: boolean; tabSize?: number; undoLimit?: number }
  | { kind: 'error'; message: string };

function parseCount(flag: string, raw: string | undefined, min: number): number | string {
  if (raw === undefined) {
    return `${flag} needs a value`;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    return `${flag}: invalid value '${raw}'`;
  }
  return Number(raw);
}

export function parseArgs(args: readonly string[]): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }
  if (args.includes('--version') || args.includes('-v')) {
    return { kind: 'version' };
  }

  const command: Extract<CliCommand, { kind: 'edit' }> = {
    kind: 'edit',
    files: [],
    debug: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--debug':
        command.debug = true;
        break;
      case '--tab-size': {
        const value = parseCount(arg, args[++i], 1);
        if (typeof value === 'string') return { kind: 'error', message: value };
        command.tabSize = value;
        break;
      }
      case '--undo': {
        const value = parseCount(arg, args[++i], 0);
        if (typeof value === 'string') return { kind: 'error', message: value };
        command.undoLimit = value;
        break;
      }
      case '--':
        command.files.push(...args.slice(i + 1));
        return command;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          return { kind: 'error', message: `Unknown option: ${arg}` };
        }
        command.files.push(arg);
        break;
    }
  }

  return command;
}
