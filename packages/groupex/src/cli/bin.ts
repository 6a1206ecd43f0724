#!/usr/bin/env node

import { evalCommand, DEFAULT_EVAL_GRAMMAR } from './commands/eval.js';
import { filter, DEFAULT_FILTER_GRAMMAR } from './commands/filter.js';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';
import { BUILTIN_GRAMMARS } from '../grammar/index.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
groupex - Grouped value and operator expressions

Usage:
  groupex <command> [options]

Commands:
  eval <expression>                 Evaluate an expression and print its value
  filter <expression> <file>        Print the lines of a file the expression matches
  version                           Show version information
  help                              Show this help message

Options:
  --grammar <name|path>   Grammar to use (shipped: ${BUILTIN_GRAMMARS.join(', ')})
                          Defaults: eval "${DEFAULT_EVAL_GRAMMAR}", filter "${DEFAULT_FILTER_GRAMMAR}"
  --json                  Output as JSON
  --tree                  Print the parsed tree before evaluating (eval)
  --log-level <level>     debug, info, warn, error or silent (default: warn)
  --verbose               Debug logging
  --quiet, -q             No logging
  --help, -h              Show help

Exit Codes:
  0  Success
  1  Failure (syntax or evaluation error, missing file, invalid grammar)
  2  Usage error (invalid arguments)

Examples:
  groupex eval "(2 + 3) * 4"
  groupex eval "~[1 - 3] ** 2" --json
  groupex filter "marley && (stephen || bob)" songs.txt
`);
}

function printVersion(): void {
  console.log(`groupex v${VERSION}`);
}

interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  const valueFlags = new Set(['grammar', 'log-level']);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (valueFlags.has(flag) && i + 1 < args.length) {
        options[flag] = args[++i];
      } else {
        flags[flag] = true;
      }
    } else if (/^-[a-z]+$/.test(arg)) {
      for (const f of arg.slice(1).split('')) {
        switch (f) {
          case 'q': flags['quiet'] = true; break;
          case 'h': flags['help'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

function logLevelFor(flags: Record<string, boolean>, options: Record<string, string>): LogLevel {
  if (flags['quiet']) return 'silent';
  const requested = options['log-level'];
  if (requested !== undefined) {
    if (!isLogLevel(requested)) {
      console.error(`Invalid log level: ${requested}`);
      process.exit(2);
    }
    return requested;
  }
  if (flags['verbose']) return 'debug';
  return 'warn';
}

function main(): void {
  const { command, positionals, flags, options } = parseArgs(process.argv.slice(2));
  const logger = createLogger(logLevelFor(flags, options));

  if (flags['help'] || command === 'help') {
    printHelp();
    process.exit(0);
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    process.exit(0);
  }

  switch (command) {
    case 'eval': {
      if (positionals.length < 1) {
        console.error('Usage: groupex eval <expression>');
        process.exit(2);
      }
      const result = evalCommand({
        expression: positionals[0],
        grammar: options['grammar'],
        json: flags['json'],
        tree: flags['tree'],
        logger,
      });
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'filter': {
      if (positionals.length < 2) {
        console.error('Usage: groupex filter <expression> <file>');
        process.exit(2);
      }
      const result = filter({
        expression: positionals[0],
        file: positionals[1],
        grammar: options['grammar'],
        json: flags['json'],
        logger,
      });
      process.exit(result.success ? 0 : 1);
      break;
    }

    case '': {
      console.log('groupex - Grouped value and operator expressions');
      console.log('');
      console.log('Run "groupex help" for usage information.');
      process.exit(0);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Run "groupex help" for usage information.');
      process.exit(2);
    }
  }
}

try {
  main();
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}
