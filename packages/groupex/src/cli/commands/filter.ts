import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from '../../utils/logger.js';
import { createLogger } from '../../utils/logger.js';
import { compileGrammar, resolveGrammar, GrammarError } from '../../grammar/index.js';
import { ParserError, formatSyntaxError } from '../../expression/errors.js';
import type { Group } from '../../expression/group.js';

export interface FilterOptions {
  expression: string;
  /** Text file; each non-blank line is tested against the expression. */
  file: string;
  grammar?: string;
  json?: boolean;
  logger?: Logger;
}

export interface FilterResult {
  success: boolean;
  matches: string[];
  total: number;
  error?: string;
}

export const DEFAULT_FILTER_GRAMMAR = 'boolean';

/**
 * True when the expression holds for `line`, where each value token holds
 * if it occurs (case-insensitively) in the line.
 */
export function lineMatches(root: Group, line: string): boolean {
  const haystack = line.toLowerCase();
  const result = root.evaluate((token) => haystack.includes(token.trim().toLowerCase()));
  return Boolean(result.value);
}

export function filter(options: FilterOptions): FilterResult {
  const logger = options.logger ?? createLogger('silent');
  const path = resolve(options.file);

  if (!existsSync(path)) {
    const error = `File not found: ${path}`;
    console.error(error);
    return { success: false, matches: [], total: 0, error };
  }

  const lines = readFileSync(path, 'utf-8')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  const matches: string[] = [];
  try {
    const grammar = compileGrammar(resolveGrammar(options.grammar ?? DEFAULT_FILTER_GRAMMAR, logger), logger);
    const root = grammar.parser.parse(options.expression);
    for (const line of lines) {
      if (lineMatches(root, line)) {
        matches.push(line);
      }
    }
  } catch (error) {
    if (error instanceof ParserError) {
      console.error(formatSyntaxError(options.expression, error));
      return { success: false, matches: [], total: lines.length, error: error.message };
    }
    if (error instanceof GrammarError) {
      console.error(error.message);
      return { success: false, matches: [], total: lines.length, error: error.message };
    }
    throw error;
  }

  logger.info('Filtered lines', { file: path, total: lines.length, matched: matches.length });

  if (options.json) {
    console.log(JSON.stringify({ matches, total: lines.length }, null, 2));
  } else {
    for (const line of matches) {
      console.log(line);
    }
  }

  return { success: true, matches, total: lines.length };
}
