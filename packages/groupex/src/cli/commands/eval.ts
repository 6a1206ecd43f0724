import type { Logger } from '../../utils/logger.js';
import { createLogger } from '../../utils/logger.js';
import { compileGrammar, resolveGrammar, GrammarError } from '../../grammar/index.js';
import { ParserError, formatSyntaxError } from '../../expression/errors.js';

export interface EvalOptions {
  expression: string;
  /** Shipped grammar name or grammar file path. */
  grammar?: string;
  json?: boolean;
  tree?: boolean;
  logger?: Logger;
}

export interface EvalCommandResult {
  success: boolean;
  value?: unknown;
  consumedLength?: number;
  error?: string;
}

export const DEFAULT_EVAL_GRAMMAR = 'arithmetic';

export function evalCommand(options: EvalOptions): EvalCommandResult {
  const logger = options.logger ?? createLogger('silent');

  try {
    const grammar = compileGrammar(resolveGrammar(options.grammar ?? DEFAULT_EVAL_GRAMMAR, logger), logger);
    const root = grammar.parser.parse(options.expression, grammar.valueEval);

    if (options.tree) {
      console.log(root.toString());
    }

    const result = root.evaluate();
    logger.debug('Evaluated expression', { grammar: grammar.name, consumedLength: result.consumedLength });

    if (options.json) {
      console.log(JSON.stringify({ value: result.value, consumedLength: result.consumedLength }, null, 2));
    } else {
      console.log(String(result.value));
    }
    return { success: true, value: result.value, consumedLength: result.consumedLength };
  } catch (error) {
    if (error instanceof ParserError) {
      console.error(formatSyntaxError(options.expression, error));
      return { success: false, error: error.message };
    }
    if (error instanceof GrammarError) {
      console.error(error.message);
      return { success: false, error: error.message };
    }
    throw error;
  }
}
