/**
 * Load grammar files and compile them into configured parsers.
 *
 * @module grammar/loader
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { Grouping } from '../expression/grouping.js';
import { OperatorBinary, OperatorUnary, type Operator } from '../expression/operator.js';
import { Parser } from '../expression/parser.js';
import type { EvalFn } from '../expression/nodes.js';
import {
  BINARY_FUNCTIONS,
  UNARY_FUNCTIONS,
  VALUE_EVALUATORS,
  isBinaryFunctionName,
  isUnaryFunctionName,
} from './builtins.js';
import { validateGrammarConfig, type GrammarConfig, type OperatorConfig } from './schema.js';

/** Grammars shipped in the package's `grammars/` directory. */
export const BUILTIN_GRAMMARS = ['boolean', 'arithmetic'] as const;

export type BuiltinGrammarName = (typeof BUILTIN_GRAMMARS)[number];

export class GrammarError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'GrammarError';
  }
}

export interface CompiledGrammar {
  name: string;
  parser: Parser;
  /** Value evaluator named by the grammar, used as the parse default. */
  valueEval: EvalFn;
}

export function isBuiltinGrammarName(name: string): name is BuiltinGrammarName {
  return BUILTIN_GRAMMARS.some((builtin) => builtin === name);
}

/**
 * Parse and validate grammar YAML.
 *
 * @throws {GrammarError} If the YAML is malformed or fails validation
 */
export function parseGrammar(content: string): GrammarConfig {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new GrammarError(`Invalid grammar YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const validation = validateGrammarConfig(document);
  if (!validation.valid) {
    throw new GrammarError('Invalid grammar', validation.errors);
  }
  return validation.config;
}

export function loadGrammarFile(path: string, logger: Logger = createLogger('silent')): GrammarConfig {
  if (!existsSync(path)) {
    throw new GrammarError(`Grammar file not found: ${path}`);
  }

  const config = parseGrammar(readFileSync(path, 'utf-8'));
  logger.debug('Loaded grammar', {
    path,
    name: config.name,
    operators: config.operators.length,
    groupings: config.groupings.length,
  });
  return config;
}

export function builtinGrammarPath(name: BuiltinGrammarName): string {
  return fileURLToPath(new URL(`../../grammars/${name}.yaml`, import.meta.url));
}

export function loadBuiltinGrammar(name: BuiltinGrammarName, logger?: Logger): GrammarConfig {
  return loadGrammarFile(builtinGrammarPath(name), logger);
}

/**
 * Resolve a grammar reference: the name of a shipped grammar, otherwise a
 * path to a grammar file.
 */
export function resolveGrammar(ref: string, logger?: Logger): GrammarConfig {
  if (isBuiltinGrammarName(ref)) {
    return loadBuiltinGrammar(ref, logger);
  }
  return loadGrammarFile(ref, logger);
}

function buildOperator(config: OperatorConfig): Operator {
  if (config.arity === 'unary') {
    if (!isUnaryFunctionName(config.fn)) {
      throw new GrammarError(`Unknown unary function '${config.fn}'`);
    }
    return new OperatorUnary(config.symbol, UNARY_FUNCTIONS[config.fn]);
  }
  if (!isBinaryFunctionName(config.fn)) {
    throw new GrammarError(`Unknown binary function '${config.fn}'`);
  }
  return new OperatorBinary(config.symbol, BINARY_FUNCTIONS[config.fn]);
}

/**
 * Build a parser from a validated grammar.
 */
export function compileGrammar(config: GrammarConfig, logger?: Logger): CompiledGrammar {
  const operators = config.operators.map(buildOperator);
  const groupings = config.groupings.map((g) => new Grouping(g.start, g.end));

  operators.forEach((op, i) => {
    const shadowedBy = operators
      .slice(0, i)
      .find((earlier) => op.representation.startsWith(earlier.representation));
    if (shadowedBy) {
      logger?.warn('Operator is shadowed by an earlier operator and never matches', {
        grammar: config.name,
        symbol: op.representation,
        shadowedBy: shadowedBy.representation,
      });
    }
  });

  return {
    name: config.name,
    parser: new Parser({ operators, groupings, logger }),
    valueEval: VALUE_EVALUATORS[config.values],
  };
}
