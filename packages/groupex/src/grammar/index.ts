/**
 * Declarative grammars: YAML files binding operator symbols and groupings
 * to built-in functions.
 *
 * @module grammar
 */

export {
  VALUE_EVALUATORS,
  BINARY_FUNCTIONS,
  UNARY_FUNCTIONS,
  isValueEvaluatorName,
  isBinaryFunctionName,
  isUnaryFunctionName,
} from './builtins.js';
export type { ValueEvaluatorName, BinaryFunctionName, UnaryFunctionName } from './builtins.js';

export { validateGrammarConfig } from './schema.js';
export type { GrammarConfig, GrammarValidation, OperatorConfig, GroupingConfig } from './schema.js';

export {
  BUILTIN_GRAMMARS,
  GrammarError,
  builtinGrammarPath,
  compileGrammar,
  isBuiltinGrammarName,
  loadBuiltinGrammar,
  loadGrammarFile,
  parseGrammar,
  resolveGrammar,
} from './loader.js';
export type { BuiltinGrammarName, CompiledGrammar } from './loader.js';
