/**
 * trialkit API Entry Point
 *
 * Formula evaluation, sequence generators, the dependency-resolving
 * namespace and the experiment controllers built on it.
 */

// Errors
export * from '@core/errors/index';

// Types
export type * from '@core/types/index';
export { isValueRecord } from '@core/types/value';
export { valuesEqual, formatValue, compareValues, describeValue } from '@core/utils/value-utils';

// Configuration and logging
export { ConfigLoader } from '@core/config/loader';
export type { LoggingConfig, OutputFormat, ResolvedRunConfig, RunConfig, TrialkitConfig } from '@core/config/types';
export { logger, loggerFactory, createServiceLogger } from '@core/utils/logger';
export { version } from '@core/version';

// Formulas
export { parseFormula } from '@grammar/parser/index';
export { evaluateFormula, collectNames, isTruthy } from '@interpreter/eval/formula-evaluator';
export type { EvaluationOptions } from '@interpreter/eval/formula-evaluator';
export { ParameterExpression, ADVANCE_PATTERN } from '@interpreter/eval/ParameterExpression';
export type { ParameterExpressionOptions } from '@interpreter/eval/ParameterExpression';
export { helpers, isHelperName, roundHalfEven, seedHelpers } from '@interpreter/builtins/helpers';
export type { FormulaResult, HelperFunction, HelperTable } from '@interpreter/builtins/helpers';

// Sequences
export * from '@interpreter/choice/index';

// Namespace
export { ExpressionNamespace } from '@interpreter/env/ExpressionNamespace';
export type {
  ExpressionDefinition,
  NamespaceObserver,
  NamespaceOptions,
  ResolveOptions,
  SetterFunction
} from '@interpreter/env/ExpressionNamespace';

// Services
export * from '@services/paradigm/index';
export * from '@services/data/index';
export * from '@services/selector/index';
export * from '@services/controller/index';
