/**
 * Central export point for trialkit error types.
 */

export { TrialkitError, ErrorSeverity } from './TrialkitError';
export type { BaseErrorDetails, TrialkitErrorOptions } from './TrialkitError';
export { FormulaParseError } from './FormulaParseError';
export type { FormulaPosition } from './FormulaParseError';
export { FormulaDefinitionError } from './FormulaDefinitionError';
export { FormulaEvaluationError } from './FormulaEvaluationError';
export { UnresolvedNameError } from './UnresolvedNameError';
export { SequenceExhaustedError } from './SequenceExhaustedError';
export { InvalidArgumentError } from './InvalidArgumentError';
export { CircularDependencyError } from './CircularDependencyError';
export { UnknownParameterError } from './UnknownParameterError';
export { ParameterEvaluationError } from './ParameterEvaluationError';
export { ApplyValidationError } from './ApplyValidationError';
export { ControllerStateError } from './ControllerStateError';
export { ParadigmFileError } from './ParadigmFileError';

export enum ErrorCode {
  FORMULA_PARSE_ERROR = 'FORMULA_PARSE_ERROR',
  FORMULA_DEFINITION_ERROR = 'FORMULA_DEFINITION_ERROR',
  FORMULA_EVALUATION_ERROR = 'FORMULA_EVALUATION_ERROR',
  UNRESOLVED_NAME = 'UNRESOLVED_NAME',
  SEQUENCE_EXHAUSTED = 'SEQUENCE_EXHAUSTED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  UNKNOWN_PARAMETER = 'UNKNOWN_PARAMETER',
  PARAMETER_EVALUATION_ERROR = 'PARAMETER_EVALUATION_ERROR',
  APPLY_VALIDATION_FAILED = 'APPLY_VALIDATION_FAILED',
  INVALID_STATE = 'INVALID_STATE',
  PARADIGM_FILE_ERROR = 'PARADIGM_FILE_ERROR',
}
