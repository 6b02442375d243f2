import { ApplyValidationError } from '@core/errors/ApplyValidationError';
import { CircularDependencyError } from '@core/errors/CircularDependencyError';
import { ParameterEvaluationError } from '@core/errors/ParameterEvaluationError';
import { TrialkitError } from '@core/errors/TrialkitError';
import type { Context } from '@core/types/value';
import { ExpressionNamespace } from '@interpreter/env/ExpressionNamespace';
import type { Paradigm } from '@services/paradigm/Paradigm';

function failingParameter(error: unknown): string | undefined {
  if (error instanceof ParameterEvaluationError) {
    return error.parameter;
  }
  if (error instanceof CircularDependencyError) {
    return error.chain[0];
  }
  return error instanceof TrialkitError ? error.details?.parameter : undefined;
}

/**
 * Dry-runs every expression of `paradigm` on fresh copies, leaving the
 * paradigm's own expressions untouched. Returns the resulting context.
 *
 * @throws {ApplyValidationError} Naming the parameter that failed
 */
export function validateParadigm(paradigm: Paradigm, extraContext: Context = {}): Context {
  const expressions = new Map(
    [...paradigm.getExpressions()].map(([name, expression]) => [name, expression.clone()])
  );
  const namespace = new ExpressionNamespace(expressions, { extraContext });

  try {
    return namespace.evaluateValues(undefined, { dryRun: true, notify: false });
  } catch (error) {
    const parameter = failingParameter(error);
    const formula = parameter !== undefined && paradigm.names().includes(parameter)
      ? paradigm.get(parameter).toString()
      : undefined;
    throw new ApplyValidationError(parameter, formula, error);
  }
}
