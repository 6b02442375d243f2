import { FormulaEvaluationError } from '@core/errors/FormulaEvaluationError';
import { describeValue } from '@core/utils/value-utils';
import type { Value } from '@core/types/value';

/**
 * Parameter list of a helper. Names after `required` are optional and come
 * back as `undefined` when the call leaves them out.
 */
export interface HelperSignature {
  name: string;
  params: readonly string[];
  required?: number;
}

/**
 * Matches positional and keyword arguments against a helper's parameter list:
 * positionals fill parameters left to right, keywords fill the rest by name.
 */
export function bindArguments(
  signature: HelperSignature,
  args: readonly Value[],
  keywords: Readonly<Record<string, Value>>
): (Value | undefined)[] {
  const { name, params } = signature;
  const required = signature.required ?? params.length;

  if (args.length > params.length) {
    throw new FormulaEvaluationError(
      `${name}() takes at most ${params.length} arguments (${args.length} given)`,
      { helper: name }
    );
  }

  const bound: (Value | undefined)[] = params.map((_, index) => args[index]);

  for (const [keyword, value] of Object.entries(keywords)) {
    const index = params.indexOf(keyword);
    if (index === -1) {
      throw new FormulaEvaluationError(`${name}() got an unexpected keyword argument '${keyword}'`, { helper: name });
    }
    if (bound[index] !== undefined) {
      throw new FormulaEvaluationError(`${name}() got multiple values for argument '${keyword}'`, { helper: name });
    }
    bound[index] = value;
  }

  for (let index = 0; index < required; index++) {
    if (bound[index] === undefined) {
      throw new FormulaEvaluationError(`${name}() missing required argument '${params[index]}'`, { helper: name });
    }
  }

  return bound;
}

/**
 * Rejects keyword arguments for helpers that only take positionals
 */
export function noKeywords(helper: string, keywords: Readonly<Record<string, Value>>): void {
  const [first] = Object.keys(keywords);
  if (first !== undefined) {
    throw new FormulaEvaluationError(`${helper}() got an unexpected keyword argument '${first}'`, { helper });
  }
}

export function toNumber(helper: string, argument: string, value: Value | undefined): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  throw new FormulaEvaluationError(
    `${helper}() argument '${argument}' must be a number, not ${describeValue(value)}`,
    { helper }
  );
}

export function toInteger(helper: string, argument: string, value: Value | undefined): number {
  const number = toNumber(helper, argument, value);
  if (!Number.isInteger(number)) {
    throw new FormulaEvaluationError(`${helper}() argument '${argument}' must be an integer, got ${number}`, { helper });
  }
  return number;
}

export function toList(helper: string, argument: string, value: Value | undefined): Value[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return Array.from(value);
  }
  throw new FormulaEvaluationError(
    `${helper}() argument '${argument}' must be a list, not ${describeValue(value)}`,
    { helper }
  );
}

/**
 * `None` and an omitted argument both mean "use the default"
 */
export function optional(value: Value | undefined): Value | undefined {
  return value === null ? undefined : value;
}
