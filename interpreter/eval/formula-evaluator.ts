import { FormulaEvaluationError } from '@core/errors/FormulaEvaluationError';
import { UnresolvedNameError } from '@core/errors/UnresolvedNameError';
import type {
  BinaryNode,
  CallNode,
  CompareNode,
  CompareOperator,
  FormulaNode
} from '@core/types/formula';
import { isValueRecord } from '@core/types/value';
import type { Context, Value } from '@core/types/value';
import { compareValues, describeValue, valuesEqual } from '@core/utils/value-utils';
import { helpers as defaultHelpers } from '@interpreter/builtins/helpers';
import type { FormulaResult, HelperTable } from '@interpreter/builtins/helpers';
import { isSequence } from '@interpreter/choice/Sequence';

export interface EvaluationOptions {
  /** Helper table consulted after the scope; defaults to the shared table */
  helpers?: HelperTable;
  /** Formula text, attached to errors */
  formula?: string;
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * Truthiness: None, 0, '', [] and {} are false
 */
export function isTruthy(value: Value): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

/**
 * Evaluates formula ASTs against a name → value scope.
 *
 * Names resolve against the scope first and the helper table second. Only
 * helpers can be called. The top-level result may be a Sequence (from a
 * generator constructor); anywhere else a Sequence is rejected as an operand.
 */
export class FormulaEvaluator {
  private readonly helpers: HelperTable;
  private readonly formula?: string;

  constructor(private readonly scope: Readonly<Context>, options: EvaluationOptions = {}) {
    this.helpers = options.helpers ?? defaultHelpers;
    this.formula = options.formula;
  }

  evaluate(node: FormulaNode): FormulaResult {
    if (node.type === 'Call') {
      return this.evaluateCall(node);
    }
    return this.value(node);
  }

  private fail(message: string, cause?: unknown): FormulaEvaluationError {
    return new FormulaEvaluationError(message, { formula: this.formula }, cause);
  }

  /**
   * Evaluates a node that must produce a plain value
   */
  private value(node: FormulaNode): Value {
    switch (node.type) {
      case 'Number':
      case 'String':
      case 'Boolean':
        return node.value;
      case 'None':
        return null;
      case 'Name':
        return this.lookup(node.name);
      case 'List':
        return node.elements.map(element => this.value(element));
      case 'Unary': {
        const operand = this.value(node.operand);
        if (node.operator === 'not') {
          return !isTruthy(operand);
        }
        const number = this.numeric(operand, node.operator);
        return node.operator === '-' ? -number : number;
      }
      case 'Binary':
        return this.evaluateBinary(node);
      case 'Compare':
        return this.evaluateCompare(node);
      case 'Logical': {
        const left = this.value(node.left);
        if (node.operator === 'and') {
          return isTruthy(left) ? this.value(node.right) : left;
        }
        return isTruthy(left) ? left : this.value(node.right);
      }
      case 'Conditional':
        return isTruthy(this.value(node.test)) ? this.value(node.consequent) : this.value(node.alternate);
      case 'Call': {
        const result = this.evaluateCall(node);
        if (isSequence(result)) {
          throw this.fail(`A ${result.kind} sequence cannot be used inside an expression`);
        }
        return result;
      }
      case 'Subscript':
        return this.subscript(this.value(node.object), this.value(node.index));
      case 'Attribute': {
        const object = this.value(node.object);
        if (!isValueRecord(object) || !hasOwn(object, node.name)) {
          throw this.fail(`${describeValue(object)} has no attribute '${node.name}'`);
        }
        return object[node.name];
      }
    }
  }

  private lookup(name: string): Value {
    if (hasOwn(this.scope, name)) {
      return this.scope[name];
    }
    if (hasOwn(this.helpers, name)) {
      throw this.fail(`Helper '${name}' must be called`);
    }
    throw new UnresolvedNameError(name, this.formula);
  }

  private evaluateCall(node: CallNode): FormulaResult {
    if (node.callee.type !== 'Name') {
      throw this.fail('Only helper functions can be called');
    }
    const name = node.callee.name;
    if (hasOwn(this.scope, name)) {
      throw this.fail(`'${name}' is not callable`);
    }
    if (!hasOwn(this.helpers, name)) {
      throw new UnresolvedNameError(name, this.formula);
    }

    const args = node.args.map(arg => this.value(arg));
    const keywords: Record<string, Value> = {};
    for (const keyword of node.keywords) {
      if (hasOwn(keywords, keyword.name)) {
        throw this.fail(`Keyword argument '${keyword.name}' repeated`);
      }
      keywords[keyword.name] = this.value(keyword.value);
    }
    return this.helpers[name](args, keywords);
  }

  private numeric(value: Value, operator: string): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    throw this.fail(`Unsupported operand type for ${operator}: ${describeValue(value)}`);
  }

  private isNumeric(value: Value): value is number | boolean {
    return typeof value === 'number' || typeof value === 'boolean';
  }

  private repeat(value: string | Value[], times: Value): Value {
    if (typeof times !== 'number' || !Number.isInteger(times)) {
      throw this.fail(`Can't multiply sequence by non-int of type ${describeValue(times)}`);
    }
    const count = Math.max(0, times);
    if (typeof value === 'string') {
      return value.repeat(count);
    }
    const repeated: Value[] = [];
    for (let i = 0; i < count; i++) {
      repeated.push(...value);
    }
    return repeated;
  }

  private evaluateBinary(node: BinaryNode): Value {
    const left = this.value(node.left);
    const right = this.value(node.right);
    const { operator } = node;

    if (operator === '+') {
      if (typeof left === 'string' && typeof right === 'string') {
        return left + right;
      }
      if (Array.isArray(left) && Array.isArray(right)) {
        return [...left, ...right];
      }
    }

    if (operator === '*') {
      if ((typeof left === 'string' || Array.isArray(left)) && this.isNumeric(right)) {
        return this.repeat(left, right);
      }
      if ((typeof right === 'string' || Array.isArray(right)) && this.isNumeric(left)) {
        return this.repeat(right, left);
      }
    }

    if (!this.isNumeric(left) || !this.isNumeric(right)) {
      throw this.fail(
        `Unsupported operand types for ${operator}: ${describeValue(left)} and ${describeValue(right)}`
      );
    }

    const a = this.numeric(left, operator);
    const b = this.numeric(right, operator);

    switch (operator) {
      case '+':
        return a + b;
      case '-':
        return a - b;
      case '*':
        return a * b;
      case '/':
        if (b === 0) throw this.fail('Division by zero');
        return a / b;
      case '//':
        if (b === 0) throw this.fail('Integer division by zero');
        return Math.floor(a / b);
      case '%':
        if (b === 0) throw this.fail('Modulo by zero');
        return ((a % b) + b) % b;
      case '**':
        return a ** b;
    }
  }

  private evaluateCompare(node: CompareNode): Value {
    let left = this.value(node.left);
    for (const { operator, right: rightNode } of node.comparisons) {
      const right = this.value(rightNode);
      if (!this.compare(operator, left, right)) {
        return false;
      }
      left = right;
    }
    return true;
  }

  private compare(operator: CompareOperator, left: Value, right: Value): boolean {
    switch (operator) {
      case '==':
        return valuesEqual(left, right);
      case '!=':
        return !valuesEqual(left, right);
      case 'in':
        return this.contains(right, left);
      case 'not in':
        return !this.contains(right, left);
    }

    let order: number;
    try {
      order = compareValues(left, right);
    } catch (error) {
      throw this.fail(`'${operator}' not supported between ${describeValue(left)} and ${describeValue(right)}`, error);
    }

    switch (operator) {
      case '<':
        return order < 0;
      case '<=':
        return order <= 0;
      case '>':
        return order > 0;
      default:
        return order >= 0;
    }
  }

  private contains(container: Value, item: Value): boolean {
    if (Array.isArray(container)) {
      return container.some(element => valuesEqual(element, item));
    }
    if (typeof container === 'string') {
      if (typeof item !== 'string') {
        throw this.fail(`'in <string>' requires string as left operand, not ${describeValue(item)}`);
      }
      return container.includes(item);
    }
    if (container !== null && isValueRecord(container)) {
      return typeof item === 'string' && hasOwn(container, item);
    }
    throw this.fail(`Argument of type ${describeValue(container)} is not iterable`);
  }

  private subscript(object: Value, index: Value): Value {
    if (Array.isArray(object) || typeof object === 'string') {
      if (typeof index !== 'number' || !Number.isInteger(index)) {
        throw this.fail(`Indices must be integers, not ${describeValue(index)}`);
      }
      const position = index < 0 ? object.length + index : index;
      if (position < 0 || position >= object.length) {
        throw this.fail(`Index ${index} out of range`);
      }
      return object[position];
    }
    if (object !== null && isValueRecord(object)) {
      if (typeof index !== 'string' || !hasOwn(object, index)) {
        throw this.fail(`Key ${JSON.stringify(index)} not found`);
      }
      return object[index];
    }
    throw this.fail(`${describeValue(object)} is not subscriptable`);
  }
}

/**
 * Evaluates a parsed formula
 */
export function evaluateFormula(
  node: FormulaNode,
  scope: Readonly<Context>,
  options: EvaluationOptions = {}
): FormulaResult {
  return new FormulaEvaluator(scope, options).evaluate(node);
}

/**
 * Free names of a formula in first-seen order. Called helper names and
 * keyword argument names are not included.
 */
export function collectNames(node: FormulaNode, names: Set<string> = new Set()): Set<string> {
  switch (node.type) {
    case 'Name':
      names.add(node.name);
      break;
    case 'List':
      node.elements.forEach(element => collectNames(element, names));
      break;
    case 'Unary':
      collectNames(node.operand, names);
      break;
    case 'Binary':
    case 'Logical':
      collectNames(node.left, names);
      collectNames(node.right, names);
      break;
    case 'Compare':
      collectNames(node.left, names);
      node.comparisons.forEach(comparison => collectNames(comparison.right, names));
      break;
    case 'Conditional':
      collectNames(node.consequent, names);
      collectNames(node.test, names);
      collectNames(node.alternate, names);
      break;
    case 'Call':
      if (node.callee.type !== 'Name') {
        collectNames(node.callee, names);
      }
      node.args.forEach(arg => collectNames(arg, names));
      node.keywords.forEach(keyword => collectNames(keyword.value, names));
      break;
    case 'Subscript':
      collectNames(node.object, names);
      collectNames(node.index, names);
      break;
    case 'Attribute':
      collectNames(node.object, names);
      break;
    default:
      break;
  }
  return names;
}
