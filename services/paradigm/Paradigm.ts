import { UnknownParameterError } from '@core/errors/UnknownParameterError';
import type { LogColumn } from '@core/types/log';
import type { ContextDeclaration, Value } from '@core/types/value';
import { paradigmLogger as logger } from '@core/utils/logger';
import { ParameterExpression } from '@interpreter/eval/ParameterExpression';
import type { ParameterDeclaration, SchemaDefinition } from './ParadigmSchema';

export type ParadigmChangeListener = (name: string, expression: ParameterExpression) => void;

export interface ParadigmJSON {
  parameters: Record<string, Value>;
}

/**
 * The set of parameter expressions that defines an experiment.
 *
 * Every declared parameter always has an expression; values the caller does
 * not provide fall back to the declaration's default.
 */
export class Paradigm {
  private readonly expressions = new Map<string, ParameterExpression>();
  private readonly declarations: ReadonlyMap<string, ParameterDeclaration>;
  private readonly listeners = new Set<ParadigmChangeListener>();

  constructor(readonly schema: SchemaDefinition, values: Readonly<Record<string, Value>> = {}) {
    this.declarations = new Map(schema.parameters.map(declaration => [declaration.name, declaration]));

    for (const name of Object.keys(values)) {
      if (!this.declarations.has(name)) {
        throw new UnknownParameterError(name, this.names());
      }
    }

    for (const declaration of schema.parameters) {
      const value = Object.prototype.hasOwnProperty.call(values, declaration.name)
        ? values[declaration.name]
        : declaration.default;
      this.expressions.set(declaration.name, new ParameterExpression(value, { parameter: declaration.name }));
    }
  }

  /** Every declared name, in declaration order */
  names(): string[] {
    return [...this.declarations.keys()];
  }

  get(name: string): ParameterExpression {
    const expression = this.expressions.get(name);
    if (!expression) {
      throw new UnknownParameterError(name, this.names());
    }
    return expression;
  }

  /**
   * Replaces a parameter's expression. Invalid formulas throw and leave the
   * previous expression in place.
   */
  set(name: string, value: Value | ParameterExpression): void {
    if (!this.declarations.has(name)) {
      throw new UnknownParameterError(name, this.names());
    }
    const expression = value instanceof ParameterExpression
      ? value
      : new ParameterExpression(value, { parameter: name });

    const previous = this.expressions.get(name);
    this.expressions.set(name, expression);
    if (previous && previous.equals(expression)) {
      return;
    }

    logger.debug('Parameter changed', { parameter: name, expression: expression.toString() });
    for (const listener of this.listeners) {
      listener(name, expression);
    }
  }

  /**
   * Subscribes to parameter edits. Returns the unsubscribe function.
   */
  onChange(listener: ParadigmChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getDeclaration(name: string): ParameterDeclaration {
    const declaration = this.declarations.get(name);
    if (!declaration) {
      throw new UnknownParameterError(name, this.names());
    }
    return declaration;
  }

  /** Name → expression for every declared parameter */
  getExpressions(): Map<string, ParameterExpression> {
    return new Map(this.expressions);
  }

  /** Editable, non-hidden parameters, sorted by name */
  getParameters(): string[] {
    return this.visible().map(declaration => declaration.name).sort();
  }

  /** Name → label for editable, non-hidden parameters */
  getParameterInfo(): Record<string, string> {
    return Object.fromEntries(this.visible().map(declaration => [declaration.name, declaration.label]));
  }

  getParameterLabel(name: string): string {
    const info = this.getParameterInfo();
    if (!Object.prototype.hasOwnProperty.call(info, name)) {
      throw new UnknownParameterError(name, this.getParameters());
    }
    return info[name];
  }

  /** Entries of `names` that are not editable parameters of this paradigm */
  getInvalidParameters(names: readonly string[]): string[] {
    const valid = new Set(this.getParameters());
    return names.filter(name => !valid.has(name));
  }

  /**
   * Two-column name/label listing for the command line
   */
  formatParameterTable(): string {
    const rows: [string, string][] = [
      ['Variable Name', 'Label'],
      ['-------------', '-----'],
      ...Object.entries(this.getParameterInfo()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    ];
    const nameWidth = Math.max(...rows.map(([name]) => name.length));
    return rows.map(([name, label]) => `${name.padStart(nameWidth + 2)} ${label}`.trimEnd()).join('\n');
  }

  /** Trial log columns for the parameters flagged `log` */
  getLogColumns(): LogColumn[] {
    return [...this.declarations.values()]
      .filter(declaration => declaration.log)
      .map(declaration => ({ name: declaration.name, kind: declaration.kind }));
  }

  getContextDeclarations(): ContextDeclaration[] {
    return [...this.declarations.values()].map(({ name, label, log }) => ({ name, label, log }));
  }

  /**
   * Copy with the same definitions and fresh expression state
   */
  clone(): Paradigm {
    const copy = new Paradigm(this.schema);
    for (const [name, expression] of this.expressions) {
      copy.expressions.set(name, expression.clone());
    }
    return copy;
  }

  /**
   * Takes over every expression of `other` (as fresh copies). Listeners are
   * notified for the ones that differ.
   */
  copyFrom(other: Paradigm): void {
    for (const [name, expression] of other.expressions) {
      if (this.declarations.has(name)) {
        this.set(name, expression.clone());
      }
    }
  }

  equals(other: Paradigm): boolean {
    if (other.expressions.size !== this.expressions.size) {
      return false;
    }
    for (const [name, expression] of this.expressions) {
      const counterpart = other.expressions.get(name);
      if (!counterpart || !counterpart.equals(expression)) {
        return false;
      }
    }
    return true;
  }

  toJSON(): ParadigmJSON {
    const parameters: Record<string, Value> = {};
    for (const [name, expression] of this.expressions) {
      parameters[name] = expression.toJSON();
    }
    return { parameters };
  }

  static fromJSON(schema: SchemaDefinition, json: ParadigmJSON): Paradigm {
    return new Paradigm(schema, json.parameters);
  }

  private visible(): ParameterDeclaration[] {
    return [...this.declarations.values()].filter(declaration => declaration.editable && !declaration.ignore);
  }
}
