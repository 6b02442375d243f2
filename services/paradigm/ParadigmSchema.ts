import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import type { Value } from '@core/types/value';

/**
 * Kind of value a parameter is expected to hold. Used for trial log columns
 * and display; formulas are not type-checked against it.
 */
export type ParameterKind = 'number' | 'string' | 'boolean' | 'list' | 'any';

export const PARAMETER_KINDS: readonly ParameterKind[] = ['number', 'string', 'boolean', 'list', 'any'];

export interface ParameterDeclaration {
  readonly name: string;
  readonly label: string;
  /** Literal or formula text used when a paradigm gives no value */
  readonly default: Value;
  readonly kind: ParameterKind;
  /** Copy the resolved value into every trial record */
  readonly log: boolean;
  /** Edits take effect at once instead of waiting for apply */
  readonly immediate: boolean;
  readonly editable: boolean;
  /** Hidden from the parameter listings */
  readonly ignore: boolean;
}

export type ParameterOptions = Partial<Omit<ParameterDeclaration, 'name'>>;

export interface SchemaDefinition {
  readonly parameters: readonly ParameterDeclaration[];
}

const IDENTIFIER = /^[_A-Za-z][_A-Za-z0-9]*$/;

export function isParameterKind(value: unknown): value is ParameterKind {
  return typeof value === 'string' && (PARAMETER_KINDS as readonly string[]).includes(value);
}

/**
 * Collects parameter declarations for a paradigm.
 *
 * @example
 * const schema = new ParadigmSchema()
 *   .addParameter('frequency', { label: 'Frequency (Hz)', default: 1000, kind: 'number', log: true })
 *   .addParameter('level', { default: 60 })
 *   .build();
 */
export class ParadigmSchema {
  private readonly declarations = new Map<string, ParameterDeclaration>();

  addParameter(name: string, options: ParameterOptions = {}): this {
    if (!IDENTIFIER.test(name)) {
      throw new InvalidArgumentError(`Invalid parameter name '${name}'`, { parameter: name });
    }
    if (this.declarations.has(name)) {
      throw new InvalidArgumentError(`Parameter '${name}' is already declared`, { parameter: name });
    }
    if (name.startsWith('expression_')) {
      throw new InvalidArgumentError(`Parameter names may not start with 'expression_'`, { parameter: name });
    }

    this.declarations.set(name, {
      name,
      label: options.label ?? name,
      default: options.default ?? null,
      kind: options.kind ?? 'any',
      log: options.log ?? false,
      immediate: options.immediate ?? false,
      editable: options.editable ?? true,
      ignore: options.ignore ?? false
    });
    return this;
  }

  has(name: string): boolean {
    return this.declarations.has(name);
  }

  build(): SchemaDefinition {
    const parameters = [...this.declarations.values()].map(declaration => Object.freeze({ ...declaration }));
    return Object.freeze({ parameters: Object.freeze(parameters) });
  }
}
