/**
 * Values that parameters resolve to. Formulas produce these, setters receive
 * them and the trial log stores them.
 */
export type Value =
  | number
  | string
  | boolean
  | null
  | Value[]
  | ValueRecord;

export interface ValueRecord {
  [key: string]: Value;
}

/**
 * A resolved name → value mapping for one round
 */
export type Context = Record<string, Value>;

/**
 * Human-readable declaration of one context variable, as exposed by a
 * paradigm, a data log or a controller.
 */
export interface ContextDeclaration {
  name: string;
  label: string;
  /** Whether the value is copied into each trial record */
  log: boolean;
}

/**
 * Anything that contributes context variables to a round
 */
export interface ContextSource {
  getContextDeclarations(): ContextDeclaration[];
  getContextValues(): Context;
}

export function isValueRecord(value: Value): value is ValueRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
