import { SequenceExhaustedError } from '@core/errors/SequenceExhaustedError';
import type { Value } from '@core/types/value';

/**
 * A lazily evaluated, stateful stream of values.
 *
 * Wraps an iterator produced by one of the choice generators. Pulling past
 * the end raises SequenceExhaustedError rather than returning a sentinel, so
 * callers can tell "no more values" apart from any other failure.
 */
export class Sequence<T extends Value = Value> {
  private finished = false;
  private pulled = 0;

  constructor(
    /** Generator name, e.g. `ascending` */
    public readonly kind: string,
    private readonly iterator: Iterator<T>
  ) {}

  /**
   * Advances the sequence and returns the produced value
   *
   * @throws {SequenceExhaustedError} When no values remain
   */
  next(): T {
    if (this.finished) {
      throw new SequenceExhaustedError(this.kind);
    }

    const result = this.iterator.next();
    if (result.done) {
      this.finished = true;
      throw new SequenceExhaustedError(this.kind);
    }

    this.pulled++;
    return result.value;
  }

  /**
   * Pulls `count` values. Stops early with SequenceExhaustedError if the
   * sequence ends first.
   */
  take(count: number): T[] {
    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.next());
    }
    return values;
  }

  /** True once a pull has hit the end of the sequence */
  get exhausted(): boolean {
    return this.finished;
  }

  /** Number of values produced so far */
  get position(): number {
    return this.pulled;
  }

  toString(): string {
    return `<${this.kind} sequence>`;
  }
}

export function isSequence(value: unknown): value is Sequence {
  return value instanceof Sequence;
}
