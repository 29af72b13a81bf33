/**
 * TextOperation - an immutable edit from one document revision to the next
 *
 * A TextOperation wraps a list of primitives in normal form (no two
 * adjacent primitives of the same kind, no zero-length primitive). It is
 * frozen once built; every method returns a new value.
 *
 * Build one with `TextOperationBuilder` or `TextOperation.from`:
 *
 *   const op = new TextOperationBuilder().retain(5).insert(' world').build();
 *   op.apply('hello')  // => 'hello world'
 */

import { applyOperations, invertOperations } from './apply';
import { composeOperations } from './compose';
import { getConfig } from './config';
import { OTError, ERROR_CODES } from './error';
import { transformOperations } from './transform';
import {
  Operation,
  appendOperation,
  baseLength,
  canonicalize,
  formatOperation,
  lengthDelta,
  operationsEqual,
  opLength,
} from './operation';

/** Compact wire form: n > 0 retains, n < 0 deletes, a string inserts */
export type SerializedOperation = Array<number | string>;

/** Throw unless `ops` is in normal form */
export function assertNormalized(ops: readonly Operation[]): void {
  for (let i = 0; i < ops.length; i++) {
    if (opLength(ops[i]) === 0) {
      throw new OTError(ERROR_CODES.ERR_OT_INVARIANT_VIOLATED, `Zero-length ${ops[i].type} at index ${i}`);
    }
    if (i > 0 && ops[i - 1].type === ops[i].type) {
      throw new OTError(
        ERROR_CODES.ERR_OT_INVARIANT_VIOLATED,
        `Adjacent ${ops[i].type} primitives at index ${i - 1} and ${i}`
      );
    }
  }
}

export class TextOperation implements Iterable<Operation> {
  public readonly ops: readonly Operation[];

  /** Length of the document this operation applies to */
  public readonly baseLength: number;

  /** Length of the document this operation produces */
  public readonly targetLength: number;

  /**
   * Wrap a list that is already in normal form. Use `from` for lists of
   * unknown shape.
   */
  private constructor(ops: Operation[]) {
    if (getConfig().debugChecks) {
      assertNormalized(ops);
    }
    this.ops = Object.freeze(ops);
    this.baseLength = baseLength(ops);
    this.targetLength = this.baseLength + ops.reduce((sum, op) => sum + lengthDelta(op), 0);
    Object.freeze(this);
  }

  /** The operation with no primitives */
  static empty(): TextOperation {
    return new TextOperation([]);
  }

  /**
   * Create an operation from any list of primitives, merging neighbours of
   * the same kind and dropping zero-length ones. Each primitive is copied,
   * so later changes to the caller's objects do not reach the operation.
   *
   * @throws OTError (ERR_OT_OP_BADLY_FORMED) for a negative or fractional count
   */
  static from(ops: Iterable<Operation>): TextOperation {
    const normalized: Operation[] = [];
    for (const op of ops) {
      appendOperation(normalized, op);
    }
    return new TextOperation(normalized);
  }

  /**
   * Transform two concurrent operations written against the same document.
   *
   * Returns `[a', b']` such that `a.compose(b')` and `b.compose(a')` have
   * the same effect. When both insert at the same offset, `a`'s text goes
   * first.
   *
   * @throws IncompatibleOperationError if the base lengths differ
   */
  static transform(a: TextOperation, b: TextOperation): [TextOperation, TextOperation] {
    const [aPrime, bPrime] = transformOperations(a.ops, b.ops);
    return [new TextOperation(aPrime), new TextOperation(bPrime)];
  }

  get length(): number {
    return this.ops.length;
  }

  [Symbol.iterator](): Iterator<Operation> {
    return this.ops[Symbol.iterator]();
  }

  /** Change in document length when this operation is applied */
  lengthDifference(): number {
    return this.targetLength - this.baseLength;
  }

  /** True when applying the operation leaves every document unchanged */
  isNoop(): boolean {
    return this.ops.length === 0 || (this.ops.length === 1 && this.ops[0].type === 'retain');
  }

  /**
   * Apply this operation to a document.
   *
   * @throws IncompatibleOperationError if the operation does not span `doc`
   */
  apply(doc: string): string {
    return applyOperations(this.ops, doc);
  }

  /**
   * Build the operation that undoes this one. `doc` is the document this
   * operation was applied to.
   *
   *   op.invert(doc).apply(op.apply(doc)) === doc
   */
  invert(doc: string): TextOperation {
    return new TextOperation(invertOperations(this.ops, doc));
  }

  /**
   * Combine this operation with one that follows it.
   *
   * @throws IncompatibleOperationError if `next` was not written against
   *   this operation's output
   */
  compose(next: TextOperation): TextOperation {
    return new TextOperation(composeOperations(this.ops, next.ops));
  }

  /** Structural equality */
  equals(other: TextOperation): boolean {
    return operationsEqual(this.ops, other.ops);
  }

  /**
   * True when both operations have the same effect on every document,
   * even if the inserts and deletes between two retains come in a
   * different order.
   */
  isEquivalentTo(other: TextOperation): boolean {
    return operationsEqual(canonicalize(this.ops), canonicalize(other.ops));
  }

  toJSON(): SerializedOperation {
    return this.ops.map((op) => {
      switch (op.type) {
        case 'retain':
          return op.count;
        case 'insert':
          return op.text;
        case 'delete':
          return -op.count;
      }
    });
  }

  toString(): string {
    return `[${this.ops.map(formatOperation).join(', ')}]`;
  }
}
