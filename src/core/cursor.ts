/**
 * OperationCursor - walks a list of primitives one element at a time,
 * allowing the current element to be partly consumed.
 *
 * Compose and transform each hold two cursors and, on every step, either
 * take a whole element from one side or take the same number of
 * characters from both. The cursor keeps "the rest of the current
 * element" so neither algorithm has to track offsets itself.
 *
 * Example:
 *   const c = new OperationCursor([retain(5), insert('ab')]);
 *   c.take(2);   // => retain(2), current is now retain(3)
 *   c.take(3);   // => retain(3), current is now insert('ab')
 *   c.next();    // => insert('ab'), cursor is done
 */

import { Operation, del, insert, opLength, retain, shorten } from './operation';

export class OperationCursor {
  private readonly ops: readonly Operation[];
  private index = 0;

  /** What is left of ops[index], or null once the list is exhausted */
  private current: Operation | null;

  constructor(ops: readonly Operation[]) {
    this.ops = ops;
    this.current = ops.length > 0 ? ops[0] : null;
  }

  /** The remaining part of the current element */
  peek(): Operation | null {
    return this.current;
  }

  get done(): boolean {
    return this.current === null;
  }

  /** Length of the remaining part of the current element (0 when done) */
  get remaining(): number {
    return this.current ? opLength(this.current) : 0;
  }

  /** Consume the whole remaining part of the current element */
  next(): Operation | null {
    const op = this.current;
    this.advance();
    return op;
  }

  /**
   * Consume `n` characters of the current element and return them as a
   * primitive of the same kind. When `n` covers the rest of the element
   * the cursor moves on to the next one.
   */
  take(n: number): Operation | null {
    const op = this.current;
    if (!op) {
      return null;
    }
    const length = opLength(op);
    if (n >= length) {
      this.advance();
      return op;
    }
    this.current = shorten(op, n);
    return head(op, n);
  }

  private advance(): void {
    this.index++;
    this.current = this.index < this.ops.length ? this.ops[this.index] : null;
  }
}

/** The first `n` characters of a primitive */
function head(op: Operation, n: number): Operation {
  switch (op.type) {
    case 'retain':
      return retain(n);
    case 'insert':
      return insert(op.text.slice(0, n));
    case 'delete':
      return del(n);
  }
}
