/**
 * Compose two consecutive operations into one.
 *
 * `b` is written against the output of `a`. The result has the same effect
 * on a document as applying `a` and then `b`:
 *
 *   apply(doc, compose(a, b)) === apply(apply(doc, a), b)
 *
 * The walk holds one cursor per side:
 *
 * | a \ b  | retain        | delete       | insert      |
 * |--------|---------------|--------------|-------------|
 * | retain | retain(min)   | delete(min)  | insert (b)  |
 * | insert | insert prefix | nothing      | insert (b)  |
 * | delete | delete (a)    | delete (a)   | delete (a)  |
 *
 * A delete in `a` never reaches `b` (that text is gone before `b` runs) and
 * an insert in `b` never existed for `a`, so those are copied straight to
 * the result. Everything else spans the same characters of a's output and
 * is consumed in lock step.
 */

import { IncompatibleOperationError } from './error';
import { OperationCursor } from './cursor';
import { Operation, appendOperation, del } from './operation';

export function composeOperations(a: readonly Operation[], b: readonly Operation[]): Operation[] {
  const result: Operation[] = [];
  const left = new OperationCursor(a);
  const right = new OperationCursor(b);

  for (;;) {
    const opA = left.peek();
    const opB = right.peek();

    // Both operations have been processed
    if (opA === null && opB === null) {
      break;
    }

    if (opA !== null && opA.type === 'delete') {
      appendOperation(result, opA);
      left.next();
      continue;
    }
    if (opB !== null && opB.type === 'insert') {
      appendOperation(result, opB);
      right.next();
      continue;
    }

    if (opA === null) {
      throw new IncompatibleOperationError('Cannot compose operations: first operation is too short.');
    }
    if (opB === null) {
      throw new IncompatibleOperationError('Cannot compose operations: first operation is too long.');
    }

    const length = Math.min(left.remaining, right.remaining);
    const fromA = left.take(length);
    right.take(length);

    if (opB.type === 'retain') {
      // b keeps whatever a produced on this span
      if (fromA !== null) {
        appendOperation(result, fromA);
      }
    } else if (opA.type === 'retain') {
      appendOperation(result, del(length));
    }
    // insert x delete: b removes exactly what a added, nothing to emit
  }

  return result;
}
