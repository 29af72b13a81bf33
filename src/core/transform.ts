/**
 * Transform two concurrent operations.
 *
 * `a` and `b` were both written against the same document. The result
 * `[a', b']` lets each side catch up with the other:
 *
 *   apply(apply(doc, a), b') === apply(apply(doc, b), a')
 *
 * The walk holds one cursor per side. Inserts are handled first because
 * they consume none of the shared base document; everything else covers
 * the same base characters on both sides and is consumed in lock step:
 *
 * | a \ b  | retain                | delete               |
 * |--------|-----------------------|----------------------|
 * | retain | retain(min) to both   | delete(min) to b'    |
 * | delete | delete(min) to a'     | nothing (both gone)  |
 *
 * Tie-breaking: a's insert is looked at before b's, so when both sides
 * insert at the same offset a's text ends up first. This is fixed; the
 * caller decides which operation plays `a`.
 */

import { IncompatibleOperationError, OTError, ERROR_CODES } from './error';
import { OperationCursor } from './cursor';
import { composeOperations } from './compose';
import { getConfig } from './config';
import {
  Operation,
  appendOperation,
  baseLength,
  canonicalize,
  del,
  operationsEqual,
  retain,
} from './operation';

export type TransformResult = [Operation[], Operation[]];

/**
 * Both inputs must describe edits of the same document. Without this
 * check a mismatch would only surface once one side runs out mid-walk.
 */
function checkSameBase(a: readonly Operation[], b: readonly Operation[]): void {
  const lengthA = baseLength(a);
  const lengthB = baseLength(b);
  if (lengthA !== lengthB) {
    throw new IncompatibleOperationError(
      `Cannot transform operations: both operations have to have the same base length (${lengthA} != ${lengthB}).`
    );
  }
}

export function transformOperations(a: readonly Operation[], b: readonly Operation[]): TransformResult {
  checkSameBase(a, b);

  const aPrime: Operation[] = [];
  const bPrime: Operation[] = [];
  const left = new OperationCursor(a);
  const right = new OperationCursor(b);

  for (;;) {
    const opA = left.peek();
    const opB = right.peek();

    // Both operations have been processed
    if (opA === null && opB === null) {
      break;
    }

    if (opA !== null && opA.type === 'insert') {
      appendOperation(aPrime, opA);
      appendOperation(bPrime, retain(opA.text.length));
      left.next();
      continue;
    }
    if (opB !== null && opB.type === 'insert') {
      appendOperation(aPrime, retain(opB.text.length));
      appendOperation(bPrime, opB);
      right.next();
      continue;
    }

    // Equal base lengths make both sides run out together
    if (opA === null || opB === null) {
      throw new OTError(ERROR_CODES.ERR_OT_INVARIANT_VIOLATED, 'Transform walked past the end of an operation');
    }

    const length = Math.min(left.remaining, right.remaining);
    left.take(length);
    right.take(length);

    if (opA.type === 'retain' && opB.type === 'retain') {
      appendOperation(aPrime, retain(length));
      appendOperation(bPrime, retain(length));
    } else if (opA.type === 'delete' && opB.type === 'retain') {
      appendOperation(aPrime, del(length));
    } else if (opA.type === 'retain' && opB.type === 'delete') {
      appendOperation(bPrime, del(length));
    }
    // delete x delete: both removed the same text, nothing to emit
  }

  if (getConfig().debugChecks) {
    checkConvergence(a, b, aPrime, bPrime);
  }

  return [aPrime, bPrime];
}

/** a∘b' and b∘a' must have the same effect on every document */
function checkConvergence(
  a: readonly Operation[],
  b: readonly Operation[],
  aPrime: readonly Operation[],
  bPrime: readonly Operation[]
): void {
  const viaA = canonicalize(composeOperations(a, bPrime));
  const viaB = canonicalize(composeOperations(b, aPrime));
  if (!operationsEqual(viaA, viaB)) {
    throw new OTError(ERROR_CODES.ERR_OT_INVARIANT_VIOLATED, 'Transformed operations do not converge');
  }
}
