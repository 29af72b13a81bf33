/**
 * Apply and invert
 *
 * Both functions walk the document with a single cursor while reading the
 * primitives left to right. Retain and Delete consume input, Insert does
 * not. The primitives must consume the document exactly; anything else
 * means the operation was built against a different document.
 */

import { IncompatibleOperationError } from './error';
import { Operation, appendOperation, del, insert } from './operation';

function checkInBounds(action: string, end: number, doc: string): void {
  if (end > doc.length) {
    throw new IncompatibleOperationError(`Cannot ${action}: operation is too long.`);
  }
}

function checkConsumed(action: string, cursor: number, doc: string): void {
  if (cursor !== doc.length) {
    throw new IncompatibleOperationError(`Cannot ${action}: operation is too short.`);
  }
}

/**
 * Apply a list of primitives to a document, returning the new document.
 *
 * @throws IncompatibleOperationError if the primitives do not span `doc`
 *
 * Example:
 *   applyOperations([retain(5), insert(' world')], 'hello') => 'hello world'
 */
export function applyOperations(ops: readonly Operation[], doc: string): string {
  const parts: string[] = [];
  let i = 0;

  for (const op of ops) {
    switch (op.type) {
      case 'retain':
        checkInBounds('apply operation', i + op.count, doc);
        parts.push(doc.slice(i, i + op.count));
        i += op.count;
        break;
      case 'insert':
        parts.push(op.text);
        break;
      case 'delete':
        checkInBounds('apply operation', i + op.count, doc);
        i += op.count;
        break;
    }
  }

  checkConsumed('apply operation', i, doc);
  return parts.join('');
}

/**
 * Build the primitives that undo `ops`.
 *
 * `doc` is the document *before* `ops` was applied: deleted text has to be
 * read back from it so the inverse can re-insert it.
 *
 * Example:
 *   invertOperations([del(5)], 'hello') => [insert('hello')]
 */
export function invertOperations(ops: readonly Operation[], doc: string): Operation[] {
  const inverse: Operation[] = [];
  let i = 0;

  for (const op of ops) {
    switch (op.type) {
      case 'retain':
        checkInBounds('invert operation', i + op.count, doc);
        appendOperation(inverse, op);
        i += op.count;
        break;
      case 'insert':
        appendOperation(inverse, del(op.text.length));
        break;
      case 'delete':
        checkInBounds('invert operation', i + op.count, doc);
        appendOperation(inverse, insert(doc.slice(i, i + op.count)));
        i += op.count;
        break;
    }
  }

  checkConsumed('invert operation', i, doc);
  return inverse;
}
