/**
 * Operation primitives
 *
 * A text operation is a list of three kinds of primitive, read left to
 * right over the document:
 *
 * - Retain: keep the next `count` characters
 * - Insert: insert `text` at the current position
 * - Delete: remove the next `count` characters
 *
 * Primitives are plain frozen objects discriminated by `type`, so every
 * algorithm dispatches with an exhaustive switch.
 *
 * Example (turn "hello" into "hello world"):
 *   [retain(5), insert(' world')]
 */

import { OTError, ERROR_CODES } from './error';

/** Keep `count` characters of the input */
export interface RetainOp {
  readonly type: 'retain';
  readonly count: number;
}

/** Insert `text` at the current position */
export interface InsertOp {
  readonly type: 'insert';
  readonly text: string;
}

/** Delete `count` characters of the input */
export interface DeleteOp {
  readonly type: 'delete';
  readonly count: number;
}

/** Union type for all primitives */
export type Operation = RetainOp | InsertOp | DeleteOp;

export type OperationKind = Operation['type'];

function checkCount(kind: 'retain' | 'delete', count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new OTError(
      ERROR_CODES.ERR_OT_OP_BADLY_FORMED,
      `${kind} count must be a non-negative integer, got ${count}`
    );
  }
}

export function retain(count: number): RetainOp {
  checkCount('retain', count);
  const op: RetainOp = { type: 'retain', count };
  return Object.freeze(op);
}

export function insert(text: string): InsertOp {
  if (typeof text !== 'string') {
    throw new OTError(ERROR_CODES.ERR_OT_OP_BADLY_FORMED, 'insert text must be a string');
  }
  const op: InsertOp = { type: 'insert', text };
  return Object.freeze(op);
}

// `delete` is a reserved word, hence the short name
export function del(count: number): DeleteOp {
  checkCount('delete', count);
  const op: DeleteOp = { type: 'delete', count };
  return Object.freeze(op);
}

function unreachable(op: never): never {
  throw new OTError(ERROR_CODES.ERR_OT_OP_BADLY_FORMED, `Unknown operation: ${JSON.stringify(op)}`);
}

/**
 * Rebuild a primitive through its constructor, validating the payload and
 * returning a frozen copy the caller cannot change.
 */
export function checkOperation(op: Operation): Operation {
  switch (op.type) {
    case 'retain':
      return retain(op.count);
    case 'insert':
      return insert(op.text);
    case 'delete':
      return del(op.count);
    default:
      return unreachable(op);
  }
}

export function isRetain(op: Operation): op is RetainOp {
  return op.type === 'retain';
}

export function isInsert(op: Operation): op is InsertOp {
  return op.type === 'insert';
}

export function isDelete(op: Operation): op is DeleteOp {
  return op.type === 'delete';
}

/** Number of characters the primitive spans */
export function opLength(op: Operation): number {
  switch (op.type) {
    case 'retain':
    case 'delete':
      return op.count;
    case 'insert':
      return op.text.length;
    default:
      return unreachable(op);
  }
}

/**
 * Effect of the primitive on the document length.
 *
 *   lengthDelta(retain(3)) => 0
 *   lengthDelta(insert('ab')) => 2
 *   lengthDelta(del(4)) => -4
 */
export function lengthDelta(op: Operation): number {
  switch (op.type) {
    case 'retain':
      return 0;
    case 'insert':
      return op.text.length;
    case 'delete':
      return -op.count;
    default:
      return unreachable(op);
  }
}

/**
 * Drop the first `n` characters of a primitive.
 * `n` must be smaller than the primitive's length.
 */
export function shorten(op: Operation, n: number): Operation {
  switch (op.type) {
    case 'retain':
      return retain(op.count - n);
    case 'insert':
      return insert(op.text.slice(n));
    case 'delete':
      return del(op.count - n);
    default:
      return unreachable(op);
  }
}

/**
 * Merge two primitives of the same kind into one.
 * Returns null when the kinds differ.
 */
export function merge(a: Operation, b: Operation): Operation | null {
  if (a.type === 'retain' && b.type === 'retain') {
    return retain(a.count + b.count);
  }
  if (a.type === 'insert' && b.type === 'insert') {
    return insert(a.text + b.text);
  }
  if (a.type === 'delete' && b.type === 'delete') {
    return del(a.count + b.count);
  }
  return null;
}

/**
 * Append a primitive to a list, keeping it in normal form.
 *
 * - the primitive is validated and copied (see `checkOperation`)
 * - zero-length primitives are dropped
 * - a primitive of the same kind as the last element is merged into it
 *
 * This is the only way the algorithms grow a list, so no two adjacent
 * elements ever share a kind.
 *
 * @throws OTError (ERR_OT_OP_BADLY_FORMED) for a negative or fractional count
 */
export function appendOperation(ops: Operation[], input: Operation): void {
  const op = checkOperation(input);
  if (opLength(op) === 0) {
    return;
  }
  const last = ops[ops.length - 1];
  if (last !== undefined) {
    const merged = merge(last, op);
    if (merged) {
      ops[ops.length - 1] = merged;
      return;
    }
  }
  ops.push(op);
}

export function operationEquals(a: Operation, b: Operation): boolean {
  switch (a.type) {
    case 'retain':
      return b.type === 'retain' && a.count === b.count;
    case 'insert':
      return b.type === 'insert' && a.text === b.text;
    case 'delete':
      return b.type === 'delete' && a.count === b.count;
    default:
      return unreachable(a);
  }
}

export function formatOperation(op: Operation): string {
  switch (op.type) {
    case 'retain':
      return `retain ${op.count}`;
    case 'insert':
      return `insert ${JSON.stringify(op.text)}`;
    case 'delete':
      return `delete ${op.count}`;
    default:
      return unreachable(op);
  }
}

/** Length of the document a list of primitives applies to */
export function baseLength(ops: readonly Operation[]): number {
  let length = 0;
  for (const op of ops) {
    if (op.type !== 'insert') {
      length += op.count;
    }
  }
  return length;
}

/** Length of the document a list of primitives produces */
export function targetLength(ops: readonly Operation[]): number {
  let length = 0;
  for (const op of ops) {
    length += op.type === 'delete' ? 0 : opLength(op);
  }
  return length;
}

/**
 * Reorder each run of inserts and deletes between two retains as one
 * delete followed by one insert.
 *
 * Within such a run only the total deleted count and the inserted text
 * matter, so two lists with the same effect on every document have the
 * same canonical form.
 *
 *   canonicalize([insert('x'), del(1), insert('y')]) => [del(1), insert('xy')]
 */
export function canonicalize(ops: readonly Operation[]): Operation[] {
  const result: Operation[] = [];
  let deleted = 0;
  let inserted = '';

  const flush = (): void => {
    appendOperation(result, del(deleted));
    appendOperation(result, insert(inserted));
    deleted = 0;
    inserted = '';
  };

  for (const op of ops) {
    switch (op.type) {
      case 'retain':
        flush();
        appendOperation(result, op);
        break;
      case 'insert':
        inserted += op.text;
        break;
      case 'delete':
        deleted += op.count;
        break;
      default:
        return unreachable(op);
    }
  }
  flush();
  return result;
}

export function operationsEqual(a: readonly Operation[], b: readonly Operation[]): boolean {
  return a.length === b.length && a.every((op, i) => operationEquals(op, b[i]));
}
