/**
 * text-ot - operational transformation for plain-text documents
 *
 * This package provides:
 * - Operation primitives (retain / insert / delete) and their normal form
 * - TextOperation: apply, invert, compose and transform
 * - A compact JSON codec for moving operations over the wire
 * - The OT type interface and registry, with the text type registered
 */

// Core modules
export { OTError, IncompatibleOperationError, ERROR_CODES } from './core/error';
export type { ErrorCode } from './core/error';
export { TypeRegistry, types } from './core/types';
export type { OTType } from './core/types';
export { loadConfig, getConfig, configure, resetConfig } from './core/config';
export type { Config } from './core/config';
export {
  retain,
  insert,
  del,
  isRetain,
  isInsert,
  isDelete,
  opLength,
  lengthDelta,
  canonicalize,
} from './core/operation';
export type { Operation, OperationKind, RetainOp, InsertOp, DeleteOp } from './core/operation';
export { TextOperation } from './core/text-operation';
export type { SerializedOperation } from './core/text-operation';
export { TextOperationBuilder } from './core/builder';
export { serialize, deserialize } from './core/codec';

// Types
export { textType } from './types/text';
export type { TextSnapshot } from './types/text';
