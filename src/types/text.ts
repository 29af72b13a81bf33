/**
 * Text Type - plain-text documents edited with TextOperation
 *
 * The snapshot is a string and every operation spans the whole document
 * (retain / insert / delete), so several edits travel in one operation
 * and the type supports compose, invert and normalize as well as
 * transform.
 *
 * Example of why transform is needed:
 *   Text: "hello"
 *   Client A: [insert 'X', retain 5]  -> "Xhello"
 *   Client B: [retain 5, insert 'Y']  -> "helloY"
 *
 *   B's retain 5 no longer covers the whole document once A's 'X' is in,
 *   so B is transformed to [retain 6, insert 'Y'] before it is applied on
 *   top of A. Both replicas end up with "XhelloY".
 */

import { OTType, types } from '../core/types';
import { TextOperation } from '../core/text-operation';
import { deserialize, serialize } from '../core/codec';

/** Text snapshot is a string */
export type TextSnapshot = string;

export const textType: OTType<TextSnapshot, TextOperation> = {
  name: 'text-operation',
  uri: 'urn:text-ot:types:text-operation',

  /**
   * Create initial text value.
   *
   * @param data - Initial text (defaults to empty string)
   */
  create(data?: unknown): TextSnapshot {
    if (typeof data === 'string') {
      return data;
    }
    return '';
  },

  apply(snapshot: TextSnapshot, op: TextOperation): TextSnapshot {
    return op.apply(snapshot);
  },

  /**
   * Transform op1 against op2.
   *
   * TextOperation.transform always lets its first argument win insert
   * ties, so the side picks the argument order:
   *
   *   'left'  -> transform(op1, op2)[0]
   *   'right' -> transform(op2, op1)[1]
   */
  transform(op1: TextOperation, op2: TextOperation, side: 'left' | 'right'): TextOperation {
    if (side === 'left') {
      return TextOperation.transform(op1, op2)[0];
    }
    return TextOperation.transform(op2, op1)[1];
  },

  compose(op1: TextOperation, op2: TextOperation): TextOperation {
    return op1.compose(op2);
  },

  invert(op: TextOperation, snapshot: TextSnapshot): TextOperation {
    return op.invert(snapshot);
  },

  normalize(op: TextOperation): TextOperation {
    return TextOperation.from(op.ops);
  },

  serialize(op: TextOperation): unknown {
    return serialize(op);
  },

  deserialize(data: unknown): TextOperation {
    return deserialize(data);
  },
};

// Register the text type
types.register(textType);

export default textType;
