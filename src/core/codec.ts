/**
 * Wire format for text operations
 *
 * An operation travels as a flat JSON array:
 *
 *   5        retain 5 characters
 *   -2       delete 2 characters
 *   "abc"    insert "abc"
 *
 * Example:
 *   serialize(op)              // => [5, " world"]
 *   deserialize([5, " world"]) // => [retain 5, insert " world"]
 *
 * Decoding validates the payload and normalizes it, so adjacent elements
 * of the same kind are merged and `0` / `""` are dropped.
 */

import { z } from 'zod';
import { OTError, ERROR_CODES } from './error';
import { Operation, del, insert, retain } from './operation';
import { SerializedOperation, TextOperation } from './text-operation';

const componentSchema = z.union([
  z.number().int('retain and delete counts must be integers').safe(),
  z.string(),
]);

const serializedSchema = z.array(componentSchema);

function decodeComponent(component: number | string): Operation {
  if (typeof component === 'string') {
    return insert(component);
  }
  return component < 0 ? del(-component) : retain(component);
}

export function serialize(op: TextOperation): SerializedOperation {
  return op.toJSON();
}

/**
 * Decode an operation received from the wire.
 *
 * @throws OTError (ERR_OT_OP_BADLY_FORMED) if the payload is not an array of
 *   integers and strings
 */
export function deserialize(json: unknown): TextOperation {
  const result = serializedSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at index ${issue.path.join('.')}` : '';
    throw new OTError(
      ERROR_CODES.ERR_OT_OP_BADLY_FORMED,
      `Invalid text operation${where}: ${issue ? issue.message : result.error.message}`
    );
  }
  return TextOperation.from(result.data.map(decodeComponent));
}
