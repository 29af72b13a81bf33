import { describe, it, expect } from 'vitest';
import { deserialize, serialize } from '../../src/core/codec';
import { TextOperation } from '../../src/core/text-operation';
import { del, insert, retain } from '../../src/core/operation';
import { OTError, ERROR_CODES } from '../../src/core/error';
import { catchError } from '../helpers/errors';

describe('codec', () => {
  describe('serialize', () => {
    it('should encode retains as positive and deletes as negative numbers', () => {
      const op = TextOperation.from([retain(5), insert(' world'), del(2)]);
      expect(serialize(op)).toEqual([5, ' world', -2]);
    });

    it('should encode the empty operation as an empty array', () => {
      expect(serialize(TextOperation.empty())).toEqual([]);
    });
  });

  describe('deserialize', () => {
    it('should decode the compact form', () => {
      const op = deserialize([5, ' world', -2]);
      expect(op.ops).toEqual([retain(5), insert(' world'), del(2)]);
    });

    it('should normalize what it decodes', () => {
      const op = deserialize([1, 2, 0, 'a', '', 'b', -1, -1]);
      expect(op.ops).toEqual([retain(3), insert('ab'), del(2)]);
    });

    it('should read back a stringified operation', () => {
      const op = TextOperation.from([retain(2), del(1), insert('xy')]);
      const decoded = deserialize(JSON.parse(JSON.stringify(op)));

      expect(decoded.equals(op)).toBe(true);
    });

    it('should reject a payload that is not an array', () => {
      const err = catchError(() => deserialize({ ops: [] }));

      expect(err).toBeInstanceOf(OTError);
      expect(err).toMatchObject({ code: ERROR_CODES.ERR_OT_OP_BADLY_FORMED });
    });

    it('should reject components of the wrong type', () => {
      expect(() => deserialize([1, true])).toThrow(OTError);
      expect(() => deserialize([null])).toThrow(OTError);
    });

    it('should reject fractional counts', () => {
      const err = catchError(() => deserialize([2, 1.5]));

      expect(err).toMatchObject({ code: ERROR_CODES.ERR_OT_OP_BADLY_FORMED });
      expect(err).toBeInstanceOf(OTError);
    });
  });
});
