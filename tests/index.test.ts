import { describe, it, expect } from 'vitest';
import {
  IncompatibleOperationError,
  TextOperation,
  TextOperationBuilder,
  deserialize,
  serialize,
  textType,
  types,
} from '../src';

describe('package entry', () => {
  it('should expose a working edit pipeline', () => {
    const doc = 'hello';
    const local = new TextOperationBuilder().retain(5).insert('!').build();
    const remote = deserialize([-1, 'H', 4]);

    const [localPrime, remotePrime] = TextOperation.transform(local, remote);

    expect(remotePrime.apply(local.apply(doc))).toBe('Hello!');
    expect(localPrime.apply(remote.apply(doc))).toBe('Hello!');
    expect(serialize(localPrime)).toEqual([5, '!']);
  });

  it('should register the text type on import', () => {
    expect(types.has(textType.name)).toBe(true);
  });

  it('should export the error class', () => {
    expect(() => TextOperation.empty().apply('x')).toThrow(IncompatibleOperationError);
  });
});
