import { describe, it, expect, vi, afterEach } from 'vitest';
import { OTType, TypeRegistry, types } from '../../src/core/types';
import { OTError, ERROR_CODES } from '../../src/core/error';
import { textType } from '../../src/types/text';
import { catchError } from '../helpers/errors';

function counterLikeType(name: string): OTType<number, number> {
  return {
    name,
    uri: `urn:test:${name}`,
    create: () => 0,
    apply: (snapshot, op) => snapshot + op,
    transform: (op1) => op1,
  };
}

describe('TypeRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should look types up by name and by URI', () => {
    const registry = new TypeRegistry();
    const type = counterLikeType('sum');
    registry.register(type);

    expect(registry.get('sum')).toBe(type);
    expect(registry.get('urn:test:sum')).toBe(type);
    expect(registry.has('sum')).toBe(true);
    expect(registry.has('missing')).toBe(false);
  });

  it('should make the first registered type the default', () => {
    const registry = new TypeRegistry();
    const first = counterLikeType('first');
    registry.register(first);
    registry.register(counterLikeType('second'));

    expect(registry.defaultType).toBe(first);
  });

  it('should warn when a key is taken over by another type', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = new TypeRegistry();
    const original = counterLikeType('sum');
    const replacement = counterLikeType('sum');
    registry.register(original);
    registry.register(original);

    expect(warn).not.toHaveBeenCalled();

    registry.register(replacement);

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Replacing OT type registered as "sum"');
    expect(registry.get('sum')).toBe(replacement);
  });

  it('should fail on unknown types in require', () => {
    const registry = new TypeRegistry();
    const err = catchError(() => registry.require('nope'));

    expect(err).toBeInstanceOf(OTError);
    expect(err).toMatchObject({
      code: ERROR_CODES.ERR_DOC_TYPE_NOT_RECOGNIZED,
      message: 'Unknown type: nope',
    });
  });

  it('should have the text type in the global registry', () => {
    expect(types.require('text-operation')).toBe(textType);
    expect(types.get(textType.uri)).toBe(textType);
  });
});
