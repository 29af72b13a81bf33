/**
 * Algebraic laws, checked on seeded random documents and operations.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { TextOperation } from '../src/core/text-operation';
import { TextOperationBuilder } from '../src/core/builder';
import { configure, resetConfig } from '../src/core/config';
import { Random } from './helpers/random';

const ROUNDS = 200;

describe('TextOperation laws', () => {
  beforeAll(() => {
    // Every operation built below also checks its own normal form
    configure({ debugChecks: true });
  });

  afterAll(() => {
    resetConfig();
  });

  it('should account for length changes', () => {
    const random = new Random(1);
    for (let i = 0; i < ROUNDS; i++) {
      const doc = random.string(random.int(30));
      const op = random.operation(doc);

      expect(op.baseLength).toBe(doc.length);
      expect(op.apply(doc)).toHaveLength(doc.length + op.lengthDifference());
      expect(op.apply(doc)).toHaveLength(op.targetLength);
    }
  });

  it('should undo an operation with its inverse', () => {
    const random = new Random(2);
    for (let i = 0; i < ROUNDS; i++) {
      const doc = random.string(random.int(30));
      const op = random.operation(doc);

      expect(op.invert(doc).apply(op.apply(doc))).toBe(doc);
    }
  });

  it('should compose into an operation with the same effect', () => {
    const random = new Random(3);
    for (let i = 0; i < ROUNDS; i++) {
      const doc = random.string(random.int(30));
      const a = random.operation(doc);
      const afterA = a.apply(doc);
      const b = random.operation(afterA);

      expect(a.compose(b).apply(doc)).toBe(b.apply(afterA));
    }
  });

  it('should compose associatively', () => {
    const random = new Random(4);
    for (let i = 0; i < ROUNDS; i++) {
      const doc = random.string(random.int(20));
      const a = random.operation(doc);
      const b = random.operation(a.apply(doc));
      const c = random.operation(b.apply(a.apply(doc)));

      expect(a.compose(b).compose(c).isEquivalentTo(a.compose(b.compose(c)))).toBe(true);
    }
  });

  it('should converge after transform', () => {
    const random = new Random(5);
    for (let i = 0; i < ROUNDS; i++) {
      const doc = random.string(random.int(30));
      const a = random.operation(doc);
      const b = random.operation(doc);
      const [aPrime, bPrime] = TextOperation.transform(a, b);

      expect(a.compose(bPrime).apply(doc)).toBe(b.compose(aPrime).apply(doc));
      expect(a.compose(bPrime).isEquivalentTo(b.compose(aPrime))).toBe(true);
      expect(aPrime.baseLength).toBe(b.targetLength);
      expect(bPrime.baseLength).toBe(a.targetLength);
    }
  });

  it('should keep built operations in normal form', () => {
    const random = new Random(6);
    for (let i = 0; i < ROUNDS; i++) {
      const builder = new TextOperationBuilder();
      let total = 0;
      for (let j = 0; j < 10; j++) {
        const n = random.int(3);
        total += n;
        if (random.next() < 0.5) {
          builder.retain(n);
        } else {
          builder.delete(n);
        }
      }
      const op = builder.build();

      op.ops.forEach((current, index) => {
        expect(index === 0 || op.ops[index - 1].type !== current.type).toBe(true);
      });
      expect(op.baseLength).toBe(total);
    }
  });
});
