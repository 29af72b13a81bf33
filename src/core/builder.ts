import { Operation, appendOperation, del, insert, retain } from './operation';
import { TextOperation } from './text-operation';

/**
 * Accumulates primitives for a TextOperation.
 *
 * `append` merges into the previous primitive when the kinds match and
 * ignores zero-length primitives, so the buffer is always in normal form.
 *
 * Example:
 *   new TextOperationBuilder().retain(2).retain(3).delete(0).insert('!').build()
 *   // => [retain 5, insert "!"]
 */
export class TextOperationBuilder {
  private readonly buffer: Operation[] = [];

  append(op: Operation): this {
    appendOperation(this.buffer, op);
    return this;
  }

  retain(count: number): this {
    return this.append(retain(count));
  }

  insert(text: string): this {
    return this.append(insert(text));
  }

  delete(count: number): this {
    return this.append(del(count));
  }

  /** Number of primitives appended so far, after merging */
  get size(): number {
    return this.buffer.length;
  }

  /** Freeze the current buffer; the builder can keep appending afterwards */
  build(): TextOperation {
    return TextOperation.from(this.buffer);
  }
}
