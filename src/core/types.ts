/**
 * OT Type System
 *
 * An OT type describes how operations of one kind act on one kind of
 * document. Collaboration layers (transport, op log, undo stacks) talk to
 * this interface rather than to a concrete type, so they can host any
 * registered type.
 *
 * Required:
 * - name/uri: Unique identifiers
 * - create(data): Create initial document state
 * - apply(snapshot, op): Apply an operation to the snapshot
 * - transform(op1, op2, side): Transform op1 against op2
 *
 * Optional:
 * - compose(op1, op2): Compose two operations into one
 * - invert(op, snapshot): Create an inverse operation for undo
 * - normalize(op): Normalize an operation
 * - serialize(op) / deserialize(data): Convert to and from a JSON payload
 */

import { OTError, ERROR_CODES } from './error';

/**
 * OT Type Interface
 *
 * TSnapshot: The type of the document snapshot (e.g. string)
 * TOp: The type of operations (e.g. TextOperation)
 */
export interface OTType<TSnapshot = unknown, TOp = unknown> {
  /** Short name for the type (e.g. 'text-operation') */
  name: string;

  /** Full URI identifier */
  uri: string;

  /**
   * Create initial document state from optional data.
   */
  create(data?: unknown): TSnapshot;

  /**
   * Apply an operation to a snapshot.
   *
   * Must NOT mutate the original snapshot; a new snapshot is returned.
   */
  apply(snapshot: TSnapshot, op: TOp): TSnapshot;

  /**
   * Transform op1 against op2.
   *
   * @param op1 - The operation to transform
   * @param op2 - The operation that has already been applied
   * @param side - 'left' if op1 wins ties, 'right' if op2 does
   * @returns The transformed op1
   *
   * The transform function must satisfy:
   *   apply(apply(doc, op1), transform(op2, op1, 'right')) ===
   *   apply(apply(doc, op2), transform(op1, op2, 'left'))
   */
  transform(op1: TOp, op2: TOp, side: 'left' | 'right'): TOp;

  /**
   * Compose two operations into one.
   *
   * Must satisfy: apply(apply(doc, op1), op2) === apply(doc, compose(op1, op2))
   */
  compose?(op1: TOp, op2: TOp): TOp;

  /**
   * Create the inverse operation for undo. `snapshot` is the document the
   * operation was applied to.
   *
   * Must satisfy: apply(apply(doc, op), invert(op, doc)) === doc
   */
  invert?(op: TOp, snapshot: TSnapshot): TOp;

  /**
   * Normalize an operation (remove no-ops, merge neighbours, etc.)
   */
  normalize?(op: TOp): TOp;

  /** Convert an operation to a JSON-safe payload */
  serialize?(op: TOp): unknown;

  /** Rebuild an operation from a JSON payload */
  deserialize?(data: unknown): TOp;
}

/**
 * Type Registry - Manages registered OT types
 *
 * Types are registered by both name and URI to allow looking up
 * by either identifier.
 */
export class TypeRegistry {
  /** Map of type name/uri to type instance */
  private types: Map<string, OTType> = new Map();

  /** Default type to use when none specified */
  public defaultType: OTType | null = null;

  /**
   * Register a type.
   *
   * After registration, the type can be looked up by either name or URI.
   * Registering another type under a name or URI that is already taken
   * replaces the previous one.
   */
  register(type: OTType): void {
    for (const key of [type.name, type.uri]) {
      const existing = this.types.get(key);
      if (existing && existing !== type) {
        console.warn(`Replacing OT type registered as "${key}"`);
      }
      this.types.set(key, type);
    }

    // Set as default if it's the first registered type
    if (!this.defaultType) {
      this.defaultType = type;
    }
  }

  /**
   * Get a type by name or URI.
   *
   * @returns The type, or undefined if not found
   */
  get(nameOrUri: string): OTType | undefined {
    return this.types.get(nameOrUri);
  }

  /**
   * Get a type by name or URI, failing if it is not registered.
   *
   * @throws OTError (ERR_DOC_TYPE_NOT_RECOGNIZED)
   */
  require(nameOrUri: string): OTType {
    const type = this.types.get(nameOrUri);
    if (!type) {
      throw new OTError(ERROR_CODES.ERR_DOC_TYPE_NOT_RECOGNIZED, 'Unknown type: ' + nameOrUri);
    }
    return type;
  }

  /**
   * Check if a type is registered.
   */
  has(nameOrUri: string): boolean {
    return this.types.has(nameOrUri);
  }
}

// Global type registry instance
export const types = new TypeRegistry();
