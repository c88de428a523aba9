/***
 * EntityBuffer — Growable BigUint64Array of entities.
 *
 * Each slot holds one entity's storage word. A valid entity is never
 * 0n, so a zeroed slot reads back as null: optional entities cost no
 * extra space, and a freshly grown buffer is all empty slots.
 *
 * Storage words sort the same way entities compare, so sort() is a
 * plain numeric TypedArray sort.
 *
 ***/

import { assert, unsafe_cast } from "type_primitives";
import { DEFAULT_INITIAL_CAPACITY, GROWTH_FACTOR } from "utils/constants";
import { Entity, entity_storage_bits, entity_to_bits } from "./entity";

const EMPTY = 0n;

const read_slot = (word: bigint): Entity | null =>
  word === EMPTY ? null : unsafe_cast<Entity>(word);

export class EntityBuffer {
  private _buf: BigUint64Array;
  private _len = 0;

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this._buf = new BigUint64Array(initial_capacity);
  }

  public get length(): number {
    return this._len;
  }

  public get capacity(): number {
    return this._buf.length;
  }

  /** Append an entity, or an empty slot for null. */
  public push(entity: Entity | null): void {
    if (this._len >= this._buf.length) this._grow();
    this._buf[this._len++] = entity === null ? EMPTY : entity_storage_bits(entity);
  }

  /** Remove and return the last slot. Returns null when empty. */
  public pop(): Entity | null {
    if (this._len === 0) return null;
    const word = this._buf[--this._len];
    this._buf[this._len] = EMPTY;
    return read_slot(word);
  }

  public get(i: number): Entity | null {
    if (i < 0 || i >= this._len) return null;
    return read_slot(this._buf[i]);
  }

  /** Overwrite a live slot. Out-of-range `i` throws in dev and is ignored otherwise. */
  public set_at(i: number, entity: Entity | null): void {
    assert(i, (v): v is number => v >= 0 && v < this._len, "slot index is within length");
    if (i < 0 || i >= this._len) return;
    this._buf[i] = entity === null ? EMPTY : entity_storage_bits(entity);
  }

  /**
   * Move the last slot into slot i, decrement length.
   * Returns what slot i held before the move, or null (and changes
   * nothing) when i is outside the live range.
   */
  public swap_remove(i: number): Entity | null {
    if (i < 0 || i >= this._len) return null;
    const removed = read_slot(this._buf[i]);
    this._buf[i] = this._buf[--this._len];
    this._buf[this._len] = EMPTY;
    return removed;
  }

  public clear(): void {
    this._buf.fill(EMPTY, 0, this._len);
    this._len = 0;
  }

  /** Ensure the buffer holds at least `capacity` slots without growing. */
  public ensure_capacity(capacity: number): void {
    if (capacity <= this._buf.length) return;
    let new_cap = this._buf.length || 1;
    while (new_cap < capacity) new_cap *= GROWTH_FACTOR;
    const next = new BigUint64Array(new_cap);
    next.set(this._buf.subarray(0, this._len));
    this._buf = next;
  }

  /** Sort ascending by entity order. Empty slots sort first. */
  public sort(): void {
    this._buf.subarray(0, this._len).sort();
  }

  /** Canonical bits of every occupied slot, in slot order. */
  public to_bits_array(): BigUint64Array {
    const out: bigint[] = [];
    for (const entity of this) {
      if (entity !== null) out.push(entity_to_bits(entity));
    }
    return BigUint64Array.from(out);
  }

  [Symbol.iterator](): Iterator<Entity | null> {
    let i = 0;
    const buf = this._buf;
    const len = this._len;
    return {
      next(): IteratorResult<Entity | null> {
        if (i < len) return { value: read_slot(buf[i++]), done: false };
        return { value: undefined, done: true };
      },
    };
  }

  private _grow(): void {
    const next = new BigUint64Array((this._buf.length || 1) * GROWTH_FACTOR);
    next.set(this._buf);
    this._buf = next;
  }
}
