/***
 * EntityIndex — Slot number of an entity, stored offset by one.
 *
 * Canonical values span [0, 2^32 - 2]. The value 2^32 - 1 is reserved:
 * index_new rejects it, and INDEX_PLACEHOLDER (= INDEX_MAX) is the
 * highest real value, used as a sentinel that no allocator hands out.
 *
 * The stored bits are `value + 1`, so a stored index is never zero:
 *
 *   canonical:  0   1   ...  0xFFFF_FFFE   (0xFFFF_FFFF rejected)
 *   stored:     1   2   ...  0xFFFF_FFFF   (0 never occurs)
 *
 * The +1 shift is monotonic, so the stored form and the canonical form
 * order the same way. compare_indices orders by index_get.
 *
 ***/

import { Brand, is_u32, unsafe_cast, validate_and_cast } from "type_primitives";
import { INDEX_STORAGE_OFFSET, RESERVED_INDEX } from "utils/constants";

export type EntityIndex = Brand<number, "entity_index">;

const from_canonical = (value: number): EntityIndex =>
  unsafe_cast<EntityIndex>(value + INDEX_STORAGE_OFFSET);

export const INDEX_MIN = from_canonical(0);
export const INDEX_MAX = from_canonical(RESERVED_INDEX - 1);
export const INDEX_PLACEHOLDER = INDEX_MAX;
export const INDEX_DEFAULT = INDEX_PLACEHOLDER;

//=========================================================
// Construction
//=========================================================

/** Returns null for the reserved value 2^32 - 1. */
export const index_new = (value: number): EntityIndex | null => {
  const checked = validate_and_cast<number>(value, is_u32, "index is a u32");
  return checked === RESERVED_INDEX ? null : from_canonical(checked);
};

/** Interpret `bits` as the stored (offset) form. Returns null for 0. */
export const index_from_bits = (bits: number): EntityIndex | null => {
  const checked = validate_and_cast<number>(bits, is_u32, "index bits are a u32");
  return checked === 0 ? null : unsafe_cast<EntityIndex>(checked);
};

//=========================================================
// Access
//=========================================================

/** Stored form (`value + 1`), not the canonical value. */
export const index_to_bits = (index: EntityIndex): number => index;

export const index_get = (index: EntityIndex): number =>
  index - INDEX_STORAGE_OFFSET;

export const index_is_placeholder = (index: EntityIndex): boolean =>
  index === INDEX_PLACEHOLDER;

export const compare_indices = (a: EntityIndex, b: EntityIndex): -1 | 0 | 1 => {
  const va = index_get(a);
  const vb = index_get(b);
  return va < vb ? -1 : va > vb ? 1 : 0;
};

export const format_index = (index: EntityIndex): string =>
  String(index_get(index));

