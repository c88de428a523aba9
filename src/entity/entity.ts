/***
 * Entity — Packed generational ID (32-bit index | 32-bit generation).
 *
 * An Entity is a single 64-bit word held in a bigint. The slot index sits
 * in the high half and the generation in the low half, so comparing two
 * words as unsigned integers orders by index first and, within one slot,
 * by generation (recency).
 *
 * Two forms of the word exist:
 *
 *   storage    [index + 1 : 32][generation : 32]   never 0n
 *   canonical  [index     : 32][generation : 32]   0n is index 0, gen 0
 *
 * Storage is what an Entity value holds. Because the stored index is
 * offset by one, no valid Entity is 0n, which lets zeroed memory mean
 * "no entity" (see EntityBuffer). Canonical bits are what leaves the
 * process: entity_to_bits / entity_from_bits convert between the two.
 *
 * The offset is a constant added to the high half, so both forms sort
 * identically and comparisons run on the storage word directly.
 *
 *   create_entity(i, g)     → (stored(i) << 32) | g
 *   entity_to_bits(e)       → e - (1 << 32)
 *   entity_from_bits(bits)  → bits + (1 << 32), unless bits >> 32 = 0xFFFF_FFFF
 *
 ***/

import {
  Brand,
  TYPE_ERROR,
  TypeError,
  unsafe_cast,
} from "type_primitives";
import {
  ENTITY_BYTES,
  GENERATION_MASK,
  INDEX_SHIFT,
  INDEX_STORAGE_OFFSET,
  RESERVED_INDEX,
  U64_MAX,
} from "utils/constants";
import {
  EntityGeneration,
  GENERATION_MIN,
  format_generation,
} from "./entity_generation";
import { EntityIndex, INDEX_PLACEHOLDER, format_index } from "./entity_index";

export type Entity = Brand<bigint, "entity">;

const STORAGE_OFFSET = BigInt(INDEX_STORAGE_OFFSET) << INDEX_SHIFT;
const RESERVED_HIGH = BigInt(RESERVED_INDEX);

if (__DEV__ && BigUint64Array.BYTES_PER_ELEMENT !== ENTITY_BYTES) {
  throw new TypeError(
    TYPE_ERROR.ASSERTION_FAIL_CONDITION,
    "Expected an entity to occupy exactly one 64-bit word",
    { bytes: BigUint64Array.BYTES_PER_ELEMENT },
  );
}

//=========================================================
// Pack
//=========================================================

export const create_entity = (
  index: EntityIndex,
  generation: EntityGeneration,
): Entity =>
  unsafe_cast<Entity>((BigInt(index) << INDEX_SHIFT) | BigInt(generation));

export const ENTITY_PLACEHOLDER = create_entity(INDEX_PLACEHOLDER, GENERATION_MIN);
export const ENTITY_DEFAULT = ENTITY_PLACEHOLDER;

/** Build from an `[index, generation]` pair. */
export const entity_from_pair = ([index, generation]: readonly [
  EntityIndex,
  EntityGeneration,
]): Entity => create_entity(index, generation);

/** Build from a `[generation, index]` pair; same result as entity_from_pair. */
export const entity_from_reversed_pair = ([generation, index]: readonly [
  EntityGeneration,
  EntityIndex,
]): Entity => create_entity(index, generation);

//=========================================================
// Unpack
//=========================================================

export const entity_index = (entity: Entity): EntityIndex =>
  unsafe_cast<EntityIndex>(Number(entity >> INDEX_SHIFT));

export const entity_generation = (entity: Entity): EntityGeneration =>
  unsafe_cast<EntityGeneration>(Number(entity & GENERATION_MASK));

/** Internal storage word. Never 0n for a valid entity. */
export const entity_storage_bits = (entity: Entity): bigint => entity;

//=========================================================
// Canonical bits
//=========================================================

/** Canonical 64-bit form: `(index << 32) | generation`, safe to persist. */
export const entity_to_bits = (entity: Entity): bigint =>
  entity - STORAGE_OFFSET;

/**
 * Decode canonical bits. Returns null when the index half is the
 * reserved 0xFFFF_FFFF, or when `bits` is not an unsigned 64-bit value.
 * Every other input decodes, including 0n.
 */
export const entity_from_bits = (bits: bigint): Entity | null => {
  if (bits < 0n || bits > U64_MAX) return null;
  if (bits >> INDEX_SHIFT === RESERVED_HIGH) return null;
  return unsafe_cast<Entity>(bits + STORAGE_OFFSET);
};

//=========================================================
// Ordering & equality
//=========================================================

/** Orders by index, then generation. Same result as comparing entity_to_bits. */
export const compare_entities = (a: Entity, b: Entity): -1 | 0 | 1 =>
  a < b ? -1 : a > b ? 1 : 0;

export const entities_equal = (a: Entity, b: Entity): boolean => a === b;

export const format_entity = (entity: Entity): string =>
  `Entity(index: ${format_index(entity_index(entity))}, generation: ${format_generation(entity_generation(entity))})`;
