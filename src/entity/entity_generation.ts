/***
 * EntityGeneration — Recycle counter of an entity slot.
 *
 * Every u32 is a valid generation. The allocator bumps it each time a
 * slot is freed and handed out again, so an old Entity carrying the
 * previous generation no longer matches the slot.
 *
 ***/

import { Brand, is_u32, unsafe_cast, validate_and_cast } from "type_primitives";
import { U32_MAX } from "utils/constants";

export type EntityGeneration = Brand<number, "entity_generation">;

export const GENERATION_MIN = unsafe_cast<EntityGeneration>(0);
export const GENERATION_MAX = unsafe_cast<EntityGeneration>(U32_MAX);
export const GENERATION_DEFAULT = GENERATION_MIN;

export const generation_new = (value: number): EntityGeneration =>
  validate_and_cast<number, EntityGeneration>(value, is_u32, "generation is a u32");

/** Generations store their value unchanged, so bits and value coincide. */
export const generation_from_bits = (bits: number): EntityGeneration =>
  generation_new(bits);

export const generation_to_bits = (generation: EntityGeneration): number =>
  generation;

export const generation_get = (generation: EntityGeneration): number =>
  generation;

export const compare_generations = (
  a: EntityGeneration,
  b: EntityGeneration,
): -1 | 0 | 1 => (a < b ? -1 : a > b ? 1 : 0);

export const format_generation = (generation: EntityGeneration): string =>
  String(generation);
