/***
 * Entity bytes — Canonical 64-bit form through a DataView.
 *
 * Only canonical bits are written, never the storage word, so the
 * bytes decode the same in any process. Byte order defaults to
 * big-endian, the DataView default; pass `little_endian` to match a
 * host-order buffer.
 *
 ***/

import { Entity, entity_from_bits, entity_to_bits } from "./entity";

export const write_entity = (
  view: DataView,
  byte_offset: number,
  entity: Entity,
  little_endian = false,
): void => {
  view.setBigUint64(byte_offset, entity_to_bits(entity), little_endian);
};

/** Returns null when the stored index half is the reserved 0xFFFF_FFFF. */
export const read_entity = (
  view: DataView,
  byte_offset: number,
  little_endian = false,
): Entity | null =>
  entity_from_bits(view.getBigUint64(byte_offset, little_endian));
