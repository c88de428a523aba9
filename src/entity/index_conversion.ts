/***
 * Index conversions — EntityIndex to and from fixed-width integers.
 *
 * One table describes every integer type by width and signedness; the
 * four conversions below all run through it. Tags up to 32 bits carry a
 * `number`, wider tags (and pointer width, taken as 64 bits) a `bigint`.
 *
 *   index_try_from(tag, value)   value must be a valid `tag`, fit a u32
 *                                and not be the reserved 2^32 - 1
 *   index_from("u8" | "u16", v)  always fits
 *   index_try_into(index, tag)   fails when the canonical value overflows
 *   index_into(index, tag)       targets that hold every index
 *
 ***/

import { err, ok, Result, validate_and_cast } from "type_primitives";
import { ENTITY_ERROR, EntityError } from "utils/error";
import { RESERVED_INDEX, U32_MAX } from "utils/constants";
import { EntityIndex, index_get, index_new } from "./entity_index";

export type IntTag =
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "usize"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "i128"
  | "isize";

type WideIntTag = "u64" | "u128" | "usize" | "i64" | "i128" | "isize";

export type IntValue<T extends IntTag> = T extends WideIntTag ? bigint : number;

/** Sources that always fit in an index. */
export type WideningIntTag = "u8" | "u16";

/** Targets that hold every canonical index value. */
export type LosslessIntTag = "u32" | "u64" | "u128" | "usize" | "i64" | "i128" | "isize";

interface IntSpec<V extends number | bigint> {
  readonly min: bigint;
  readonly max: bigint;
  readonly from_bigint: (value: bigint) => V;
}

const POINTER_BITS = 64;

const int_spec = <V extends number | bigint>(
  bits: number,
  signed: boolean,
  from_bigint: (value: bigint) => V,
): IntSpec<V> => {
  const width = BigInt(bits);
  return {
    min: signed ? -(1n << (width - 1n)) : 0n,
    max: signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n,
    from_bigint,
  };
};

const narrow = (bits: number, signed: boolean): IntSpec<number> =>
  int_spec(bits, signed, Number);

const wide = (bits: number, signed: boolean): IntSpec<bigint> =>
  int_spec(bits, signed, (value) => value);

const INT_SPECS: { [K in IntTag]: IntSpec<IntValue<K>> } = {
  u8: narrow(8, false),
  u16: narrow(16, false),
  u32: narrow(32, false),
  u64: wide(64, false),
  u128: wide(128, false),
  usize: wide(POINTER_BITS, false),
  i8: narrow(8, true),
  i16: narrow(16, true),
  i32: narrow(32, true),
  i64: wide(64, true),
  i128: wide(128, true),
  isize: wide(POINTER_BITS, true),
};

const U32_MAX_BIG = BigInt(U32_MAX);

const to_bigint = (value: number | bigint): bigint | null => {
  if (typeof value === "bigint") return value;
  return Number.isSafeInteger(value) ? BigInt(value) : null;
};

const out_of_range = (
  tag: IntTag,
  value: number | bigint,
  reason: string,
): EntityError =>
  new EntityError(
    ENTITY_ERROR.INT_OUT_OF_RANGE,
    `${String(value)} ${reason}`,
    { tag, value },
  );

/** Inclusive bounds of an integer tag. */
export const int_range = (tag: IntTag): readonly [min: bigint, max: bigint] => {
  const spec = INT_SPECS[tag];
  return [spec.min, spec.max];
};

//=========================================================
// Into EntityIndex
//=========================================================

export function index_try_from<T extends IntTag>(
  tag: T,
  value: IntValue<T>,
): Result<EntityIndex, EntityError> {
  const spec = INT_SPECS[tag];
  const big = to_bigint(value);
  if (big === null || big < spec.min || big > spec.max) {
    return err(out_of_range(tag, value, `is not a valid ${tag}`));
  }
  if (big < 0n || big > U32_MAX_BIG) {
    return err(out_of_range(tag, value, "does not fit in a 32-bit index"));
  }

  const index = index_new(Number(big));
  if (index === null) {
    return err(
      new EntityError(
        ENTITY_ERROR.RESERVED_INDEX,
        `${RESERVED_INDEX} is reserved for the placeholder index`,
        { tag, value },
      ),
    );
  }
  return ok(index);
}

export function index_from(tag: WideningIntTag, value: number): EntityIndex {
  const [min, max] = int_range(tag);
  const checked = validate_and_cast<number>(
    value,
    (v) => Number.isInteger(v) && v >= Number(min) && v <= Number(max),
    `index source is a ${tag}`,
  );
  const index = index_new(checked);
  if (index === null) {
    throw new EntityError(ENTITY_ERROR.RESERVED_INDEX, undefined, { tag, value });
  }
  return index;
}

//=========================================================
// Out of EntityIndex
//=========================================================

export function index_try_into<T extends IntTag>(
  index: EntityIndex,
  tag: T,
): Result<IntValue<T>, EntityError> {
  const spec = INT_SPECS[tag];
  const value = BigInt(index_get(index));
  if (value > spec.max) {
    return err(out_of_range(tag, index_get(index), `does not fit in a ${tag}`));
  }
  return ok(spec.from_bigint(value));
}

export function index_into<T extends LosslessIntTag>(
  index: EntityIndex,
  tag: T,
): IntValue<T> {
  return INT_SPECS[tag].from_bigint(BigInt(index_get(index)));
}
