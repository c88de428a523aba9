// Field widths of the packed 64-bit entity word
export const GENERATION_BITS = 32;

export const U32_MAX = 0xffff_ffff;

// Canonical index value that never names a real slot
export const RESERVED_INDEX = U32_MAX;

// Internal index storage is the canonical value plus this offset, so zero is never stored
export const INDEX_STORAGE_OFFSET = 1;

// BigInt counterparts for the 64-bit word arithmetic
export const INDEX_SHIFT = BigInt(GENERATION_BITS);
export const GENERATION_MASK = BigInt(U32_MAX);
export const U64_MAX = (1n << 64n) - 1n;

// One entity occupies exactly one 64-bit word
export const ENTITY_BYTES = 8;

// EntityBuffer defaults
export const DEFAULT_INITIAL_CAPACITY = 16;
export const GROWTH_FACTOR = 2;
