import { describe, expect, it } from "vitest";
import { TypeError } from "type_primitives";
import {
  GENERATION_DEFAULT,
  GENERATION_MAX,
  GENERATION_MIN,
  compare_generations,
  format_generation,
  generation_from_bits,
  generation_get,
  generation_new,
  generation_to_bits,
} from "../entity_generation";

describe("EntityGeneration", () => {
  //=========================================================
  // Construction
  //=========================================================

  it("stores the value unchanged", () => {
    expect(generation_get(generation_new(7))).toBe(7);
  });

  it("accepts every u32 boundary", () => {
    expect(generation_new(0)).toBe(GENERATION_MIN);
    expect(generation_new(0xffff_ffff)).toBe(GENERATION_MAX);
  });

  it("MIN and MAX span the full u32 range", () => {
    expect(generation_get(GENERATION_MIN)).toBe(0);
    expect(generation_get(GENERATION_MAX)).toBe(4_294_967_295);
  });

  it("defaults to MIN", () => {
    expect(GENERATION_DEFAULT).toBe(GENERATION_MIN);
  });

  //=========================================================
  // Bits
  //=========================================================

  it("bits and value are the same pattern", () => {
    const g = generation_from_bits(0x8000_0001);
    expect(generation_to_bits(g)).toBe(0x8000_0001);
    expect(generation_get(g)).toBe(0x8000_0001);
  });

  //=========================================================
  // Ordering
  //=========================================================

  it("compares numerically", () => {
    expect(compare_generations(generation_new(1), generation_new(2))).toBe(-1);
    expect(compare_generations(generation_new(2), generation_new(1))).toBe(1);
    expect(compare_generations(generation_new(3), generation_new(3))).toBe(0);
    expect(compare_generations(GENERATION_MAX, GENERATION_MIN)).toBe(1);
  });

  it("formats as its decimal value", () => {
    expect(format_generation(generation_new(42))).toBe("42");
  });

  //=========================================================
  // Dev validation
  //=========================================================

  it("rejects values outside u32 in dev", () => {
    expect(() => generation_new(-1)).toThrow(TypeError);
    expect(() => generation_new(2 ** 32)).toThrow(TypeError);
    expect(() => generation_new(1.5)).toThrow(TypeError);
  });
});
