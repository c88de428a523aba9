import { describe, expect, it } from "vitest";
import { ENTITY_PLACEHOLDER, entity_generation, entity_index } from "../entity";
import { read_entity, write_entity } from "../entity_bytes";
import { generation_get } from "../entity_generation";
import { index_get } from "../entity_index";
import { ent } from "./helpers";

describe("entity bytes", () => {
  it("writes canonical bits big-endian by default", () => {
    const view = new DataView(new ArrayBuffer(8));
    write_entity(view, 0, ent(5, 2));
    expect(view.getUint32(0)).toBe(5);
    expect(view.getUint32(4)).toBe(2);
  });

  it("writes little-endian on request", () => {
    const view = new DataView(new ArrayBuffer(8));
    write_entity(view, 0, ent(5, 2), true);
    expect(view.getUint32(0, true)).toBe(2);
    expect(view.getUint32(4, true)).toBe(5);
  });

  it("roundtrips at an offset in either byte order", () => {
    const view = new DataView(new ArrayBuffer(24));
    write_entity(view, 8, ent(77, 3));
    write_entity(view, 16, ENTITY_PLACEHOLDER, true);
    expect(read_entity(view, 8)).toBe(ent(77, 3));
    expect(read_entity(view, 16, true)).toBe(ENTITY_PLACEHOLDER);
  });

  it("zeroed bytes read as index 0, generation 0", () => {
    const e = read_entity(new DataView(new ArrayBuffer(8)), 0);
    expect(e).not.toBeNull();
    if (e === null) return;
    expect(index_get(entity_index(e))).toBe(0);
    expect(generation_get(entity_generation(e))).toBe(0);
  });

  it("reserved index bytes read as null", () => {
    const bytes = new Uint8Array(8).fill(0xff);
    expect(read_entity(new DataView(bytes.buffer), 0)).toBeNull();
  });
});
