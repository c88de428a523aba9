import { create_entity, type Entity } from "../entity";
import { generation_new } from "../entity_generation";
import { index_new, type EntityIndex } from "../entity_index";

export const idx = (value: number): EntityIndex => {
  const index = index_new(value);
  if (index === null) throw new Error(`index ${value} is reserved`);
  return index;
};

export const ent = (index: number, generation: number): Entity =>
  create_entity(idx(index), generation_new(generation));

export const random_u32 = (): number => Math.floor(Math.random() * 0xffff_ffff);
