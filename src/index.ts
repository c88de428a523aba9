// Entity
export {
  ENTITY_DEFAULT,
  ENTITY_PLACEHOLDER,
  compare_entities,
  create_entity,
  entities_equal,
  entity_from_bits,
  entity_from_pair,
  entity_from_reversed_pair,
  entity_generation,
  entity_index,
  entity_storage_bits,
  entity_to_bits,
  format_entity,
  type Entity,
} from "./entity/entity";

// Index
export {
  INDEX_DEFAULT,
  INDEX_MAX,
  INDEX_MIN,
  INDEX_PLACEHOLDER,
  compare_indices,
  format_index,
  index_from_bits,
  index_get,
  index_is_placeholder,
  index_new,
  index_to_bits,
  type EntityIndex,
} from "./entity/entity_index";

// Generation
export {
  GENERATION_DEFAULT,
  GENERATION_MAX,
  GENERATION_MIN,
  compare_generations,
  format_generation,
  generation_from_bits,
  generation_get,
  generation_new,
  generation_to_bits,
  type EntityGeneration,
} from "./entity/entity_generation";

// Integer interop
export {
  index_from,
  index_into,
  index_try_from,
  index_try_into,
  int_range,
  type IntTag,
  type IntValue,
  type LosslessIntTag,
  type WideningIntTag,
} from "./entity/index_conversion";

// Bytes & buffers
export { read_entity, write_entity } from "./entity/entity_bytes";
export { EntityBuffer } from "./entity/entity_buffer";

// Results & errors
export { err, ok, unwrap, unwrap_or, type Result } from "./type_primitives/result";
export { ENTITY_ERROR, EntityError, is_entity_error } from "./utils/error";
export { ENTITY_BYTES } from "./utils/constants";
