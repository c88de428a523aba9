export type { Brand } from "./brand";
export {
  assert,
  is_non_negative_integer,
  is_u32,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
export { err, ok, unwrap, unwrap_or, type Result } from "./result";
