export type { Brand } from "./brand";
export {
  assert,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
export {
  type Word,
  type Address,
  is_word,
  as_word,
  as_address,
  word_add,
  address_add,
  word_to_bytes,
  bytes_to_word,
  word_to_index,
} from "./word/word";
