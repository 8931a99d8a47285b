// Sparse array
export { SparseArray, type SparseArrayOptions } from "./sparse_array";

// Tombstone log
export { TombstoneLog } from "./tombstone";

// Addressing
export {
  AddressSpace,
  type AddressSpaceOptions,
  type WordHasher,
  sha256_hasher,
  address_from_name,
  address_from_slot,
} from "./address";

// Stores
export { type WordStore, MemoryWordStore, TracingWordStore } from "./word_store";

// Words
export {
  type Word,
  type Address,
  is_word,
  as_word,
  as_address,
  word_to_bytes,
  bytes_to_word,
} from "./type_primitives";

// Errors
export {
  AppError,
  SPARSE_ARRAY_ERROR,
  SparseArrayError,
  is_sparse_array_error,
} from "./utils/error";
export { TYPE_ERROR, TypeError } from "./type_primitives";

// Constants
export { EMPTY_WORD, DEFAULT_TOMBSTONE_LOG_TAG } from "./utils/constants";
