// Word geometry
export const WORD_BITS = 256n;
export const WORD_BYTES = 32;
export const WORD_MODULUS = 1n << WORD_BITS;
export const WORD_MAX = WORD_MODULUS - 1n;

// Value of every address that has never been written
export const EMPTY_WORD = 0n;

// Mixed with the base address to derive the tombstone log's own address.
// ASCII "tombstone.log" right-aligned in a word; any value works as long as
// hash(A, tag) can never equal hash(A).
export const DEFAULT_TOMBSTONE_LOG_TAG = 0x746f6d6273746f6e652e6c6f67n;

// Hash used by the default address space
export const DEFAULT_HASH_ALGORITHM = "sha256";
