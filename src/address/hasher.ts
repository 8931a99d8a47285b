/***
 * Hasher — Collision-resistant mixing of words into an address.
 *
 * A WordHasher folds one or more words into a single Address. The
 * default hashes the 32-byte big-endian encoding of each input, in
 * order, with SHA-256.
 *
 ***/

import { createHash } from "node:crypto";
import {
  as_address,
  bytes_to_word,
  unsafe_cast,
  word_to_bytes,
  type Address,
  type Word,
} from "type_primitives";
import { DEFAULT_HASH_ALGORITHM } from "utils/constants";

export type WordHasher = (...words: Word[]) => Address;

function digest_to_address(chunks: readonly Uint8Array[]): Address {
  const h = createHash(DEFAULT_HASH_ALGORITHM);
  for (let i = 0; i < chunks.length; i++) h.update(chunks[i]);
  // SHA-256 digests are exactly one word wide
  return unsafe_cast<Address>(bytes_to_word(h.digest()));
}

export const sha256_hasher: WordHasher = (...words) =>
  digest_to_address(words.map(word_to_bytes));

/** Base address derived from a human-readable name. */
export const address_from_name = (name: string): Address =>
  digest_to_address([new TextEncoder().encode(name)]);

/** Base address for a numbered slot: the slot number itself. */
export const address_from_slot = (slot: number | bigint): Address =>
  as_address(BigInt(slot));
