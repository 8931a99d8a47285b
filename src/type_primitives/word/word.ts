/***
 *
 * Word — Unsigned 256-bit store word
 *
 * Every cell of a word store holds one Word: a bigint in [0, 2^256).
 * Addresses are Words too, branded so that an address and a stored value
 * cannot be swapped by accident. Address arithmetic wraps modulo 2^256,
 * so hash(A) + i never leaves the word range however large hash(A) is.
 *
 ***/

import type { Brand } from "../brand";
import { unsafe_cast, validate_and_cast } from "../assertions";
import {
  EMPTY_WORD,
  WORD_BYTES,
  WORD_MAX,
  WORD_MODULUS,
} from "../../utils/constants";
import { SPARSE_ARRAY_ERROR, SparseArrayError } from "../../utils/error";

export type Word = bigint;
export type Address = Brand<bigint, "address">;

export const is_word = (v: unknown): v is Word =>
  typeof v === "bigint" && v >= EMPTY_WORD && v <= WORD_MAX;

export const as_word = (v: bigint): Word =>
  validate_and_cast<bigint, Word>(v, is_word, "word in [0, 2^256)");

export const as_address = (v: bigint): Address =>
  validate_and_cast<bigint, Address>(v, is_word, "address in [0, 2^256)");

/** a + n (mod 2^256). */
export const word_add = (a: Word, n: bigint | number): Word =>
  (a + BigInt(n)) % WORD_MODULUS;

export const address_add = (a: Address, n: bigint | number): Address =>
  unsafe_cast<Address>(word_add(a, n));

/** 32-byte big-endian encoding. */
export function word_to_bytes(w: Word): Uint8Array {
  const out = new Uint8Array(WORD_BYTES);
  let rest = w;
  for (let i = WORD_BYTES - 1; i >= 0 && rest > 0n; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

export function bytes_to_word(bytes: Uint8Array): Word {
  let w = EMPTY_WORD;
  const start = Math.max(0, bytes.length - WORD_BYTES);
  for (let i = start; i < bytes.length; i++) {
    w = (w << 8n) | BigInt(bytes[i]);
  }
  return w;
}

/**
 * Convert a counter word into a JS number.
 * Counters past Number.MAX_SAFE_INTEGER cannot be indexed from JS.
 */
export function word_to_index(w: Word): number {
  if (w > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new SparseArrayError(
      SPARSE_ARRAY_ERROR.INDEX_OVERFLOW,
      `Counter ${w} does not fit a safe integer`,
      { word: w },
    );
  }
  return Number(w);
}
