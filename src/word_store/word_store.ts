/***
 *
 * WordStore — Addressable store of fixed-size words
 *
 * The only contract the sparse array needs from persistent storage:
 * read a word by address (never-written addresses read as EMPTY_WORD)
 * and overwrite a word by address. Each call is assumed atomic on its
 * own; nothing groups several calls into a transaction.
 *
 * MemoryWordStore keeps only non-empty words, so writing EMPTY_WORD
 * behaves like zeroing a slot and frees the entry.
 *
 ***/

import { assert, is_word, type Address, type Word } from "type_primitives";
import { EMPTY_WORD } from "utils/constants";

export interface WordStore {
  read_word(address: Address): Word;
  write_word(address: Address, word: Word): void;
}

export class MemoryWordStore implements WordStore {
  private readonly _words = new Map<bigint, Word>();

  /** Number of addresses holding a non-empty word. */
  get size(): number {
    return this._words.size;
  }

  has(address: Address): boolean {
    return this._words.has(address);
  }

  read_word(address: Address): Word {
    return this._words.get(address) ?? EMPTY_WORD;
  }

  write_word(address: Address, word: Word): void {
    assert(word, is_word, "word in [0, 2^256)");
    if (word === EMPTY_WORD) {
      this._words.delete(address);
      return;
    }
    this._words.set(address, word);
  }

  clear(): void {
    this._words.clear();
  }

  [Symbol.iterator](): Iterator<[bigint, Word]> {
    return this._words.entries();
  }
}
