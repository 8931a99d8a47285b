/***
 * TracingWordStore — WordStore decorator that records every access.
 *
 * Reads and writes are forwarded to the inner store unchanged and the
 * address of each one is appended to `reads` / `writes` in call order.
 * Used to check access counts (resolve_offset reads O(log d) words)
 * and that two arrays never touch each other's addresses.
 *
 ***/

import type { Address, Word } from "type_primitives";
import type { WordStore } from "./word_store";

export class TracingWordStore implements WordStore {
  private readonly _reads: Address[] = [];
  private readonly _writes: Address[] = [];

  constructor(private readonly _inner: WordStore) {}

  /** Live view of read addresses, oldest first. Do not mutate. */
  get reads(): readonly Address[] {
    return this._reads;
  }

  /** Live view of written addresses, oldest first. Do not mutate. */
  get writes(): readonly Address[] {
    return this._writes;
  }

  read_word(address: Address): Word {
    this._reads.push(address);
    return this._inner.read_word(address);
  }

  write_word(address: Address, word: Word): void {
    this._writes.push(address);
    this._inner.write_word(address, word);
  }

  /** Every distinct address read or written since the last reset. */
  touched(): Set<Address> {
    return new Set([...this._reads, ...this._writes]);
  }

  reset(): void {
    this._reads.length = 0;
    this._writes.length = 0;
  }
}
