/***
 *
 * TombstoneLog — Append-only record of deletions for one sparse array
 *
 * Deleting logical index i never moves data. Instead the deletion is
 * logged, and every later lookup adds an offset to its canonical slot
 * to step over the vacated positions.
 *
 * Layout (see AddressSpace):
 *   count       at T = tombstone_log_address(A)
 *   entries[k]  at hash(T) + k,  k in [0, count)
 *
 * The k-th deletion of logical index i records i + k + 1. While
 * deletions arrive in ascending order this is the vacated physical slot
 * plus one, and entries are strictly increasing.
 *
 * Offset resolution: the offset o of logical index i is the number of
 * entries e with e <= i + o. Because each entry shifts everything after
 * it by one, o appears on both sides. With strictly increasing entries,
 * "entries[k - 1] <= i + k" is true for a prefix of k = 1..count and
 * false after it, so the largest k for which it holds is found by
 * binary search in O(log count) reads. That k is the offset.
 *
 * Consecutive deletions at one logical index record consecutive values
 * (i + k + 1, i + k + 2), which lets smaller k satisfy the fixpoint as
 * well. The search keeps going right on equality so it lands on the
 * largest one, the only one that reaches a live slot.
 *
 ***/

import {
  address_add,
  word_to_index,
  type Address,
  type Word,
} from "type_primitives";
import type { WordStore } from "../word_store";
import type { AddressSpace } from "../address";

export class TombstoneLog {
  private readonly _count_address: Address;
  private readonly _entry_base: Address;

  constructor(
    private readonly _store: WordStore,
    space: AddressSpace,
    public readonly base_address: Address,
  ) {
    this._count_address = space.tombstone_log_address(base_address);
    this._entry_base = space.tombstone_entry_address(base_address, 0);
  }

  /** Number of deletions recorded so far. Never decreases. */
  get count(): number {
    return word_to_index(this._store.read_word(this._count_address));
  }

  get count_address(): Address {
    return this._count_address;
  }

  entry_address(k: number): Address {
    return address_add(this._entry_base, k);
  }

  /** Recorded value of the k-th deletion. Entries at k >= count read as EMPTY_WORD. */
  entry_at(k: number): Word {
    return this._store.read_word(this.entry_address(k));
  }

  last_entry(): Word | undefined {
    const count = this.count;
    return count === 0 ? undefined : this.entry_at(count - 1);
  }

  /**
   * Append a tombstone for logical index `vacated_index` and return the
   * recorded value. Does not check ordering; see would_violate_order.
   */
  record_deletion(vacated_index: number): Word {
    const count = this.count;
    const recorded = BigInt(vacated_index) + BigInt(count) + 1n;
    this._store.write_word(this.entry_address(count), recorded);
    this._store.write_word(this._count_address, BigInt(count + 1));
    return recorded;
  }

  /**
   * True when deleting logical `index` now would record a value not above
   * the last entry, i.e. the target slot was already passed by an earlier
   * deletion.
   */
  would_violate_order(index: number): boolean {
    const last = this.last_entry();
    if (last === undefined) return false;
    return BigInt(index) + BigInt(this.count) + 1n <= last;
  }

  /** Physical slots to skip past canonical slot `index`. Pure read. */
  resolve_offset(index: number): number {
    const count = this.count;
    if (count === 0) return 0;

    const i = BigInt(index);
    let low = 0;
    let high = count - 1;
    let offset = 0;

    while (low <= high) {
      const mid = Math.floor((low + high) / 2);
      const candidate = mid + 1;
      const canonical = i + BigInt(candidate);
      if (canonical < this.entry_at(mid)) {
        // too many entries assumed
        high = mid - 1;
      } else {
        offset = candidate;
        low = mid + 1;
      }
    }

    return offset;
  }
}
