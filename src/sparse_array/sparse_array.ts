/***
 *
 * SparseArray — Logical array over a word store with cheap deletion
 *
 * A handle binding a base address to the store it lives in. All state
 * is in the store: the length word at the base address, the element
 * slots from hash(A) upwards and the tombstone log. Two handles with the
 * same base address and store see the same array.
 *
 * Logical index i lives at hash(A) + i + offset(i), where offset(i)
 * comes from the tombstone log. Appends and overwrites cost one offset
 * lookup and one write; deletions never move data, they log a tombstone
 * and decrement the length.
 *
 * Usage:
 *
 *   const store = new MemoryWordStore();
 *   const arr = new SparseArray(store, address_from_name("queue"));
 *
 *   arr.push(10n);
 *   arr.push(20n);
 *   arr.push(30n);
 *   arr.safe_delete_at(1);
 *   arr.to_array(); // [10n, 30n]
 *
 * Deletions must target ascending slots: once a slot has been deleted,
 * no deletion may land before it. safe_delete_at enforces this;
 * delete_at trusts the caller and corrupts later lookups if it is wrong.
 *
 * Operations on one base address are not safe to interleave; callers
 * serialize them. Different base addresses never share a word.
 *
 ***/

import {
  address_add,
  as_word,
  assert,
  is_non_negative_integer,
  word_to_index,
  type Address,
  type Word,
} from "type_primitives";
import { SPARSE_ARRAY_ERROR, SparseArrayError } from "utils/error";
import type { WordStore } from "../word_store";
import { AddressSpace, type AddressSpaceOptions } from "../address";
import { TombstoneLog } from "../tombstone";

export type SparseArrayOptions = AddressSpaceOptions;

const is_index = (v: number): v is number => is_non_negative_integer(v);

export class SparseArray {
  public readonly space: AddressSpace;
  public readonly tombstones: TombstoneLog;

  private readonly _length_address: Address;
  private readonly _element_base: Address;

  constructor(
    private readonly _store: WordStore,
    public readonly base_address: Address,
    options?: SparseArrayOptions | AddressSpace,
  ) {
    this.space = options instanceof AddressSpace ? options : new AddressSpace(options);
    this.tombstones = new TombstoneLog(_store, this.space, base_address);
    this._length_address = this.space.length_address(base_address);
    this._element_base = this.space.element_base(base_address);
  }

  //=========================================================
  // Counters
  //=========================================================

  get length(): number {
    return word_to_index(this._store.read_word(this._length_address));
  }

  get deletion_count(): number {
    return this.tombstones.count;
  }

  get is_empty(): boolean {
    return this.length === 0;
  }

  //=========================================================
  // Addressing
  //=========================================================

  /** Store address currently backing logical `index`. Does not check bounds. */
  public physical_address(index: number): Address {
    assert(index, is_index, "index is a non-negative integer");
    return address_add(
      this._element_base,
      index + this.tombstones.resolve_offset(index),
    );
  }

  //=========================================================
  // Element access
  //=========================================================

  /** Overwrite logical `index`, or append when `index === length`. */
  public store(index: number, value: Word): void {
    const word = as_word(value);
    const length = this._check_index(index, 1, "store at");
    if (index === length) this._write_length(length + 1);
    this._store.write_word(this.physical_address(index), word);
  }

  public get(index: number): Word {
    this._check_index(index, 0, "read");
    return this._store.read_word(this.physical_address(index));
  }

  public push(value: Word): void {
    this.store(this.length, value);
  }

  /**
   * Drop the last element. The slot keeps its word; it is only
   * unreachable until the next append writes over it.
   */
  public pop(): void {
    const length = this.length;
    if (length === 0) {
      throw new SparseArrayError(
        SPARSE_ARRAY_ERROR.UNDERFLOW,
        "Cannot pop an empty sparse array",
        { length },
      );
    }
    this._write_length(length - 1);
  }

  /** Value at length - 1, or undefined when empty. */
  public last(): Word | undefined {
    const length = this.length;
    return length === 0 ? undefined : this.get(length - 1);
  }

  //=========================================================
  // Deletion
  //=========================================================

  /**
   * Remove logical `index`; later elements shift down by one.
   * Does not check deletion order.
   */
  public delete_at(index: number): void {
    const length = this._check_index(index, 0, "delete");
    this._write_length(length - 1);
    this.tombstones.record_deletion(index);
  }

  /** delete_at, rejecting a target slot already passed by an earlier deletion. */
  public safe_delete_at(index: number): void {
    const length = this._check_index(index, 0, "delete");
    if (this.tombstones.would_violate_order(index)) {
      throw new SparseArrayError(
        SPARSE_ARRAY_ERROR.DELETION_UNDERFLOW,
        `Cannot delete index ${index}: an earlier deletion already passed it`,
        { index, last_entry: this.tombstones.last_entry() },
      );
    }
    this._write_length(length - 1);
    this.tombstones.record_deletion(index);
  }

  //=========================================================
  // Iteration
  //=========================================================

  public to_array(): Word[] {
    const length = this.length;
    const out: Word[] = new Array(length);
    for (let i = 0; i < length; i++) out[i] = this.get(i);
    return out;
  }

  [Symbol.iterator](): Iterator<Word> {
    let i = 0;
    const length = this.length;
    const get = (index: number): Word => this.get(index);
    return {
      next(): IteratorResult<Word> {
        if (i < length) return { value: get(i++), done: false };
        return { value: undefined, done: true };
      },
    };
  }

  //=========================================================
  // Internal
  //=========================================================

  /**
   * Throws OUT_OF_RANGE unless index is an integer in [0, length + slack).
   * Returns the length read for the check.
   */
  private _check_index(index: number, slack: 0 | 1, action: string): number {
    const length = this.length;
    if (!is_non_negative_integer(index) || index >= length + slack) {
      throw new SparseArrayError(
        SPARSE_ARRAY_ERROR.OUT_OF_RANGE,
        `Cannot ${action} index ${index}: length is ${length}`,
        { index, length },
      );
    }
    return length;
  }

  private _write_length(length: number): void {
    this._store.write_word(this._length_address, BigInt(length));
  }
}
