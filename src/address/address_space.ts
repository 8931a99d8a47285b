/***
 *
 * AddressSpace — Store layout of one sparse array
 *
 * Every address a sparse array touches is derived from its base
 * address A:
 *
 *   length                 A
 *   element i (canonical)  hash(A) + i
 *   tombstone count        hash(A, tag)          = T
 *   tombstone entry k      hash(T) + k
 *
 * The tag makes T differ from hash(A), so the element run and the
 * tombstone run start at unrelated points of the 2^256 space and never
 * meet in practice. Arrays with different base addresses get unrelated
 * runs for the same reason.
 *
 * All derivations are pure; the class only binds the hasher and tag.
 *
 ***/

import {
  address_add,
  as_word,
  type Address,
  type Word,
} from "type_primitives";
import { DEFAULT_TOMBSTONE_LOG_TAG } from "utils/constants";
import { sha256_hasher, type WordHasher } from "./hasher";

export interface AddressSpaceOptions {
  hasher?: WordHasher;
  tombstone_tag?: Word;
}

export class AddressSpace {
  public readonly hasher: WordHasher;
  public readonly tombstone_tag: Word;

  constructor(options?: AddressSpaceOptions) {
    this.hasher = options?.hasher ?? sha256_hasher;
    this.tombstone_tag = as_word(options?.tombstone_tag ?? DEFAULT_TOMBSTONE_LOG_TAG);
  }

  public length_address(base: Address): Address {
    return base;
  }

  /** First canonical element slot; element i lives at element_base + i + offset(i). */
  public element_base(base: Address): Address {
    return this.hasher(base);
  }

  public element_address(base: Address, index: number | bigint): Address {
    return address_add(this.element_base(base), index);
  }

  public tombstone_log_address(base: Address): Address {
    return this.hasher(base, this.tombstone_tag);
  }

  public tombstone_entry_address(base: Address, k: number | bigint): Address {
    return address_add(this.hasher(this.tombstone_log_address(base)), k);
  }
}
