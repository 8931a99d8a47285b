import { describe, expect, it } from "vitest";
import { as_address } from "type_primitives";
import { MemoryWordStore, TracingWordStore, type WordStore } from "../../word_store";
import { AddressSpace } from "../../address";
import { TombstoneLog } from "../tombstone_log";

const BASE = as_address(42n);

function make_log(store: WordStore = new MemoryWordStore()): TombstoneLog {
  return new TombstoneLog(store, new AddressSpace(), BASE);
}

describe("TombstoneLog", () => {
  //=========================================================
  // Empty log
  //=========================================================

  it("starts with no entries", () => {
    const log = make_log();
    expect(log.count).toBe(0);
    expect(log.last_entry()).toBeUndefined();
  });

  it("resolves every index to offset 0 when empty", () => {
    const log = make_log();
    expect(log.resolve_offset(0)).toBe(0);
    expect(log.resolve_offset(17)).toBe(0);
  });

  it("never reports an order violation when empty", () => {
    expect(make_log().would_violate_order(0)).toBe(false);
  });

  //=========================================================
  // record_deletion
  //=========================================================

  it("records index + count + 1 and bumps the count", () => {
    const log = make_log();
    expect(log.record_deletion(1)).toBe(2n);
    expect(log.count).toBe(1);
    expect(log.entry_at(0)).toBe(2n);
    expect(log.last_entry()).toBe(2n);
  });

  it("records a run of ascending deletions", () => {
    const log = make_log();
    for (const i of [1, 3, 5, 6]) log.record_deletion(i);
    expect(log.count).toBe(4);
    expect([0, 1, 2, 3].map((k) => log.entry_at(k))).toEqual([2n, 5n, 8n, 10n]);
  });

  it("writes count and entries at their derived addresses", () => {
    const store = new MemoryWordStore();
    const space = new AddressSpace();
    const log = new TombstoneLog(store, space, BASE);
    log.record_deletion(4);
    expect(store.read_word(space.tombstone_log_address(BASE))).toBe(1n);
    expect(store.read_word(space.tombstone_entry_address(BASE, 0))).toBe(5n);
    expect(store.size).toBe(2);
  });

  it("two logs over the same store and base share state", () => {
    const store = new MemoryWordStore();
    make_log(store).record_deletion(0);
    expect(make_log(store).count).toBe(1);
  });

  //=========================================================
  // resolve_offset
  //=========================================================

  it("resolves offsets after deleting 1, 3, 5, 6 in turn", () => {
    const log = make_log();
    for (const i of [1, 3, 5, 6]) log.record_deletion(i);
    const offsets = [0, 1, 2, 3, 4, 5, 6, 7].map((i) => log.resolve_offset(i));
    expect(offsets).toEqual([0, 1, 1, 2, 2, 3, 4, 4]);
  });

  it("index 0 stays in place when only later slots are deleted", () => {
    const log = make_log();
    log.record_deletion(1);
    expect(log.resolve_offset(0)).toBe(0);
    expect(log.resolve_offset(1)).toBe(1);
  });

  it("takes the largest fixpoint after repeated deletion at one index", () => {
    const log = make_log();
    log.record_deletion(1);
    log.record_deletion(1);
    expect(log.entry_at(0)).toBe(2n);
    expect(log.entry_at(1)).toBe(3n);
    expect(log.resolve_offset(0)).toBe(0);
    expect(log.resolve_offset(1)).toBe(2);
    expect(log.resolve_offset(2)).toBe(2);
  });

  it("reads O(log d) words and writes none", () => {
    const store = new TracingWordStore(new MemoryWordStore());
    const log = make_log(store);
    for (let i = 0; i < 1000; i++) log.record_deletion(i);
    store.reset();
    log.resolve_offset(500);
    // one read for the count, at most ceil(log2(1001)) probes
    expect(store.reads.length).toBeLessThanOrEqual(11);
    expect(store.writes).toEqual([]);
  });

  //=========================================================
  // would_violate_order
  //=========================================================

  it("flags a deletion before the last recorded slot", () => {
    const log = make_log();
    log.record_deletion(3);
    expect(log.would_violate_order(2)).toBe(true);
    expect(log.would_violate_order(3)).toBe(false);
    expect(log.would_violate_order(9)).toBe(false);
  });

  it("flags a deletion that would land on the last recorded value", () => {
    const log = make_log();
    log.record_deletion(5); // entry 6
    log.record_deletion(5); // entry 7
    // 4 + 2 + 1 = 7
    expect(log.would_violate_order(4)).toBe(true);
    expect(log.would_violate_order(5)).toBe(false);
  });
});
