import { bench, describe } from "vitest";
import { as_address } from "type_primitives";
import { MemoryWordStore } from "../word_store";
import { SparseArray } from "../sparse_array";

//=========================================================
// Helpers
//=========================================================

function filled(n: number): SparseArray {
  const arr = new SparseArray(new MemoryWordStore(), as_address(1n));
  for (let i = 0; i < n; i++) arr.push(BigInt(i));
  return arr;
}

function with_deletions(n: number, d: number): SparseArray {
  const arr = filled(n);
  // one deletion every n / d slots, ascending
  const step = Math.floor(n / d) - 1;
  for (let k = 0; k < d; k++) arr.delete_at(k * step);
  return arr;
}

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

//=========================================================
// Appends
//=========================================================

describe("append", () => {
  bench("push_1k", () => {
    filled(1_000);
  });
});

//=========================================================
// Random reads
//=========================================================

describe("random get", () => {
  const clean = filled(10_000);
  const sparse = with_deletions(10_000, 1_000);

  bench("get_1k_no_deletions", () => {
    const rand = xorshift32(42);
    for (let i = 0; i < 1_000; i++) clean.get(Math.floor(rand() * clean.length));
  });

  bench("get_1k_after_1k_deletions", () => {
    const rand = xorshift32(42);
    for (let i = 0; i < 1_000; i++) sparse.get(Math.floor(rand() * sparse.length));
  });
});

//=========================================================
// Deletion
//=========================================================

describe("deletion", () => {
  bench("safe_delete_at_front_1k", () => {
    const arr = filled(1_000);
    for (let i = 0; i < 1_000; i++) arr.safe_delete_at(0);
  });
});
