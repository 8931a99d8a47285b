import { describe, expect, it } from "vitest";
import type { Brand } from "../brand";

type Address = Brand<bigint, "address">;
type Slot = Brand<bigint, "slot">;

describe("Brand", () => {
  it("branded value equals its underlying primitive at runtime", () => {
    const a = 42n as Address;
    expect(a).toBe(42n);
  });

  it("branded values with same underlying value are equal at runtime", () => {
    const address = 7n as Address;
    const slot = 7n as Slot;
    expect(address === (slot as unknown as Address)).toBe(true);
  });

  it("branded value can be used in bigint arithmetic", () => {
    const a = 10n as Address;
    expect(a + 1n).toBe(11n);
    expect(typeof a).toBe("bigint");
  });
});
