import { describe, expect, it } from "vitest";
import { MemoryClaimGuard } from "../../src/handlers/ClaimGuard.js";

describe("MemoryClaimGuard", () => {
  it("enforces the cooldown per identity", async () => {
    let now = 0;
    const guard = new MemoryClaimGuard(3600, () => now);

    expect(await guard.tryClaim("203.0.113.5")).toBe(true);

    now = 1_800_000;
    expect(await guard.tryClaim("203.0.113.5")).toBe(false);

    now = 3_601_000;
    expect(await guard.tryClaim("203.0.113.5")).toBe(true);
  });

  it("admits again exactly when the cooldown elapses", async () => {
    let now = 0;
    const guard = new MemoryClaimGuard(3600, () => now);

    await guard.tryClaim("203.0.113.5");
    now = 3_599_999;
    expect(await guard.tryClaim("203.0.113.5")).toBe(false);
    now = 3_600_000;
    expect(await guard.tryClaim("203.0.113.5")).toBe(true);
  });

  it("does not restart the cooldown on a rejected attempt", async () => {
    let now = 0;
    const guard = new MemoryClaimGuard(3600, () => now);

    await guard.tryClaim("198.51.100.7");
    now = 3_000_000;
    await guard.tryClaim("198.51.100.7");
    now = 3_600_000;
    expect(await guard.tryClaim("198.51.100.7")).toBe(true);
  });

  it("admits exactly one of many concurrent claims by one identity", async () => {
    const guard = new MemoryClaimGuard(3600, () => 0);
    const results = await Promise.all(Array.from({ length: 10 }, () => guard.tryClaim("203.0.113.5")));

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it("admits distinct identities concurrently", async () => {
    const guard = new MemoryClaimGuard(3600, () => 0);
    const results = await Promise.all(
      ["203.0.113.1", "203.0.113.2", "203.0.113.3"].map((id) => guard.tryClaim(id)),
    );

    expect(results).toEqual([true, true, true]);
  });
});
