import { describe, expect, it } from "vitest";
import { RedisClaimGuard, type ClaimStore } from "../../src/handlers/RedisClaimGuard.js";

/** SET NX PX over a map, expiring against the test clock. */
class FakeRedis implements ClaimStore {
  readonly entries = new Map<string, { value: string; expiresAt: number }>();
  readonly calls: Array<{ key: string; value: string; PX: number }> = [];

  constructor(private readonly now: () => number) {}

  async set(key: string, value: string, options: { NX: true; PX: number }): Promise<string | null> {
    this.calls.push({ key, value, PX: options.PX });
    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > this.now()) return null;
    this.entries.set(key, { value, expiresAt: this.now() + options.PX });
    return "OK";
  }
}

describe("RedisClaimGuard", () => {
  it("writes one namespaced key per claim with the cooldown as expiry", async () => {
    const redis = new FakeRedis(() => 42);
    const guard = new RedisClaimGuard(redis, 3600, () => 42);

    expect(await guard.tryClaim("203.0.113.5")).toBe(true);
    expect(redis.calls).toEqual([{ key: "faucet:claim:203.0.113.5", value: "42", PX: 3_600_000 }]);
  });

  it("rejects until the key expires", async () => {
    let now = 0;
    const redis = new FakeRedis(() => now);
    const guard = new RedisClaimGuard(redis, 3600, () => now);

    expect(await guard.tryClaim("203.0.113.5")).toBe(true);
    now = 1_800_000;
    expect(await guard.tryClaim("203.0.113.5")).toBe(false);
    now = 3_601_000;
    expect(await guard.tryClaim("203.0.113.5")).toBe(true);
  });

  it("shares the cooldown between guards on the same store", async () => {
    const redis = new FakeRedis(() => 0);
    const first = new RedisClaimGuard(redis, 3600, () => 0);
    const second = new RedisClaimGuard(redis, 3600, () => 0);

    expect(await first.tryClaim("203.0.113.5")).toBe(true);
    expect(await second.tryClaim("203.0.113.5")).toBe(false);
    expect(await second.tryClaim("203.0.113.6")).toBe(true);
  });

  it("propagates store errors", async () => {
    const broken: ClaimStore = {
      set: async () => {
        throw new Error("connection lost");
      },
    };
    const guard = new RedisClaimGuard(broken, 3600);

    await expect(guard.tryClaim("203.0.113.5")).rejects.toThrow("connection lost");
  });
});
