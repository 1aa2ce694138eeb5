import { createClient } from "redis";
import { log } from "./log.js";
import type { ClaimGuard } from "../types/index.js";
import type { Clock } from "./ClaimGuard.js";

/** The one Redis command the guard needs. */
export interface ClaimStore {
  set(key: string, value: string, options: { NX: true; PX: number }): Promise<unknown>;
}

export interface RedisClaimStore {
  store: ClaimStore;
  disconnect: () => Promise<void>;
}

const KEY_PREFIX = "faucet:claim:";

/**
 * Cooldown shared by every faucet process pointed at the same Redis.
 *
 * `SET key now NX PX cooldown` is the whole check-and-set: Redis only writes
 * the key if no unexpired claim exists, and the key expires with the cooldown.
 */
export class RedisClaimGuard implements ClaimGuard {
  private readonly store: ClaimStore;
  private readonly cooldownMs: number;
  private readonly now: Clock;

  constructor(store: ClaimStore, cooldownSeconds: number, now: Clock = Date.now) {
    this.store = store;
    this.cooldownMs = cooldownSeconds * 1000;
    this.now = now;
  }

  async tryClaim(identity: string): Promise<boolean> {
    try {
      const reply = await this.store.set(`${KEY_PREFIX}${identity}`, String(this.now()), {
        NX: true,
        PX: this.cooldownMs,
      });
      return reply !== null;
    } catch (error) {
      log(`Redis claim check failed for ${identity}: ${error}`, "err");
      throw error;
    }
  }
}

export async function connectRedisClaimStore(url: string): Promise<RedisClaimStore> {
  const client = createClient({ url });

  client.on("error", (err) => {
    log(`Redis Client Error: ${err}`, "err");
  });

  client.on("connect", () => {
    log("Connected to Redis", "info");
  });

  client.on("end", () => {
    log("Disconnected from Redis", "warn");
  });

  try {
    await client.connect();
  } catch (error) {
    log(`Failed to connect to Redis: ${error}`, "err");
    throw error;
  }

  return {
    store: {
      set: (key, value, options) => client.set(key, value, options),
    },
    disconnect: async () => {
      if (client.isOpen) {
        await client.quit();
      }
    },
  };
}
