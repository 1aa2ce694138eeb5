import type { ClaimGuard } from "../types/index.js";

export type Clock = () => number;

/**
 * Per-identity cooldown kept in process memory.
 *
 * Entries are never deleted; the map grows with the number of distinct
 * identities seen during the process lifetime.
 */
export class MemoryClaimGuard implements ClaimGuard {
  private claims: Map<string, number>;
  private readonly cooldownMs: number;
  private readonly now: Clock;

  constructor(cooldownSeconds: number, now: Clock = Date.now) {
    this.claims = new Map();
    this.cooldownMs = cooldownSeconds * 1000;
    this.now = now;
  }

  // No await between the read and the write: the check-and-set cannot
  // interleave with another call on the event loop.
  async tryClaim(identity: string): Promise<boolean> {
    const now = this.now();
    const last = this.claims.get(identity);

    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }

    this.claims.set(identity, now);
    return true;
  }
}
