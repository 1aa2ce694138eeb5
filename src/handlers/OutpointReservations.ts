import type { UnspentOutput } from "../types/index.js";
import type { Clock } from "./ClaimGuard.js";
import { outpointKey } from "./selector.js";

export const DEFAULT_RESERVATION_TTL_SECONDS = 120;

/**
 * Outpoints spent by this faucet's own submitted transactions.
 *
 * The node's UTXO view can lag behind a submission, so a just-spent output
 * may still be listed on the next fetch. Reserved outpoints are filtered out
 * before selection until the node stops reporting them or the TTL passes.
 */
class OutpointReservations {
  private reserved: Map<string, number>;
  private readonly ttlMs: number;
  private readonly now: Clock;

  constructor(ttlSeconds: number = DEFAULT_RESERVATION_TTL_SECONDS, now: Clock = Date.now) {
    this.reserved = new Map();
    this.ttlMs = ttlSeconds * 1000;
    this.now = now;
  }

  reserve(utxos: readonly UnspentOutput[]): void {
    const expiresAt = this.now() + this.ttlMs;
    for (const utxo of utxos) {
      this.reserved.set(outpointKey(utxo), expiresAt);
    }
  }

  has(utxo: UnspentOutput): boolean {
    const expiresAt = this.reserved.get(outpointKey(utxo));
    if (expiresAt === undefined) return false;
    if (expiresAt <= this.now()) {
      this.reserved.delete(outpointKey(utxo));
      return false;
    }
    return true;
  }

  /**
   * Drops reservations the node no longer reports (their spend is visible),
   * then returns the node's outputs minus the still-reserved ones, order kept.
   */
  reconcile(fromNode: readonly UnspentOutput[]): UnspentOutput[] {
    const reported = new Set(fromNode.map(outpointKey));
    for (const key of this.reserved.keys()) {
      if (!reported.has(key)) {
        this.reserved.delete(key);
      }
    }
    return fromNode.filter((utxo) => !this.has(utxo));
  }

  get size(): number {
    return this.reserved.size;
  }
}

export default OutpointReservations;
