import { describe, expect, it } from "vitest";
import OutpointReservations from "../../src/handlers/OutpointReservations.js";
import { utxo } from "../fixtures.js";

describe("OutpointReservations", () => {
  const a = utxo("a", 500_000_000n);
  const b = utxo("b", 400_000_000n);
  const c = utxo("c", 300_000_000n);

  it("filters reserved outpoints and keeps node order", () => {
    const reservations = new OutpointReservations(120, () => 0);
    reservations.reserve([b]);

    expect(reservations.reconcile([a, b, c])).toEqual([a, c]);
    expect(reservations.size).toBe(1);
  });

  it("drops a reservation once the node stops reporting the outpoint", () => {
    const reservations = new OutpointReservations(120, () => 0);
    reservations.reserve([a]);

    expect(reservations.reconcile([b])).toEqual([b]);
    expect(reservations.size).toBe(0);
    expect(reservations.reconcile([a, b])).toEqual([a, b]);
  });

  it("releases reservations after the ttl", () => {
    let now = 0;
    const reservations = new OutpointReservations(120, () => now);
    reservations.reserve([a]);

    now = 119_999;
    expect(reservations.has(a)).toBe(true);
    now = 120_000;
    expect(reservations.has(a)).toBe(false);
    expect(reservations.reconcile([a])).toEqual([a]);
  });
});
