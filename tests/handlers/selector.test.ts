import { describe, expect, it } from "vitest";
import { createFeeModel } from "../../src/handlers/fee.js";
import { outpointKey, selectUtxos } from "../../src/handlers/selector.js";
import { utxo } from "../fixtures.js";

const fee = createFeeModel();

describe("selectUtxos", () => {
  it("takes the first output when it covers amount and fee", () => {
    const available = [utxo("a", 500_000_000n), utxo("b", 400_000_000n)];
    const result = selectUtxos(available, 100_000_000n, fee);

    expect(result).toEqual({
      success: true,
      inputs: [available[0]],
      fee: 4_000n,
      totalIn: 500_000_000n,
    });
  });

  it("returns the shortest covering prefix in node order", () => {
    const available = [utxo("a", 50_000_000n), utxo("b", 30_000_000n), utxo("c", 40_000_000n)];
    const result = selectUtxos(available, 70_000_000n, fee);

    if (!result.success) throw new Error("expected a selection");
    expect(result.inputs.map(outpointKey)).toEqual(["a:0", "b:0"]);
    expect(result.fee).toBe(6_000n);
    expect(result.totalIn).toBe(80_000_000n);
  });

  it("does not skip ahead to a larger output", () => {
    const available = [utxo("small", 1_000n), utxo("big", 900_000_000n)];
    const result = selectUtxos(available, 100_000_000n, fee);

    if (!result.success) throw new Error("expected a selection");
    expect(result.inputs.map(outpointKey)).toEqual(["small:0", "big:0"]);
    expect(result.fee).toBe(6_000n);
  });

  it("accepts an exact cover", () => {
    const result = selectUtxos([utxo("a", 100_004_000n)], 100_000_000n, fee);
    expect(result.success).toBe(true);
  });

  it("reports have and need for an empty wallet", () => {
    expect(selectUtxos([], 100_000_000n, fee)).toEqual({
      success: false,
      error: { have: 0n, need: 100_002_000n },
    });
  });

  it("reports the fee for every input when all of them fall short", () => {
    const result = selectUtxos([utxo("a", 1_000n), utxo("b", 2_000n)], 5_000n, fee);
    expect(result).toEqual({ success: false, error: { have: 3_000n, need: 11_000n } });
  });

  it("keys outpoints by transaction id and index", () => {
    expect(outpointKey(utxo("deadbeef", 1n, 3))).toBe("deadbeef:3");
  });
});
