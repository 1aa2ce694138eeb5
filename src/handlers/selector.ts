import type { UnspentOutput } from "../types/index.js";
import type { FeeModel } from "./fee.js";

export interface InsufficientFunds {
  have: bigint;
  need: bigint;
}

export type SelectionResult =
  | { success: true; inputs: UnspentOutput[]; fee: bigint; totalIn: bigint }
  | { success: false; error: InsufficientFunds };

export const outpointKey = (utxo: UnspentOutput): string =>
  `${utxo.outpoint.transactionId}:${utxo.outpoint.index}`;

/**
 * First-fit selection over `available` in the order given.
 *
 * The order is whatever the node returned, unsorted. The result is the
 * shortest prefix of that order that covers `amount + fee(prefix.length)`.
 */
export const selectUtxos = (
  available: readonly UnspentOutput[],
  amount: bigint,
  fee: FeeModel,
): SelectionResult => {
  const inputs: UnspentOutput[] = [];
  let totalIn = 0n;

  for (const utxo of available) {
    inputs.push(utxo);
    totalIn += utxo.amount;

    const required = fee(inputs.length);
    if (totalIn >= amount + required) {
      return { success: true, inputs, fee: required, totalIn };
    }
  }

  return {
    success: false,
    error: { have: totalIn, need: amount + fee(inputs.length) },
  };
};
