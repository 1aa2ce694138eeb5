import type { PendingTransaction, TxOutput, UnspentOutput } from "../types/index.js";

export const DEFAULT_DUST_THRESHOLD_SOMPI = 1_000n;

export interface AssembleParams {
  inputs: readonly UnspentOutput[];
  fee: bigint;
  totalIn: bigint;
  amount: bigint;
  destination: string;
  changeAddress: string;
  dustThreshold?: bigint;
}

/**
 * Builds the unsigned transaction for an already validated selection.
 *
 * Output order is fixed: destination first, change second. Change below the
 * dust threshold is not created; it stays in the fee.
 */
export const assembleTransaction = ({
  inputs,
  fee,
  totalIn,
  amount,
  destination,
  changeAddress,
  dustThreshold = DEFAULT_DUST_THRESHOLD_SOMPI,
}: AssembleParams): PendingTransaction => {
  const residual = totalIn - amount - fee;
  const change = residual >= dustThreshold ? residual : 0n;

  const outputs: TxOutput[] = [{ address: destination, amount }];
  if (change > 0n) {
    outputs.push({ address: changeAddress, amount: change });
  }

  return {
    inputs: inputs.map((utxo, position) => ({
      utxo,
      signatureScript: "",
      sequence: BigInt(position),
      sigOpCount: 1,
    })),
    outputs,
    fee: totalIn - amount - change,
    change,
  };
};
