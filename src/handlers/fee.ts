export const DEFAULT_FEE_PER_INPUT_SOMPI = 2_000n;

export type FeeModel = (inputCount: number) => bigint;

/**
 * Fixed linear fee: one `feePerInput` per input plus one more, which leaves
 * headroom for a change output.
 */
export const createFeeModel = (feePerInput: bigint = DEFAULT_FEE_PER_INPUT_SOMPI): FeeModel => {
  return (inputCount: number): bigint => BigInt(inputCount + 1) * feePerInput;
};
