// kaspa-wasm bindings: key → address derivation, address validation, and
// Schnorr signing of assembled transactions.
//
// The WASM module is loaded lazily and only the members used here are
// checked, so minor kaspa-wasm releases that move other exports still load.

import type {
  AddressCodec,
  PendingTransaction,
  SignedTransaction,
  TransactionSigner,
  WireTransaction,
  WireTransactionInput,
  WireTransactionOutput,
} from "../types/index.js";
import { FaucetError } from "../handlers/errors.js";
import { networkPrefix, type KaspaNetwork } from "../utils/helperFunctions.js";
import type { PrivateKeyMaterial } from "../utils/privateKey.js";

const NATIVE_SUBNETWORK_ID = "0000000000000000000000000000000000000000";

export interface SdkPrivateKey {
  toAddress(network: string): { toString(): string };
}

export interface SdkUtxoEntry {
  address: string;
  outpoint: { transactionId: string; index: number };
  amount: bigint;
  scriptPublicKey: { version: number; scriptPublicKey: string };
  blockDaaScore: bigint;
  isCoinbase: boolean;
}

export interface SdkPaymentOutput {
  address: string;
  amount: bigint;
}

/** The part of kaspa-wasm this faucet calls. */
export interface KaspaSdk {
  PrivateKey: new (hex: string) => SdkPrivateKey;
  Address: { validate(address: string): boolean };
  createTransaction(entries: SdkUtxoEntry[], outputs: SdkPaymentOutput[], priorityFee: bigint): unknown;
  signTransaction(tx: unknown, signers: SdkPrivateKey[], verifySig: boolean): unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  (typeof value === "object" || typeof value === "function") && value !== null;

export function isKaspaSdk(value: unknown): value is KaspaSdk {
  return (
    isRecord(value) &&
    typeof value.PrivateKey === "function" &&
    isRecord(value.Address) &&
    typeof value.Address.validate === "function" &&
    typeof value.createTransaction === "function" &&
    typeof value.signTransaction === "function"
  );
}

export async function loadKaspaSdk(): Promise<KaspaSdk> {
  let mod: unknown;
  try {
    mod = await import("kaspa-wasm");
  } catch (error) {
    throw new FaucetError({
      message: `kaspa-wasm could not be loaded: ${error instanceof Error ? error.message : String(error)}`,
      code: "SDK_UNAVAILABLE",
      cause: error,
    });
  }

  if (isKaspaSdk(mod)) return mod;
  // CommonJS build loaded through ESM interop.
  if (isRecord(mod) && isKaspaSdk(mod.default)) return mod.default;

  throw new FaucetError({
    message: "kaspa-wasm is missing PrivateKey, Address, createTransaction or signTransaction",
    code: "SDK_UNAVAILABLE",
  });
}

/** Receive address of the key on the network. */
export function faucetAddressOf(sdk: KaspaSdk, key: PrivateKeyMaterial, network: KaspaNetwork): string {
  return new sdk.PrivateKey(key.toHex()).toAddress(network).toString();
}

export class KaspaAddressCodec implements AddressCodec {
  private readonly prefix: string;

  constructor(
    private readonly sdk: KaspaSdk,
    network: KaspaNetwork,
  ) {
    this.prefix = `${networkPrefix(network)}:`;
  }

  /** Well-formed address with the checksum intact and this network's prefix. */
  isValid(address: string): boolean {
    if (!address.startsWith(this.prefix)) return false;
    try {
      return this.sdk.Address.validate(address);
    } catch {
      return false;
    }
  }
}

const readBigInt = (value: unknown, fallback: bigint): bigint => {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return fallback;
};

const malformed = (detail: string): FaucetError =>
  new FaucetError({ message: `Signed transaction is malformed: ${detail}`, code: "SIGNING_FAILED" });

function toWireInput(raw: unknown, position: number): WireTransactionInput {
  if (!isRecord(raw)) throw malformed(`input ${position} is not an object`);
  const { previousOutpoint, signatureScript } = raw;
  if (!isRecord(previousOutpoint) || typeof previousOutpoint.transactionId !== "string") {
    throw malformed(`input ${position} has no previous outpoint`);
  }
  if (typeof signatureScript !== "string" || signatureScript === "") {
    throw malformed(`input ${position} is unsigned`);
  }
  return {
    previousOutpoint: {
      transactionId: previousOutpoint.transactionId,
      index: Number(readBigInt(previousOutpoint.index, 0n)),
    },
    signatureScript,
    sequence: readBigInt(raw.sequence, BigInt(position)),
    sigOpCount: typeof raw.sigOpCount === "number" ? raw.sigOpCount : 1,
  };
}

function toWireOutput(raw: unknown, position: number): WireTransactionOutput {
  if (!isRecord(raw)) throw malformed(`output ${position} is not an object`);
  const script = raw.scriptPublicKey;
  if (!isRecord(script)) throw malformed(`output ${position} has no script`);
  const hex = typeof script.script === "string" ? script.script : script.scriptPublicKey;
  if (typeof hex !== "string") throw malformed(`output ${position} script is not hex`);
  return {
    amount: readBigInt(raw.value ?? raw.amount, -1n),
    scriptPublicKey: {
      version: typeof script.version === "number" ? script.version : 0,
      scriptPublicKey: hex,
    },
  };
}

/** Reads the REST body out of a signed kaspa-wasm `Transaction`. */
export function toWireTransaction(signed: unknown): SignedTransaction {
  if (!isRecord(signed)) throw malformed("not an object");
  const { id, inputs, outputs } = signed;
  if (typeof id !== "string" || id === "") throw malformed("missing transaction id");
  if (!Array.isArray(inputs) || !Array.isArray(outputs)) throw malformed("missing inputs or outputs");

  const transaction: WireTransaction = {
    version: typeof signed.version === "number" ? signed.version : 0,
    inputs: inputs.map(toWireInput),
    outputs: outputs.map(toWireOutput),
    lockTime: readBigInt(signed.lockTime, 0n),
    subnetworkId: typeof signed.subnetworkId === "string" ? signed.subnetworkId : NATIVE_SUBNETWORK_ID,
  };

  if (transaction.outputs.some((output) => output.amount < 0n)) {
    throw malformed("output amount missing");
  }

  return { transactionId: id, transaction };
}

/**
 * Signs every input with the faucet key. The transaction is built from the
 * assembled inputs and outputs as they are; the fee passed to kaspa-wasm is
 * the effective fee, so no change output is added on top.
 */
export class KaspaWasmSigner implements TransactionSigner {
  constructor(private readonly sdk: KaspaSdk) {}

  async sign(tx: PendingTransaction, privateKey: PrivateKeyMaterial): Promise<SignedTransaction> {
    try {
      const entries: SdkUtxoEntry[] = tx.inputs.map(({ utxo }) => ({
        address: utxo.address,
        outpoint: { transactionId: utxo.outpoint.transactionId, index: utxo.outpoint.index },
        amount: utxo.amount,
        scriptPublicKey: { version: utxo.scriptPublicKey.version, scriptPublicKey: utxo.scriptPublicKey.script },
        blockDaaScore: utxo.blockDaaScore,
        isCoinbase: utxo.isCoinbase,
      }));
      const outputs: SdkPaymentOutput[] = tx.outputs.map(({ address, amount }) => ({ address, amount }));

      const unsigned = this.sdk.createTransaction(entries, outputs, tx.fee);
      const key = new this.sdk.PrivateKey(privateKey.toHex());
      return toWireTransaction(this.sdk.signTransaction(unsigned, [key], true));
    } catch (error) {
      if (error instanceof FaucetError) throw error;
      throw new FaucetError({
        message: `Signing failed: ${error instanceof Error ? error.message : String(error)}`,
        code: "SIGNING_FAILED",
        cause: error,
      });
    }
  }
}
