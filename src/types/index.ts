// All amounts are sompi (bigint). 1 KAS = 100_000_000 sompi.

import type { PrivateKeyMaterial } from "../utils/privateKey.js";

export type {
  ClaimRequest,
  ClaimState,
  ClaimFailure,
  ClaimOutcome,
  ClaimSuccess,
  FaucetStatus,
} from "./claim.js";

export type {
  NodeClient,
  TransactionSigner,
  AddressCodec,
  ClaimGuard,
} from "./capabilities.js";

export interface Outpoint {
  transactionId: string;
  index: number;
}

export interface ScriptPublicKey {
  version: number;
  script: string; // hex
}

export interface UnspentOutput {
  outpoint: Outpoint;
  address: string;
  amount: bigint;
  /** Locking script of the output. */
  scriptPublicKey: ScriptPublicKey;
  blockDaaScore: bigint;
  isCoinbase: boolean;
}

export interface TxOutput {
  address: string;
  amount: bigint;
}

export interface TransactionInput {
  utxo: UnspentOutput;
  /** Empty until signed. */
  signatureScript: string;
  sequence: bigint;
  sigOpCount: number;
}

/**
 * Unsigned spend built from one selection. Never persisted: it is signed,
 * submitted and dropped within a single wallet queue slot.
 */
export interface PendingTransaction {
  inputs: TransactionInput[];
  /** Destination first, change (if any) second. */
  outputs: TxOutput[];
  /** Effective fee, including any dust residual folded into it. */
  fee: bigint;
  change: bigint;
}

export interface WireTransactionInput {
  previousOutpoint: Outpoint;
  signatureScript: string;
  sequence: bigint;
  sigOpCount: number;
}

export interface WireTransactionOutput {
  amount: bigint;
  scriptPublicKey: { version: number; scriptPublicKey: string };
}

/** Kaspa REST API transaction body (`POST /transactions`). */
export interface WireTransaction {
  version: number;
  inputs: WireTransactionInput[];
  outputs: WireTransactionOutput[];
  lockTime: bigint;
  subnetworkId: string;
}

export interface SignedTransaction {
  transactionId: string;
  transaction: WireTransaction;
}

export interface FaucetWallet {
  address: string;
  privateKey: PrivateKeyMaterial;
  amountPerClaim: bigint;
  claimIntervalSeconds: number;
}
