import type { PendingTransaction, SignedTransaction, UnspentOutput } from "./index.js";
import type { PrivateKeyMaterial } from "../utils/privateKey.js";

/**
 * Read/submit access to a Kaspa node.
 *
 * `getUtxos` must return outputs in the node's own order: the selector is
 * first-fit over that order and never re-sorts it.
 */
export interface NodeClient {
  getUtxos(address: string, signal?: AbortSignal): Promise<UnspentOutput[]>;
  getBalance(address: string, signal?: AbortSignal): Promise<bigint>;
  submit(tx: SignedTransaction, signal?: AbortSignal): Promise<string>;
  /** Network id the node runs on, e.g. `testnet-12` or `mainnet`. */
  getNetwork(signal?: AbortSignal): Promise<string>;
}

export interface TransactionSigner {
  /** Throws a `FaucetError` with code `SIGNING_FAILED`. */
  sign(tx: PendingTransaction, privateKey: PrivateKeyMaterial): Promise<SignedTransaction>;
}

export interface AddressCodec {
  isValid(address: string): boolean;
}

export interface ClaimGuard {
  /** Atomic check-and-set: true admits the claim and starts the cooldown. */
  tryClaim(identity: string): Promise<boolean>;
}
