import type {
  AddressCodec,
  NodeClient,
  PendingTransaction,
  SignedTransaction,
  TransactionSigner,
  UnspentOutput,
} from "../src/types/index.js";
import type { PrivateKeyMaterial } from "../src/utils/privateKey.js";

export const FAUCET_ADDRESS = "kaspatest:qfaucet0000000000000000000000000000000000000000000000000";
export const DESTINATION = "kaspatest:qdestination00000000000000000000000000000000000000000000";

export const utxo = (transactionId: string, amount: bigint, index = 0): UnspentOutput => ({
  outpoint: { transactionId, index },
  address: FAUCET_ADDRESS,
  amount,
  scriptPublicKey: { version: 0, script: "20aa" },
  blockDaaScore: 1n,
  isCoinbase: false,
});

/** Node whose UTXO view never changes unless the test replaces it. */
export class FakeNode implements NodeClient {
  utxos: UnspentOutput[];
  balance = 0n;
  network = "testnet-12";
  submitted: SignedTransaction[] = [];
  utxoCalls = 0;
  getUtxosImpl?: () => Promise<UnspentOutput[]>;
  submitImpl?: (tx: SignedTransaction) => Promise<string>;

  constructor(utxos: UnspentOutput[] = []) {
    this.utxos = utxos;
  }

  async getUtxos(): Promise<UnspentOutput[]> {
    this.utxoCalls += 1;
    if (this.getUtxosImpl) return this.getUtxosImpl();
    return [...this.utxos];
  }

  async getBalance(): Promise<bigint> {
    return this.balance;
  }

  async getNetwork(): Promise<string> {
    return this.network;
  }

  async submit(tx: SignedTransaction): Promise<string> {
    if (this.submitImpl) return this.submitImpl(tx);
    this.submitted.push(tx);
    return tx.transactionId;
  }
}

/** Transaction id is the joined list of spent outpoints. */
export class FakeSigner implements TransactionSigner {
  signImpl?: (tx: PendingTransaction) => Promise<void>;

  async sign(tx: PendingTransaction, _privateKey: PrivateKeyMaterial): Promise<SignedTransaction> {
    if (this.signImpl) await this.signImpl(tx);
    const spent = tx.inputs.map(({ utxo: u }) => `${u.outpoint.transactionId}:${u.outpoint.index}`);
    return {
      transactionId: `tx(${spent.join(",")})`,
      transaction: {
        version: 0,
        inputs: tx.inputs.map(({ utxo: u, sequence, sigOpCount }) => ({
          previousOutpoint: u.outpoint,
          signatureScript: "41ff",
          sequence,
          sigOpCount,
        })),
        outputs: tx.outputs.map(({ amount }) => ({
          amount,
          scriptPublicKey: { version: 0, scriptPublicKey: "20bb" },
        })),
        lockTime: 0n,
        subnetworkId: "0000000000000000000000000000000000000000",
      },
    };
  }
}

export class PrefixAddresses implements AddressCodec {
  isValid(address: string): boolean {
    return address.startsWith("kaspatest:") && address.length > "kaspatest:".length;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export const deferred = (): Deferred => {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
};
