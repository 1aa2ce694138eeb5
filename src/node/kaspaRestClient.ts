// Kaspa REST API adapter (kaspa-rest-server in front of a kaspad node).
// Amounts arrive as decimal strings or numbers and are parsed to bigint sompi.

import type { NodeClient, SignedTransaction, UnspentOutput } from "../types/index.js";
import { FaucetError } from "../handlers/errors.js";
import { stringifyWithBigInt } from "../utils/helperFunctions.js";

export interface KaspaRestClientOptions {
  baseUrl: string;
  timeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toBigInt = (value: unknown, field: string): bigint => {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  throw invalidResponse(`${field} is not a non-negative integer`);
};

const invalidResponse = (detail: string): FaucetError =>
  new FaucetError({ message: `Invalid node response: ${detail}`, code: "NODE_RESPONSE_INVALID" });

function parseUtxo(raw: unknown, position: number): UnspentOutput {
  const where = `utxos[${position}]`;
  if (!isRecord(raw)) throw invalidResponse(`${where} is not an object`);

  const { address, outpoint, utxoEntry } = raw;
  if (!isRecord(outpoint) || typeof outpoint.transactionId !== "string") {
    throw invalidResponse(`${where}.outpoint is malformed`);
  }
  if (!isRecord(utxoEntry)) throw invalidResponse(`${where}.utxoEntry is missing`);

  const script = utxoEntry.scriptPublicKey;
  if (!isRecord(script) || typeof script.scriptPublicKey !== "string") {
    throw invalidResponse(`${where}.utxoEntry.scriptPublicKey is malformed`);
  }

  return {
    outpoint: {
      transactionId: outpoint.transactionId,
      index: Number(toBigInt(outpoint.index ?? 0, `${where}.outpoint.index`)),
    },
    address: typeof address === "string" ? address : "",
    amount: toBigInt(utxoEntry.amount, `${where}.utxoEntry.amount`),
    scriptPublicKey: {
      version: typeof script.version === "number" ? script.version : 0,
      script: script.scriptPublicKey,
    },
    blockDaaScore: toBigInt(utxoEntry.blockDaaScore ?? 0, `${where}.utxoEntry.blockDaaScore`),
    isCoinbase: utxoEntry.isCoinbase === true,
  };
}

/**
 * `NodeClient` over the Kaspa REST API.
 *
 * Every request is bounded by `timeoutMs` and by the caller's signal, if any.
 * UTXOs are returned in response order.
 */
export class KaspaRestClient implements NodeClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: KaspaRestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async getUtxos(address: string, signal?: AbortSignal): Promise<UnspentOutput[]> {
    const data = await this.request(`/addresses/${encodeURIComponent(address)}/utxos`, {}, signal);
    if (!Array.isArray(data)) throw invalidResponse("utxo list is not an array");
    return data.map(parseUtxo);
  }

  async getBalance(address: string, signal?: AbortSignal): Promise<bigint> {
    const data = await this.request(`/addresses/${encodeURIComponent(address)}/balance`, {}, signal);
    if (!isRecord(data)) throw invalidResponse("balance body is not an object");
    return toBigInt(data.balance ?? 0, "balance");
  }

  /** `networkName` arrives as `kaspa-testnet-12`; the `kaspa-` prefix is dropped. */
  async getNetwork(signal?: AbortSignal): Promise<string> {
    const data = await this.request("/info/network", {}, signal);
    if (!isRecord(data)) throw invalidResponse("network body is not an object");
    const name = data.networkName ?? data.networkId;
    if (typeof name !== "string" || name === "") throw invalidResponse("networkName is missing");
    return name.replace(/^kaspa-/, "");
  }

  async submit(tx: SignedTransaction, signal?: AbortSignal): Promise<string> {
    let data: unknown;
    try {
      data = await this.request(
        "/transactions",
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: stringifyWithBigInt({ transaction: tx.transaction, allowOrphan: false }),
        },
        signal,
      );
    } catch (error) {
      if (error instanceof FaucetError && error.code === "NODE_TIMEOUT") {
        throw new FaucetError({
          message: error.message,
          code: "SUBMISSION_TIMEOUT",
          retryable: true,
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FaucetError({
        message: `Transaction rejected: ${message}`,
        code: "SUBMISSION_FAILED",
        status: error instanceof FaucetError ? error.status : undefined,
        cause: error,
      });
    }

    if (isRecord(data)) {
      if (typeof data.error === "string" && data.error) {
        throw new FaucetError({ message: `Transaction rejected: ${data.error}`, code: "SUBMISSION_FAILED" });
      }
      const txId = data.transactionId ?? data.txid;
      if (typeof txId === "string" && txId) return txId;
    }

    // The REST server answers without an id when the node accepted an
    // already-known transaction; the locally computed id is the same.
    return tx.transactionId;
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });

      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw new FaucetError({
          message: `HTTP ${res.status}: ${body.slice(0, 160)}`,
          code: "NODE_UNAVAILABLE",
          retryable: res.status >= 500 || res.status === 429,
          status: res.status,
        });
      }

      return await res.json();
    } catch (error) {
      if (error instanceof FaucetError) throw error;
      if (controller.signal.aborted) {
        throw new FaucetError({
          message: `Node request ${path} timed out or was aborted`,
          code: "NODE_TIMEOUT",
          retryable: true,
          cause: error,
        });
      }
      throw new FaucetError({
        message: `Node request ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        code: "NODE_UNAVAILABLE",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
