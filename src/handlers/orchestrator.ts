import type {
  AddressCodec,
  ClaimFailure,
  ClaimGuard,
  ClaimOutcome,
  ClaimRequest,
  ClaimState,
  FaucetStatus,
  FaucetWallet,
  NodeClient,
  SignedTransaction,
  TransactionSigner,
  UnspentOutput,
} from "../types/index.js";
import { assembleTransaction, DEFAULT_DUST_THRESHOLD_SOMPI } from "./assembler.js";
import { FaucetError, isTimeoutError, type FaucetErrorCode } from "./errors.js";
import { createFeeModel, type FeeModel } from "./fee.js";
import { describeError, log } from "./log.js";
import OutpointReservations from "./OutpointReservations.js";
import { selectUtxos } from "./selector.js";
import { WalletQueue } from "./WalletQueue.js";

export const DEFAULT_NODE_TIMEOUT_MS = 10_000;

export interface ClaimOrchestratorDeps {
  wallet: FaucetWallet;
  node: NodeClient;
  signer: TransactionSigner;
  addresses: AddressCodec;
  guard: ClaimGuard;
  queue?: WalletQueue;
  reservations?: OutpointReservations;
  fee?: FeeModel;
  dustThreshold?: bigint;
  nodeTimeoutMs?: number;
  onTransition?: (state: ClaimState, request: ClaimRequest) => void;
}

/**
 * Runs a claim from request to broadcast.
 *
 * Address validation and the cooldown guard run outside the wallet queue and
 * never touch funds. Everything from the UTXO fetch to the submission runs
 * inside one wallet queue task, so two admitted claims cannot select the same
 * output. Failures end the claim; nothing is retried here.
 */
export class ClaimOrchestrator {
  private readonly wallet: FaucetWallet;
  private readonly node: NodeClient;
  private readonly signer: TransactionSigner;
  private readonly addresses: AddressCodec;
  private readonly guard: ClaimGuard;
  private readonly queue: WalletQueue;
  private readonly reservations: OutpointReservations;
  private readonly fee: FeeModel;
  private readonly dustThreshold: bigint;
  private readonly nodeTimeoutMs: number;
  private readonly onTransition?: (state: ClaimState, request: ClaimRequest) => void;

  constructor(deps: ClaimOrchestratorDeps) {
    this.wallet = deps.wallet;
    this.node = deps.node;
    this.signer = deps.signer;
    this.addresses = deps.addresses;
    this.guard = deps.guard;
    this.queue = deps.queue ?? new WalletQueue();
    this.reservations = deps.reservations ?? new OutpointReservations();
    this.fee = deps.fee ?? createFeeModel();
    this.dustThreshold = deps.dustThreshold ?? DEFAULT_DUST_THRESHOLD_SOMPI;
    this.nodeTimeoutMs = deps.nodeTimeoutMs ?? DEFAULT_NODE_TIMEOUT_MS;
    this.onTransition = deps.onTransition;
  }

  get amountPerClaim(): bigint {
    return this.wallet.amountPerClaim;
  }

  get queueStats() {
    return this.queue.getStats();
  }

  /**
   * `signal` only matters until the wallet queue picks the claim up: an
   * attempt that already holds the wallet always runs to completion.
   */
  async claim(request: ClaimRequest, signal?: AbortSignal): Promise<ClaimOutcome> {
    this.transition("Received", request);
    log(`Claim request from ${request.identity} to ${request.destinationAddress}`, "info");

    if (!this.addresses.isValid(request.destinationAddress)) {
      return this.fail(request, { reason: "InvalidAddress" });
    }
    this.transition("AddressValidated", request);

    if (!(await this.guard.tryClaim(request.identity))) {
      return this.fail(request, { reason: "RateLimited" });
    }
    this.transition("GuardChecked", request);

    return this.queue.run(async () => {
      if (signal?.aborted) {
        return this.fail(request, { reason: "Cancelled" });
      }
      return this.spend(request);
    });
  }

  async status(): Promise<FaucetStatus> {
    const balance = await this.withDeadline(
      (signal) => this.node.getBalance(this.wallet.address, signal),
      "Balance query",
      "NODE_TIMEOUT",
    );

    return {
      active: true,
      faucetAddress: this.wallet.address,
      balance,
      nextClaimSeconds: this.wallet.claimIntervalSeconds,
    };
  }

  private async spend(request: ClaimRequest): Promise<ClaimOutcome> {
    this.transition("WalletLockAcquired", request);

    let fromNode: UnspentOutput[];
    try {
      fromNode = await this.withDeadline(
        (signal) => this.node.getUtxos(this.wallet.address, signal),
        "UTXO fetch",
        "NODE_TIMEOUT",
      );
    } catch (error) {
      return this.fail(request, { reason: "NodeUnavailable", message: describeError(error) });
    }
    this.transition("UtxosFetched", request);

    const spendable = this.reservations.reconcile(fromNode);
    const selection = selectUtxos(spendable, request.requestedAmount, this.fee);
    if (!selection.success) {
      return this.fail(request, {
        reason: "InsufficientFunds",
        have: selection.error.have,
        need: selection.error.need,
      });
    }
    this.transition("Selected", request);

    const pending = assembleTransaction({
      inputs: selection.inputs,
      fee: selection.fee,
      totalIn: selection.totalIn,
      amount: request.requestedAmount,
      destination: request.destinationAddress,
      changeAddress: this.wallet.address,
      dustThreshold: this.dustThreshold,
    });
    this.transition("Assembled", request);

    let signed: SignedTransaction;
    try {
      signed = await this.signer.sign(pending, this.wallet.privateKey);
    } catch (error) {
      return this.fail(request, { reason: "SigningFailure", message: describeError(error) });
    }
    this.transition("Signed", request);

    let transactionId: string;
    try {
      transactionId = await this.withDeadline(
        (signal) => this.node.submit(signed, signal),
        "Transaction submission",
        "SUBMISSION_TIMEOUT",
      );
    } catch (error) {
      // A timed-out broadcast may still have reached the node.
      if (isTimeoutError(error)) {
        this.reservations.reserve(selection.inputs);
      }
      return this.fail(request, { reason: "SubmissionFailure", message: describeError(error) });
    }

    this.reservations.reserve(selection.inputs);
    this.transition("Submitted", request);

    log(
      `Sent ${request.requestedAmount} sompi to ${request.destinationAddress} ` +
        `(${pending.inputs.length} inputs, fee ${pending.fee}, change ${pending.change}) - tx ${transactionId}`,
      "done",
    );
    this.transition("Succeeded", request);

    return {
      success: true,
      transactionId,
      destinationAddress: request.destinationAddress,
      amount: request.requestedAmount,
      nextClaimSeconds: this.wallet.claimIntervalSeconds,
    };
  }

  private async withDeadline<T>(
    call: (signal: AbortSignal) => Promise<T>,
    what: string,
    code: FaucetErrorCode,
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new FaucetError({
            message: `${what} timed out after ${this.nodeTimeoutMs} ms`,
            code,
            retryable: true,
          }),
        );
      }, this.nodeTimeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(request: ClaimRequest, failure: ClaimFailure): ClaimOutcome {
    this.transition("Failed", request);

    switch (failure.reason) {
      case "InvalidAddress":
      case "RateLimited":
      case "Cancelled":
        log(`Claim from ${request.identity} rejected: ${failure.reason}`, "warn");
        break;
      case "InsufficientFunds":
        log(
          `Claim from ${request.identity} failed: insufficient faucet funds, have ${failure.have} sompi, need ${failure.need} sompi`,
          "err",
        );
        break;
      default:
        log(`Claim from ${request.identity} failed: ${failure.reason}: ${failure.message}`, "err");
        break;
    }

    return { success: false, failure };
  }

  private transition(state: ClaimState, request: ClaimRequest): void {
    this.onTransition?.(state, request);
  }
}
