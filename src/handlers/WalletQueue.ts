import PQueue from "p-queue";
import { log } from "./log.js";

export interface WalletQueueStats {
  size: number;
  pending: number;
  isPaused: boolean;
}

/**
 * Single-worker queue over the faucet wallet's spend path.
 *
 * Every fetch → select → sign → submit sequence runs as one task, so at most
 * one spend attempt exists at any time. No queue-level timeout; each node
 * call inside the task is bounded.
 */
export class WalletQueue {
  private readonly queue: PQueue;

  constructor(private readonly name: string = "wallet") {
    this.queue = new PQueue({ concurrency: 1 });

    this.queue.on("add", () => {
      log(`Claim added to ${this.name} queue - Size: ${this.queue.size}`, "info");
    });

    this.queue.on("active", () => {
      log(`Processing claim from ${this.name} queue - Waiting: ${this.queue.size}`, "info");
    });

    this.queue.on("completed", () => {
      log(`Claim finished in ${this.name} queue - Remaining: ${this.queue.size}`, "info");
    });

    this.queue.on("error", (error: unknown) => {
      log(`Error in ${this.name} queue: ${error}`, "err");
    });

    this.queue.on("idle", () => {
      log(`${this.name} queue is idle`, "info");
    });
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add<T>(task, { throwOnTimeout: true });
  }

  /** Resolves once the in-flight task (if any) and all queued ones finish. */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  getStats(): WalletQueueStats {
    return {
      size: this.queue.size,
      pending: this.queue.pending,
      isPaused: this.queue.isPaused,
    };
  }
}
