import type { Request, Response } from 'express';
import { describeError, log } from '../handlers/log.js';
import type { ClaimFailure } from '../types/index.js';
import { formatKas } from '../utils/helperFunctions.js';
import type { FaucetService } from './httpServer.js';

function failureResponse(failure: ClaimFailure): { code: number; reason: string } {
  switch (failure.reason) {
    case "InvalidAddress":
      return { code: 400, reason: "Invalid Kaspa address" };
    case "RateLimited":
      return { code: 429, reason: "Claim cooldown has not elapsed, try again later" };
    case "Cancelled":
      return { code: 503, reason: "Claim cancelled" };
    default:
      return { code: 500, reason: "Claim could not be processed" };
  }
}

export function handleClaim(faucet: FaucetService) {
  return async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const address =
      typeof body === "object" && body !== null && "address" in body ? body.address : undefined;

    if (typeof address !== "string" || address.trim() === "") {
      return res.status(400).json({
        status: "ERROR",
        reason: "Missing address",
      });
    }

    const identity = req.ip ?? req.socket.remoteAddress ?? "unknown";

    // Only effective while the claim waits for the wallet.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const outcome = await faucet.claim(
        {
          identity,
          destinationAddress: address.trim(),
          requestedAmount: faucet.amountPerClaim,
        },
        controller.signal,
      );

      if (!outcome.success) {
        const { code, reason } = failureResponse(outcome.failure);
        return res.status(code).json({ status: "ERROR", reason });
      }

      return res.json({
        transactionId: outcome.transactionId,
        amountKas: formatKas(outcome.amount),
        nextClaimSeconds: outcome.nextClaimSeconds,
      });
    } catch (error) {
      log(`Claim error for ${identity}: ${describeError(error)}`, "err");

      return res.status(500).json({
        status: "ERROR",
        reason: "Claim could not be processed",
      });
    }
  };
}
