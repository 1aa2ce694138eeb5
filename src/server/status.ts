import type { Request, Response } from 'express';
import { describeError, log } from '../handlers/log.js';
import { formatKas } from '../utils/helperFunctions.js';
import type { FaucetService } from './httpServer.js';

export function handleStatus(faucet: FaucetService) {
  return async (_req: Request, res: Response) => {
    try {
      const status = await faucet.status();

      return res.json({
        active: status.active,
        faucetAddress: status.faucetAddress,
        balanceKas: formatKas(status.balance),
        nextClaimSeconds: status.nextClaimSeconds,
      });
    } catch (error) {
      log(`Status query failed: ${describeError(error)}`, "err");

      return res.status(500).json({
        status: "ERROR",
        reason: "Faucet status unavailable",
      });
    }
  };
}
