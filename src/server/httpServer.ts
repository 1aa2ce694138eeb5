import type { Server } from 'node:http';
import cors from 'cors';
import express from 'express';
import { log } from '../handlers/log.js';
import type { WalletQueueStats } from '../handlers/WalletQueue.js';
import type { ClaimOutcome, ClaimRequest, FaucetStatus } from '../types/index.js';
import { handleClaim } from './claim.js';
import { handleStatus } from './status.js';

/** What the HTTP layer needs from the claim orchestrator. */
export interface FaucetService {
  readonly amountPerClaim: bigint;
  readonly queueStats: WalletQueueStats;
  claim(request: ClaimRequest, signal?: AbortSignal): Promise<ClaimOutcome>;
  status(): Promise<FaucetStatus>;
}

export interface HttpServerOptions {
  trustProxy?: boolean;
}

export function createHttpServer(faucet: FaucetService, options: HttpServerOptions = {}) {
  const app = express();

  app.set('trust proxy', Boolean(options.trustProxy));

  app.use(cors());
  app.use(express.json({ limit: '16kb' }));

  app.get('/status', handleStatus(faucet));

  app.post('/claim', handleClaim(faucet));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    const { size, pending } = faucet.queueStats;
    res.json({ status: 'OK', timestamp: new Date().toISOString(), queue: { size, pending } });
  });

  return app;
}

export function startHttpServer(faucet: FaucetService, port: number, options: HttpServerOptions = {}): Server {
  const app = createHttpServer(faucet, options);

  const server = app.listen(port, () => {
    log(`HTTP server started on port ${port}`, "info");
    log(`Claim endpoint: POST http://localhost:${port}/claim`, "info");
    log(`Status endpoint: GET http://localhost:${port}/status`, "info");
  });

  return server;
}
