import type { Server } from "node:http";
import { config } from "dotenv";
import { MemoryClaimGuard } from "./handlers/ClaimGuard.js";
import { describeError, log } from "./handlers/log.js";
import { ClaimOrchestrator } from "./handlers/orchestrator.js";
import OutpointReservations from "./handlers/OutpointReservations.js";
import { connectRedisClaimStore, RedisClaimGuard, type RedisClaimStore } from "./handlers/RedisClaimGuard.js";
import { WalletQueue } from "./handlers/WalletQueue.js";
import { createFeeModel } from "./handlers/fee.js";
import { KaspaRestClient } from "./node/kaspaRestClient.js";
import { assertNodeNetwork } from "./node/network.js";
import { startHttpServer } from "./server/httpServer.js";
import { faucetAddressOf, KaspaAddressCodec, KaspaWasmSigner, loadKaspaSdk } from "./signer/kaspaWasm.js";
import type { ClaimGuard } from "./types/index.js";
import { loadFaucetConfig } from "./utils/config.js";
import { formatKas } from "./utils/helperFunctions.js";

config();

// References kept for graceful shutdown
let httpServer: Server | null = null;
let walletQueue: WalletQueue | null = null;
let redisStore: RedisClaimStore | null = null;

async function initializeFaucet() {
  const settings = loadFaucetConfig();
  const sdk = await loadKaspaSdk();
  const address = faucetAddressOf(sdk, settings.privateKey, settings.network);

  log(`Faucet wallet ${address} on ${settings.network}, node ${settings.kaspadUrl}`, "info");

  const node = new KaspaRestClient({ baseUrl: settings.kaspadUrl, timeoutMs: settings.nodeTimeoutMs });
  await assertNodeNetwork(node, settings.network);

  let guard: ClaimGuard;
  if (settings.redisUrl) {
    redisStore = await connectRedisClaimStore(settings.redisUrl);
    guard = new RedisClaimGuard(redisStore.store, settings.claimIntervalSeconds);
  } else {
    guard = new MemoryClaimGuard(settings.claimIntervalSeconds);
  }

  walletQueue = new WalletQueue();

  const orchestrator = new ClaimOrchestrator({
    wallet: {
      address,
      privateKey: settings.privateKey,
      amountPerClaim: settings.amountPerClaim,
      claimIntervalSeconds: settings.claimIntervalSeconds,
    },
    node,
    signer: new KaspaWasmSigner(sdk),
    addresses: new KaspaAddressCodec(sdk, settings.network),
    guard,
    queue: walletQueue,
    reservations: new OutpointReservations(settings.reservationTtlSeconds),
    fee: createFeeModel(settings.feePerInput),
    dustThreshold: settings.dustThreshold,
    nodeTimeoutMs: settings.nodeTimeoutMs,
  });

  try {
    const status = await orchestrator.status();
    log(`Faucet balance: ${formatKas(status.balance)} KAS`, "info");
  } catch (err) {
    log(`Could not read faucet balance, node unreachable: ${describeError(err)}`, "warn");
  }

  httpServer = startHttpServer(orchestrator, settings.port, { trustProxy: settings.trustProxy });
}

initializeFaucet().catch((err) => {
  log(`Faucet failed to start: ${describeError(err)}`, "err");
  process.exit(1);
});

// Graceful shutdown: stop accepting claims, let the wallet queue finish.
async function shutdown(signal: string) {
  log(`${signal} received, shutting down gracefully...`, "info");

  if (httpServer) {
    httpServer.close(() => {
      log("HTTP server closed", "info");
    });
  }

  if (walletQueue) {
    await walletQueue.drain();
    log("Wallet queue drained", "info");
  }

  if (redisStore) {
    await redisStore.disconnect();
  }

  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      log(`Shutdown error: ${describeError(err)}`, "err");
      process.exit(1);
    });
  });
}
