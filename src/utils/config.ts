import { FaucetError } from "../handlers/errors.js";
import { DEFAULT_DUST_THRESHOLD_SOMPI } from "../handlers/assembler.js";
import { DEFAULT_FEE_PER_INPUT_SOMPI } from "../handlers/fee.js";
import { DEFAULT_RESERVATION_TTL_SECONDS } from "../handlers/OutpointReservations.js";
import { DEFAULT_NODE_TIMEOUT_MS } from "../handlers/orchestrator.js";
import { isKaspaNetwork, requiredEnvVar, type KaspaNetwork } from "./helperFunctions.js";
import { PrivateKeyMaterial } from "./privateKey.js";

export const FAUCET_DEFAULTS = {
  KASPAD_URL: "http://127.0.0.1:8000",
  PORT: 3010,
  AMOUNT_PER_CLAIM: 100_000_000n,
  CLAIM_INTERVAL_SECONDS: 3600,
  KASPA_NETWORK: "testnet-12",
  FEE_PER_INPUT_SOMPI: DEFAULT_FEE_PER_INPUT_SOMPI,
  DUST_THRESHOLD_SOMPI: DEFAULT_DUST_THRESHOLD_SOMPI,
  NODE_TIMEOUT_MS: DEFAULT_NODE_TIMEOUT_MS,
  RESERVATION_TTL_SECONDS: DEFAULT_RESERVATION_TTL_SECONDS,
} as const;

export interface FaucetConfig {
  kaspadUrl: string;
  port: number;
  privateKey: PrivateKeyMaterial;
  amountPerClaim: bigint;
  claimIntervalSeconds: number;
  network: KaspaNetwork;
  feePerInput: bigint;
  dustThreshold: bigint;
  nodeTimeoutMs: number;
  reservationTtlSeconds: number;
  redisUrl?: string;
  trustProxy: boolean;
}

const invalid = (message: string): FaucetError => new FaucetError({ message, code: "CONFIG_INVALID" });

const readInteger = (env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) throw invalid(`${key} must be a non-negative integer, got "${raw}"`);
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) throw invalid(`${key} must be at least ${min}`);
  return value;
};

const readSompi = (env: NodeJS.ProcessEnv, key: string, fallback: bigint, min: bigint): bigint => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) throw invalid(`${key} must be an integer amount of sompi, got "${raw}"`);
  const value = BigInt(raw);
  if (value < min) throw invalid(`${key} must be at least ${min}`);
  return value;
};

/**
 * Reads and validates the faucet configuration from the environment.
 * The private key is never echoed in errors.
 */
export function loadFaucetConfig(env: NodeJS.ProcessEnv = process.env): FaucetConfig {
  let privateKey: PrivateKeyMaterial;
  try {
    privateKey = PrivateKeyMaterial.fromHex(requiredEnvVar("FAUCET_PRIVATE_KEY", env).trim());
  } catch (error) {
    throw invalid(`FAUCET_PRIVATE_KEY: ${error instanceof Error ? error.message : String(error)}`);
  }

  const kaspadUrl = env.KASPAD_URL || FAUCET_DEFAULTS.KASPAD_URL;
  try {
    new URL(kaspadUrl);
  } catch {
    throw invalid(`KASPAD_URL is not a valid URL: "${kaspadUrl}"`);
  }

  const network = env.KASPA_NETWORK || FAUCET_DEFAULTS.KASPA_NETWORK;
  if (!isKaspaNetwork(network)) {
    throw invalid(`KASPA_NETWORK "${network}" is not a known Kaspa network`);
  }

  const port = readInteger(env, "PORT", FAUCET_DEFAULTS.PORT, 0);
  if (port > 65535) throw invalid("PORT must be at most 65535");

  return {
    kaspadUrl,
    port,
    privateKey,
    amountPerClaim: readSompi(env, "AMOUNT_PER_CLAIM", FAUCET_DEFAULTS.AMOUNT_PER_CLAIM, 1n),
    claimIntervalSeconds: readInteger(env, "CLAIM_INTERVAL_SECONDS", FAUCET_DEFAULTS.CLAIM_INTERVAL_SECONDS, 1),
    network,
    feePerInput: readSompi(env, "FEE_PER_INPUT_SOMPI", FAUCET_DEFAULTS.FEE_PER_INPUT_SOMPI, 0n),
    dustThreshold: readSompi(env, "DUST_THRESHOLD_SOMPI", FAUCET_DEFAULTS.DUST_THRESHOLD_SOMPI, 0n),
    nodeTimeoutMs: readInteger(env, "NODE_TIMEOUT_MS", FAUCET_DEFAULTS.NODE_TIMEOUT_MS, 1),
    reservationTtlSeconds: readInteger(
      env,
      "RESERVATION_TTL_SECONDS",
      FAUCET_DEFAULTS.RESERVATION_TTL_SECONDS,
      1,
    ),
    redisUrl: env.REDIS_URL || undefined,
    trustProxy: env.TRUST_PROXY === "true",
  };
}
