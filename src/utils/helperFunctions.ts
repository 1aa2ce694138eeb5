export const SOMPI_PER_KAS = 100_000_000n;

export const requiredEnvVar = (key: string, env: NodeJS.ProcessEnv = process.env): string => {
  const envVar = env[key];
  if (undefined === envVar || envVar === "") {
    throw new Error(`Environment variable ${key} must be defined`);
  }
  return envVar;
};

/**
 * Sompi → KAS decimal string with trailing zeros dropped:
 * 100000000n → "1", 150000000n → "1.5", 1n → "0.00000001".
 */
export const formatKas = (sompi: bigint): string => {
  const negative = sompi < 0n;
  const abs = negative ? -sompi : sompi;
  const whole = abs / SOMPI_PER_KAS;
  const frac = (abs % SOMPI_PER_KAS).toString().padStart(8, "0").replace(/0+$/, "");
  return `${negative ? "-" : ""}${whole}${frac ? `.${frac}` : ""}`;
};

const BIGINT_MARK = "__bigint__";

/** JSON with bigint values written as bare integers. */
export const stringifyWithBigInt = (value: unknown): string =>
  JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? `${BIGINT_MARK}${v.toString()}` : v,
  ).replace(new RegExp(`"${BIGINT_MARK}(-?\\d+)"`, "g"), "$1");

export type KaspaNetwork = "mainnet" | "testnet-10" | "testnet-11" | "testnet-12" | "simnet" | "devnet";

export const KASPA_NETWORKS: readonly KaspaNetwork[] = [
  "mainnet",
  "testnet-10",
  "testnet-11",
  "testnet-12",
  "simnet",
  "devnet",
];

export const isKaspaNetwork = (value: string): value is KaspaNetwork =>
  KASPA_NETWORKS.some((network) => network === value);

/** Bech32 human-readable part of addresses on the network. */
export const networkPrefix = (network: KaspaNetwork): string => {
  switch (network) {
    case "mainnet":
      return "kaspa";
    case "simnet":
      return "kaspasim";
    case "devnet":
      return "kaspadev";
    default:
      return "kaspatest";
  }
};
