import { describe, expect, it } from "vitest";
import {
  formatKas,
  isKaspaNetwork,
  networkPrefix,
  requiredEnvVar,
  stringifyWithBigInt,
} from "../../src/utils/helperFunctions.js";

describe("formatKas", () => {
  it("drops trailing zeros", () => {
    expect(formatKas(100_000_000n)).toBe("1");
    expect(formatKas(150_000_000n)).toBe("1.5");
    expect(formatKas(0n)).toBe("0");
  });

  it("keeps full sompi precision", () => {
    expect(formatKas(1n)).toBe("0.00000001");
    expect(formatKas(123_456_789_012n)).toBe("1234.56789012");
  });

  it("formats negative amounts", () => {
    expect(formatKas(-50_000_000n)).toBe("-0.5");
  });
});

describe("stringifyWithBigInt", () => {
  it("writes bigints as bare integers", () => {
    expect(stringifyWithBigInt({ a: 1n, b: "x", c: [2n, 3], d: { e: -4n } })).toBe(
      '{"a":1,"b":"x","c":[2,3],"d":{"e":-4}}',
    );
  });

  it("leaves strings that look like integers quoted", () => {
    expect(stringifyWithBigInt({ amount: "100" })).toBe('{"amount":"100"}');
  });
});

describe("networks", () => {
  it("maps networks to address prefixes", () => {
    expect(networkPrefix("mainnet")).toBe("kaspa");
    expect(networkPrefix("testnet-10")).toBe("kaspatest");
    expect(networkPrefix("testnet-12")).toBe("kaspatest");
    expect(networkPrefix("simnet")).toBe("kaspasim");
    expect(networkPrefix("devnet")).toBe("kaspadev");
  });

  it("recognises known network ids", () => {
    expect(isKaspaNetwork("testnet-11")).toBe(true);
    expect(isKaspaNetwork("testnet")).toBe(false);
  });
});

describe("requiredEnvVar", () => {
  it("returns a set variable and rejects a missing or empty one", () => {
    expect(requiredEnvVar("A", { A: "value" })).toBe("value");
    expect(() => requiredEnvVar("A", {})).toThrow("Environment variable A must be defined");
    expect(() => requiredEnvVar("A", { A: "" })).toThrow("Environment variable A must be defined");
  });
});
