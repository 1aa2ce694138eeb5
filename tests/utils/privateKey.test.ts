import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { PrivateKeyMaterial } from "../../src/utils/privateKey.js";

describe("PrivateKeyMaterial", () => {
  it("normalises hex to lower case", () => {
    expect(PrivateKeyMaterial.fromHex("AB".repeat(32)).toHex()).toBe("ab".repeat(32));
  });

  it("rejects anything but 32 bytes of hex", () => {
    expect(() => PrivateKeyMaterial.fromHex("ab".repeat(31))).toThrow(
      "Private key must be 32 bytes of hex (64 characters)",
    );
    expect(() => PrivateKeyMaterial.fromHex("zz".repeat(32))).toThrow(
      "Private key must be 32 bytes of hex (64 characters)",
    );
  });

  it("redacts itself in strings, JSON and inspection", () => {
    const key = PrivateKeyMaterial.fromHex("11".repeat(32));

    expect(String(key)).toBe("[redacted private key]");
    expect(`${key}`).toBe("[redacted private key]");
    expect(JSON.stringify({ key })).toBe('{"key":"[redacted private key]"}');
    expect(inspect(key)).toBe("[redacted private key]");
  });
});
