import { inspect } from "node:util";

const REDACTED = "[redacted private key]";

/**
 * Wallet secret. The bytes only leave through `toHex()`, which the signer
 * calls; string, JSON and inspect conversions are redacted so the key cannot
 * reach a log line or a response body by accident.
 */
export class PrivateKeyMaterial {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static fromHex(hex: string): PrivateKeyMaterial {
    const trimmed = hex.trim();
    if (!/^[0-9a-fA-F]{64}$/.test(trimmed)) {
      throw new Error("Private key must be 32 bytes of hex (64 characters)");
    }
    return new PrivateKeyMaterial(Uint8Array.from(Buffer.from(trimmed, "hex")));
  }

  toHex(): string {
    return Buffer.from(this.bytes).toString("hex");
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}
