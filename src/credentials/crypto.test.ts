import { describe, expect, it } from "vitest";
import { openValue, resolveMasterKey, sealValue } from "./crypto";

const masterKey = Buffer.alloc(32, 3);

describe("credential crypto", () => {
  it("opens what it sealed and uses a fresh nonce each time", () => {
    const first = sealValue("test-secret", masterKey);
    const second = sealValue("test-secret", masterKey);

    expect(openValue(first, masterKey)).toBe("test-secret");
    expect(first.nonce.equals(second.nonce)).toBe(false);
  });

  it("rejects tampered ciphertext", () => {
    const sealed = sealValue("test-secret", masterKey);
    const tampered = Buffer.from(sealed.ciphertext);
    tampered[0] = (tampered[0] ?? 0) ^ 0xff;

    expect(() => openValue({ ciphertext: tampered, nonce: sealed.nonce }, masterKey)).toThrow();
  });

  it("rejects payloads shorter than the auth tag", () => {
    expect(() =>
      openValue({ ciphertext: Buffer.alloc(4), nonce: Buffer.alloc(12) }, masterKey),
    ).toThrow("Corrupted ciphertext payload");
  });

  it("reads a base64 32-byte key from the environment", () => {
    const env = { BRIDGE_KEY: masterKey.toString("base64") };

    expect(resolveMasterKey("BRIDGE_KEY", env).equals(masterKey)).toBe(true);
    expect(() => resolveMasterKey("BRIDGE_KEY", {})).toThrow("Missing master key env: BRIDGE_KEY");
    expect(() => resolveMasterKey("BRIDGE_KEY", { BRIDGE_KEY: "c2hvcnQ=" })).toThrow(
      "Invalid master key in BRIDGE_KEY",
    );
  });
});
