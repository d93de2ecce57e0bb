import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;

export interface SealedValue {
  ciphertext: Buffer;
  nonce: Buffer;
}

export function resolveMasterKey(envName: string, env: NodeJS.ProcessEnv = process.env): Buffer {
  const raw = env[envName]?.trim();
  if (!raw) {
    throw new Error(`Missing master key env: ${envName}`);
  }
  const key = Buffer.from(raw, "base64");
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Invalid master key in ${envName}. Expected base64-encoded 32-byte key.`);
  }
  return key;
}

/** AES-256-GCM; the auth tag is appended to the ciphertext. */
export function sealValue(plaintext: string, masterKey: Buffer): SealedValue {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv("aes-256-gcm", masterKey, nonce);
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  return {
    ciphertext: Buffer.concat([encrypted, cipher.getAuthTag()]),
    nonce,
  };
}

export function openValue(sealed: SealedValue, masterKey: Buffer): string {
  const { ciphertext, nonce } = sealed;
  if (ciphertext.length < TAG_LENGTH) {
    throw new Error("Corrupted ciphertext payload");
  }
  const decipher = createDecipheriv("aes-256-gcm", masterKey, nonce);
  decipher.setAuthTag(ciphertext.subarray(ciphertext.length - TAG_LENGTH));
  return Buffer.concat([
    decipher.update(ciphertext.subarray(0, ciphertext.length - TAG_LENGTH)),
    decipher.final(),
  ]).toString("utf8");
}
