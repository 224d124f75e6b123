import { gcm } from "@noble/ciphers/aes.js";
import { chacha20poly1305 } from "@noble/ciphers/chacha.js";
import type { CipherSuiteId, RandomSource } from "./types";
import { NONCE_LENGTH, SYMMETRIC_KEY_LENGTH, TAG_LENGTH } from "./constants";
import { DEFAULT_CONFIG } from "./config";
import { AuthenticationFailureError, EncryptionFailureError } from "./errors";

export interface CipherOptions {
  suite?: CipherSuiteId;
  associatedData?: Uint8Array;
}

function createCipher(
  suite: CipherSuiteId,
  key: Uint8Array,
  nonce: Uint8Array,
  associatedData?: Uint8Array,
) {
  return suite === "chacha20-poly1305"
    ? chacha20poly1305(key, nonce, associatedData)
    : gcm(key, nonce, associatedData);
}

/**
 * Generate a fresh 12-byte nonce. A (key, nonce) pair must never encrypt
 * two different plaintexts.
 */
export function generateNonce(
  random: RandomSource = DEFAULT_CONFIG.random,
): Uint8Array {
  return random(NONCE_LENGTH);
}

/**
 * Authenticated encryption. Output is ciphertext followed by a 16-byte tag.
 */
export function encrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  options: CipherOptions = {},
): Uint8Array {
  if (key.length !== SYMMETRIC_KEY_LENGTH) {
    throw new EncryptionFailureError("Key must be 32 bytes");
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new EncryptionFailureError("Nonce must be 12 bytes");
  }

  try {
    const cipher = createCipher(
      options.suite ?? DEFAULT_CONFIG.cipherSuite,
      key,
      nonce,
      options.associatedData,
    );
    return cipher.encrypt(plaintext);
  } catch (error) {
    throw new EncryptionFailureError(error);
  }
}

/**
 * Authenticated decryption. Every failure (wrong key, wrong nonce, altered or
 * truncated bytes) surfaces as the same AuthenticationFailureError.
 */
export function decrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  options: CipherOptions = {},
): Uint8Array {
  if (
    key.length !== SYMMETRIC_KEY_LENGTH ||
    nonce.length !== NONCE_LENGTH ||
    ciphertext.length < TAG_LENGTH
  ) {
    throw new AuthenticationFailureError();
  }

  try {
    const cipher = createCipher(
      options.suite ?? DEFAULT_CONFIG.cipherSuite,
      key,
      nonce,
      options.associatedData,
    );
    return cipher.decrypt(ciphertext);
  } catch {
    throw new AuthenticationFailureError();
  }
}
