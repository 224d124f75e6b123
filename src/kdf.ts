import { hkdf } from "@noble/hashes/hkdf.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { MAX_KDF_OUTPUT_LENGTH, SYMMETRIC_KEY_LENGTH } from "./constants";
import { KdfExpansionError } from "./errors";

export interface DeriveKeyOptions {
  salt?: Uint8Array;
  info?: Uint8Array;
}

/**
 * HKDF-SHA256 extract-and-expand over a raw ECDH output. Envelopes use it
 * with no salt and no info.
 */
export function deriveKey(
  sharedSecret: Uint8Array,
  length: number = SYMMETRIC_KEY_LENGTH,
  options: DeriveKeyOptions = {},
): Uint8Array {
  if (!Number.isInteger(length) || length < 1 || length > MAX_KDF_OUTPUT_LENGTH) {
    throw new KdfExpansionError(length);
  }

  return hkdf(sha256, sharedSecret, options.salt, options.info, length);
}
