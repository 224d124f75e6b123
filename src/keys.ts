import { secp256k1 } from "@noble/curves/secp256k1.js";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils.js";
import type { KeyPair, RandomSource } from "./types";
import {
  MAX_KEYGEN_ATTEMPTS,
  PUBLIC_KEY_LENGTH,
  SECP256K1_ORDER,
  SECRET_KEY_LENGTH,
  UNCOMPRESSED_PUBLIC_KEY_LENGTH,
} from "./constants";
import { DEFAULT_CONFIG } from "./config";
import {
  InvalidPointError,
  InvalidSecretKeyError,
  RandomSourceError,
} from "./errors";

/**
 * True when `bytes` is a 32-byte big-endian integer in [1, n-1].
 */
export function isValidScalar(bytes: Uint8Array): boolean {
  if (bytes.length !== SECRET_KEY_LENGTH) return false;
  const value = BigInt("0x" + bytesToHex(bytes));
  return value > 0n && value < SECP256K1_ORDER;
}

/**
 * Generate a key pair by rejection sampling. Ephemeral pairs are used for a
 * single envelope; identity pairs are kept by the caller.
 */
export function generateKeyPair(
  random: RandomSource = DEFAULT_CONFIG.random,
): KeyPair {
  for (let attempt = 0; attempt < MAX_KEYGEN_ATTEMPTS; attempt++) {
    const candidate = random(SECRET_KEY_LENGTH);
    if (candidate.length !== SECRET_KEY_LENGTH) {
      throw new RandomSourceError({
        expected: SECRET_KEY_LENGTH,
        received: candidate.length,
      });
    }

    if (isValidScalar(candidate)) {
      return {
        publicKey: secp256k1.getPublicKey(candidate, true),
        secretKey: candidate,
      };
    }
  }

  throw new RandomSourceError({ attempts: MAX_KEYGEN_ATTEMPTS });
}

export function keyPairFromSecretKey(secretKey: Uint8Array): KeyPair {
  if (!isValidScalar(secretKey)) {
    throw new InvalidSecretKeyError();
  }
  return {
    publicKey: secp256k1.getPublicKey(secretKey, true),
    secretKey: Uint8Array.from(secretKey),
  };
}

/**
 * Decode a SEC1 public key (compressed or uncompressed) and return its
 * compressed encoding. Rejects the identity point and anything off-curve.
 */
export function parsePublicKey(bytes: Uint8Array): Uint8Array {
  if (
    bytes.length !== PUBLIC_KEY_LENGTH &&
    bytes.length !== UNCOMPRESSED_PUBLIC_KEY_LENGTH
  ) {
    throw new InvalidPointError({ length: bytes.length });
  }

  let compressedHex: string;
  try {
    const point = secp256k1.Point.fromHex(bytesToHex(bytes));
    point.assertValidity();
    if (point.is0()) {
      throw new InvalidPointError({ reason: "point at infinity" });
    }
    compressedHex = point.toHex(true);
  } catch (error) {
    if (error instanceof InvalidPointError) throw error;
    throw new InvalidPointError({
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return hexToBytes(compressedHex);
}

/**
 * ECDH on secp256k1. Returns the 32-byte x coordinate of
 * `secretKey · peerPublicKey`; never use it as a cipher key directly.
 */
export function diffieHellman(
  secretKey: Uint8Array,
  peerPublicKey: Uint8Array,
): Uint8Array {
  const peer = parsePublicKey(peerPublicKey);
  if (!isValidScalar(secretKey)) {
    throw new InvalidSecretKeyError();
  }
  const shared = secp256k1.getSharedSecret(secretKey, peer, true);
  return shared.slice(1);
}
