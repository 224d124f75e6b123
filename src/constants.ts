import { utf8ToBytes } from "@noble/hashes/utils.js";

export const CONTEXT_SIGNATURE_BINDING = utf8ToBytes("sealpost/v1/context");

// Key and message sizes (secp256k1, SEC1 compressed)
export const SECRET_KEY_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 33;
export const UNCOMPRESSED_PUBLIC_KEY_LENGTH = 65;
export const SHARED_SECRET_LENGTH = 32;
export const SYMMETRIC_KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const SIGNATURE_LENGTH = 64;

// HKDF-SHA256 can expand to at most 255 blocks
export const HASH_OUTPUT_LENGTH = 32;
export const MAX_KDF_OUTPUT_LENGTH = 255 * HASH_OUTPUT_LENGTH;

export const SECP256K1_ORDER =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

export const MAX_KEYGEN_ATTEMPTS = 64;

export const ENVELOPE_FORMAT_VERSION = 1;

export const ENVELOPE_STATES = {
  UNSENT: "Unsent",
  ASSEMBLED: "Assembled",
  IN_TRANSIT: "InTransit",
  RECEIVED: "Received",
  DECRYPTED: "Decrypted",
  REJECTED: "Rejected",
} as const;

export const ERRORS = {
  INVALID_POINT: "Invalid public key: not a valid secp256k1 point",
  INVALID_SECRET_KEY: "Invalid secret key: scalar out of range",
  KDF_EXPANSION: "Requested key length exceeds HKDF-SHA256 capacity",
  AUTHENTICATION_FAILURE: "Message authentication failed",
  MALFORMED_SIGNATURE: "Malformed signature",
  SIGNATURE_VERIFICATION_FAILED: "Signature does not match sender identity",
  ENCRYPTION_FAILURE: "Encryption failed",
  RANDOM_SOURCE: "Random source did not produce a usable value",
  UNEXPECTED_SENDER: "Envelope was signed by an unexpected identity",
  ENVELOPE_FORMAT: "Malformed envelope",
  INVALID_TRANSITION: "Invalid message state transition",
  INVALID_CONFIG: "Invalid configuration",
} as const;
