import { randomBytes } from "@noble/hashes/utils.js";
import type { CipherSuiteId, SealpostConfig, SealpostOptions, SignatureBinding } from "./types";
import { SealpostError } from "./errors";

const CIPHER_SUITES: readonly CipherSuiteId[] = ["aes-256-gcm", "chacha20-poly1305"];
const SIGNATURE_BINDINGS: readonly SignatureBinding[] = ["ciphertext", "context"];

export const DEFAULT_CONFIG: SealpostConfig = Object.freeze({
  random: (length: number) => randomBytes(length),
  cipherSuite: "aes-256-gcm",
  signatureBinding: "ciphertext",
  bindSenderIdentity: false,
  verifySignatures: true,
});

/**
 * Merge caller options over the defaults. Both parties of an exchange must
 * agree on `cipherSuite`, `signatureBinding` and `bindSenderIdentity`.
 */
export function resolveConfig(options: SealpostOptions = {}): SealpostConfig {
  if (options.random !== undefined && typeof options.random !== "function") {
    throw new SealpostError("INVALID_CONFIG", "random must be a function");
  }

  if (
    options.cipherSuite !== undefined &&
    !CIPHER_SUITES.includes(options.cipherSuite)
  ) {
    throw new SealpostError("INVALID_CONFIG", "Unknown cipher suite", {
      received: options.cipherSuite,
    });
  }

  if (
    options.signatureBinding !== undefined &&
    !SIGNATURE_BINDINGS.includes(options.signatureBinding)
  ) {
    throw new SealpostError("INVALID_CONFIG", "Unknown signature binding", {
      received: options.signatureBinding,
    });
  }

  return Object.freeze({
    random: options.random ?? DEFAULT_CONFIG.random,
    cipherSuite: options.cipherSuite ?? DEFAULT_CONFIG.cipherSuite,
    signatureBinding: options.signatureBinding ?? DEFAULT_CONFIG.signatureBinding,
    bindSenderIdentity:
      options.bindSenderIdentity ?? DEFAULT_CONFIG.bindSenderIdentity,
    verifySignatures: options.verifySignatures ?? DEFAULT_CONFIG.verifySignatures,
  });
}
