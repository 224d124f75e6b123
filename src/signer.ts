import { secp256k1 } from "@noble/curves/secp256k1.js";
import { concatBytes } from "@noble/hashes/utils.js";
import type { SignatureBinding } from "./types";
import { CONTEXT_SIGNATURE_BINDING, SIGNATURE_LENGTH } from "./constants";
import { InvalidSecretKeyError, MalformedSignatureError } from "./errors";
import { isValidScalar, parsePublicKey } from "./keys";

export interface SignedFields {
  ciphertext: Uint8Array;
  senderEphemeralPublicKey: Uint8Array;
  receiverPublicKey: Uint8Array;
}

/**
 * Bytes covered by the sender's signature. Always derived from the
 * ciphertext, never the plaintext.
 */
export function signingPayload(
  binding: SignatureBinding,
  fields: SignedFields,
): Uint8Array {
  if (binding === "ciphertext") {
    return fields.ciphertext;
  }
  return concatBytes(
    CONTEXT_SIGNATURE_BINDING,
    fields.senderEphemeralPublicKey,
    fields.receiverPublicKey,
    fields.ciphertext,
  );
}

/**
 * Deterministic ECDSA (RFC 6979) over SHA-256(message), compact r||s.
 */
export function sign(identitySecretKey: Uint8Array, message: Uint8Array): Uint8Array {
  if (!isValidScalar(identitySecretKey)) {
    throw new InvalidSecretKeyError();
  }
  return secp256k1.sign(message, identitySecretKey);
}

export function verify(
  identityPublicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array,
): boolean {
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new MalformedSignatureError({ length: signature.length });
  }
  if (
    !isValidScalar(signature.subarray(0, 32)) ||
    !isValidScalar(signature.subarray(32))
  ) {
    throw new MalformedSignatureError({ reason: "r or s out of range" });
  }

  const publicKey = parsePublicKey(identityPublicKey);
  return secp256k1.verify(signature, message, publicKey);
}
