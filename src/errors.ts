import { ERRORS } from "./constants";

export type ErrorCode = keyof typeof ERRORS;

/**
 * Base class for every failure raised by sealpost.
 */
export class SealpostError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? ERRORS[code]);
    this.name = "SealpostError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Public key bytes that do not decode to a usable curve point.
 */
export class InvalidPointError extends SealpostError {
  constructor(details?: Record<string, unknown>) {
    super("INVALID_POINT", undefined, details);
    this.name = "InvalidPointError";
  }
}

export class InvalidSecretKeyError extends SealpostError {
  constructor() {
    super("INVALID_SECRET_KEY");
    this.name = "InvalidSecretKeyError";
  }
}

export class KdfExpansionError extends SealpostError {
  constructor(length: number) {
    super("KDF_EXPANSION", undefined, { length });
    this.name = "KdfExpansionError";
  }
}

/**
 * AEAD tag mismatch. Raised identically for a wrong key, a wrong nonce and
 * tampered ciphertext.
 */
export class AuthenticationFailureError extends SealpostError {
  constructor() {
    super("AUTHENTICATION_FAILURE");
    this.name = "AuthenticationFailureError";
  }
}

export class MalformedSignatureError extends SealpostError {
  constructor(details?: Record<string, unknown>) {
    super("MALFORMED_SIGNATURE", undefined, details);
    this.name = "MalformedSignatureError";
  }
}

export class SignatureVerificationError extends SealpostError {
  constructor() {
    super("SIGNATURE_VERIFICATION_FAILED");
    this.name = "SignatureVerificationError";
  }
}

/**
 * Cipher precondition violation. Unreachable with correctly sized keys and
 * nonces.
 */
export class EncryptionFailureError extends SealpostError {
  constructor(cause?: unknown) {
    super("ENCRYPTION_FAILURE", undefined, {
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.name = "EncryptionFailureError";
  }
}

export class RandomSourceError extends SealpostError {
  constructor(details?: Record<string, unknown>) {
    super("RANDOM_SOURCE", undefined, details);
    this.name = "RandomSourceError";
  }
}

export class UnexpectedSenderError extends SealpostError {
  constructor() {
    super("UNEXPECTED_SENDER");
    this.name = "UnexpectedSenderError";
  }
}

export class EnvelopeFormatError extends SealpostError {
  readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super("ENVELOPE_FORMAT", `${ERRORS.ENVELOPE_FORMAT}: ${message}`, details);
    this.name = "EnvelopeFormatError";
    this.field = field;
  }
}

export class InvalidTransitionError extends SealpostError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super("INVALID_TRANSITION", `${ERRORS.INVALID_TRANSITION}: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}
