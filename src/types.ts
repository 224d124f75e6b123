// src/types.ts
import type { LogLevel } from "./logger";

/**
 * Source of cryptographically secure bytes. Passed explicitly so tests can
 * substitute a deterministic stream.
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * A secp256k1 key pair. The same shape serves identity keys (long-lived,
 * used for signing) and ephemeral keys (one message, then discarded).
 */
export interface KeyPair {
  publicKey: Uint8Array; // 33-byte SEC1 compressed
  secretKey: Uint8Array; // 32-byte scalar, never transmitted
}

export type CipherSuiteId = "aes-256-gcm" | "chacha20-poly1305";

/**
 * Which bytes the sender's identity key signs.
 * "ciphertext" signs the ciphertext alone; "context" also commits to the
 * ephemeral and receiver public keys.
 */
export type SignatureBinding = "ciphertext" | "context";

export interface MessageEnvelope {
  readonly ciphertext: Uint8Array;
  readonly receiverPublicKey: Uint8Array;
  readonly senderEphemeralPublicKey: Uint8Array;
  readonly nonce: Uint8Array;
  readonly senderIdentityPublicKey: Uint8Array;
  readonly signature: Uint8Array;
}

export interface EnvelopeJSON {
  v: number;
  ciphertext: string;
  receiverPublicKey: string;
  senderEphemeralPublicKey: string;
  nonce: string;
  senderIdentityPublicKey: string;
  signature: string;
}

export interface SealpostOptions {
  random?: RandomSource;
  cipherSuite?: CipherSuiteId;
  signatureBinding?: SignatureBinding;
  bindSenderIdentity?: boolean;
  verifySignatures?: boolean;
  /** Sets the process-wide Logger level, shared by every Sealpost instance. */
  logLevel?: LogLevel;
}

export interface SealpostConfig {
  readonly random: RandomSource;
  readonly cipherSuite: CipherSuiteId;
  readonly signatureBinding: SignatureBinding;
  readonly bindSenderIdentity: boolean;
  readonly verifySignatures: boolean;
}

export interface SealParams {
  plaintext: string | Uint8Array;
  senderIdentity: KeyPair;
  receiverPublicKey: Uint8Array;
}

export interface OpenOptions {
  /** Identity key the caller trusts for this peer. */
  expectedSender?: Uint8Array;
  /** Overrides `SealpostConfig.verifySignatures` for one message. */
  verifySignature?: boolean;
}

export interface OpenedMessage {
  plaintext: Uint8Array;
  senderIdentityPublicKey: Uint8Array;
  signatureVerified: boolean;
}

export type EnvelopeState =
  | "Unsent"
  | "Assembled"
  | "InTransit"
  | "Received"
  | "Decrypted"
  | "Rejected";
