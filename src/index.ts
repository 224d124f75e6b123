export { Sealpost } from "./sealpost";
export type { ReceiveResult } from "./sealpost";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { resolveConfig, DEFAULT_CONFIG } from "./config";
export {
  generateKeyPair,
  keyPairFromSecretKey,
  parsePublicKey,
  diffieHellman,
} from "./keys";
export { deriveKey } from "./kdf";
export type { DeriveKeyOptions } from "./kdf";
export { encrypt, decrypt, generateNonce } from "./cipher";
export type { CipherOptions } from "./cipher";
export { sign, verify, signingPayload } from "./signer";
export { sealEnvelope, openEnvelope } from "./envelope";
export {
  OutgoingMessage,
  IncomingMessage,
  canTransition,
  isTerminal,
} from "./lifecycle";
export {
  encodeEnvelope,
  decodeEnvelope,
  envelopeToJSON,
  envelopeFromJSON,
} from "./codec";
export {
  bytesToBase64,
  base64ToBytes,
  stringToBytes,
  bytesToString,
} from "./encoding";
export { ERRORS } from "./constants";
export {
  SealpostError,
  InvalidPointError,
  InvalidSecretKeyError,
  KdfExpansionError,
  AuthenticationFailureError,
  MalformedSignatureError,
  SignatureVerificationError,
  EncryptionFailureError,
  RandomSourceError,
  UnexpectedSenderError,
  EnvelopeFormatError,
  InvalidTransitionError,
} from "./errors";
export type { ErrorCode } from "./errors";
export type {
  KeyPair,
  RandomSource,
  CipherSuiteId,
  SignatureBinding,
  MessageEnvelope,
  EnvelopeJSON,
  SealpostOptions,
  SealpostConfig,
  SealParams,
  OpenOptions,
  OpenedMessage,
  EnvelopeState,
} from "./types";
