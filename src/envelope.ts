import type {
  MessageEnvelope,
  OpenOptions,
  OpenedMessage,
  SealParams,
  SealpostConfig,
} from "./types";
import { Logger } from "./logger";
import {
  generateKeyPair,
  diffieHellman,
  keyPairFromSecretKey,
  parsePublicKey,
} from "./keys";
import { deriveKey } from "./kdf";
import { encrypt, decrypt, generateNonce } from "./cipher";
import { sign, signingPayload, verify } from "./signer";
import { constantTimeEqual, stringToBytes, zeroBuffer } from "./encoding";
import { SignatureVerificationError, UnexpectedSenderError } from "./errors";

function associatedDataFor(
  config: SealpostConfig,
  senderIdentityPublicKey: Uint8Array,
): Uint8Array | undefined {
  return config.bindSenderIdentity ? senderIdentityPublicKey : undefined;
}

function decryptCiphertext(
  envelope: MessageEnvelope,
  senderIdentityPublicKey: Uint8Array,
  receiverSecretKey: Uint8Array,
  config: SealpostConfig,
): Uint8Array {
  const sharedSecret = diffieHellman(
    receiverSecretKey,
    envelope.senderEphemeralPublicKey,
  );
  const symmetricKey = deriveKey(sharedSecret);

  try {
    return decrypt(symmetricKey, envelope.nonce, envelope.ciphertext, {
      suite: config.cipherSuite,
      associatedData: associatedDataFor(config, senderIdentityPublicKey),
    });
  } finally {
    zeroBuffer(symmetricKey);
    zeroBuffer(sharedSecret);
  }
}

/**
 * Send path: ephemeral key agreement with the receiver, HKDF, AEAD, then an
 * identity signature over the ciphertext. Pure construction; verification
 * is the receiver's job.
 */
export function sealEnvelope(
  params: SealParams,
  config: SealpostConfig,
): MessageEnvelope {
  Logger.log("Seal", "Sealing envelope", {
    cipherSuite: config.cipherSuite,
    signatureBinding: config.signatureBinding,
  });

  const receiverPublicKey = parsePublicKey(params.receiverPublicKey);
  // Derived from the secret half; the caller's publicKey is not consulted.
  const identity = keyPairFromSecretKey(params.senderIdentity.secretKey);
  const senderIdentityPublicKey = identity.publicKey;
  const plaintext =
    typeof params.plaintext === "string"
      ? stringToBytes(params.plaintext)
      : params.plaintext;

  const ephemeral = generateKeyPair(config.random);
  const sharedSecret = diffieHellman(ephemeral.secretKey, receiverPublicKey);
  const symmetricKey = deriveKey(sharedSecret);

  try {
    const nonce = generateNonce(config.random);
    const ciphertext = encrypt(symmetricKey, nonce, plaintext, {
      suite: config.cipherSuite,
      associatedData: associatedDataFor(config, senderIdentityPublicKey),
    });

    const payload = signingPayload(config.signatureBinding, {
      ciphertext,
      senderEphemeralPublicKey: ephemeral.publicKey,
      receiverPublicKey,
    });
    const signature = sign(identity.secretKey, payload);

    Logger.log("Seal", "Envelope sealed", {
      ciphertextLength: ciphertext.length,
    });

    return Object.freeze({
      ciphertext,
      receiverPublicKey,
      senderEphemeralPublicKey: ephemeral.publicKey,
      nonce,
      senderIdentityPublicKey,
      signature,
    });
  } finally {
    zeroBuffer(symmetricKey);
    zeroBuffer(sharedSecret);
    zeroBuffer(ephemeral.secretKey);
    zeroBuffer(identity.secretKey);
  }
}

/**
 * Receive path: recompute the shared secret from the envelope's ephemeral
 * key, decrypt, then check the sender signature. Throws on any failure and
 * never returns unauthenticated plaintext.
 */
export function openEnvelope(
  envelope: MessageEnvelope,
  receiverSecretKey: Uint8Array,
  config: SealpostConfig,
  options: OpenOptions = {},
): OpenedMessage {
  Logger.log("Open", "Opening envelope", {
    ciphertextLength: envelope.ciphertext.length,
  });

  const senderIdentityPublicKey = parsePublicKey(envelope.senderIdentityPublicKey);
  const plaintext = decryptCiphertext(
    envelope,
    senderIdentityPublicKey,
    receiverSecretKey,
    config,
  );

  const shouldVerify = options.verifySignature ?? config.verifySignatures;
  try {
    if (shouldVerify) {
      const payload = signingPayload(config.signatureBinding, envelope);
      if (!verify(senderIdentityPublicKey, payload, envelope.signature)) {
        throw new SignatureVerificationError();
      }
    } else {
      Logger.warn("Open", "Signature verification skipped");
    }

    if (
      options.expectedSender &&
      !constantTimeEqual(
        parsePublicKey(options.expectedSender),
        senderIdentityPublicKey,
      )
    ) {
      throw new UnexpectedSenderError();
    }
  } catch (error) {
    zeroBuffer(plaintext);
    throw error;
  }

  Logger.log("Open", "Envelope opened", { signatureVerified: shouldVerify });

  return {
    plaintext,
    senderIdentityPublicKey,
    signatureVerified: shouldVerify,
  };
}
