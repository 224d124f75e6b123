import type {
  EnvelopeJSON,
  KeyPair,
  MessageEnvelope,
  OpenOptions,
  OpenedMessage,
  SealpostConfig,
  SealpostOptions,
} from "./types";
import { Logger } from "./logger";
import { resolveConfig } from "./config";
import { SealpostError } from "./errors";
import { generateKeyPair, keyPairFromSecretKey } from "./keys";
import { openEnvelope, sealEnvelope } from "./envelope";
import { IncomingMessage, OutgoingMessage } from "./lifecycle";
import {
  decodeEnvelope,
  encodeEnvelope,
  envelopeFromJSON,
  envelopeToJSON,
} from "./codec";

export type ReceiveResult =
  | { state: "Decrypted"; message: OpenedMessage }
  | { state: "Rejected"; error: SealpostError };

export class Sealpost {
  readonly config: SealpostConfig;

  constructor(options: SealpostOptions = {}) {
    this.config = resolveConfig(options);
    if (options.logLevel) {
      Logger.setLevel(options.logLevel);
    }

    Logger.log("Sealpost", "Initialized", {
      cipherSuite: this.config.cipherSuite,
      signatureBinding: this.config.signatureBinding,
    });
  }

  generateKeyPair(): KeyPair {
    return generateKeyPair(this.config.random);
  }

  keyPairFromSecretKey(secretKey: Uint8Array): KeyPair {
    return keyPairFromSecretKey(secretKey);
  }

  seal(
    plaintext: string | Uint8Array,
    senderIdentity: KeyPair,
    receiverPublicKey: Uint8Array,
  ): MessageEnvelope {
    return sealEnvelope({ plaintext, senderIdentity, receiverPublicKey }, this.config);
  }

  open(
    envelope: MessageEnvelope,
    receiverSecretKey: Uint8Array,
    options?: OpenOptions,
  ): OpenedMessage {
    return openEnvelope(envelope, receiverSecretKey, this.config, options);
  }

  /**
   * Like `open`, but reports the terminal state instead of throwing for
   * cryptographic rejections. Anything that is not a SealpostError is a bug
   * and propagates.
   */
  receive(
    envelope: MessageEnvelope,
    receiverSecretKey: Uint8Array,
    options?: OpenOptions,
  ): ReceiveResult {
    const incoming = this.incoming(envelope);
    try {
      return { state: "Decrypted", message: incoming.open(receiverSecretKey, options) };
    } catch (error) {
      if (error instanceof SealpostError) {
        return { state: "Rejected", error };
      }
      throw error;
    }
  }

  outgoing(senderIdentity: KeyPair, receiverPublicKey: Uint8Array): OutgoingMessage {
    return new OutgoingMessage(senderIdentity, receiverPublicKey, this.config);
  }

  incoming(envelope: MessageEnvelope): IncomingMessage {
    return new IncomingMessage(envelope, this.config);
  }

  encode(envelope: MessageEnvelope): Uint8Array {
    return encodeEnvelope(envelope);
  }

  decode(bytes: Uint8Array): MessageEnvelope {
    return decodeEnvelope(bytes);
  }

  toJSON(envelope: MessageEnvelope): EnvelopeJSON {
    return envelopeToJSON(envelope);
  }

  fromJSON(value: unknown): MessageEnvelope {
    return envelopeFromJSON(value);
  }
}
