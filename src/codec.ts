/**
 * Envelope serialization for transport or storage collaborators.
 *
 * Binary layout:
 *   version (1 byte) || for each field: length (u32 BE) || bytes
 *
 * Field order: ciphertext, receiverPublicKey, senderEphemeralPublicKey,
 * nonce, senderIdentityPublicKey, signature. Secret keys never appear.
 *
 * JSON layout: `{ v, ...fields }` with each field base64url (unpadded).
 */
import type { EnvelopeJSON, MessageEnvelope } from "./types";
import {
  ENVELOPE_FORMAT_VERSION,
  NONCE_LENGTH,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  TAG_LENGTH,
} from "./constants";
import { EnvelopeFormatError } from "./errors";
import { parsePublicKey } from "./keys";
import { base64ToBytes, bytesToBase64 } from "./encoding";
import {
  validateBase64,
  validateRecord,
  validateUint8Array,
  validateVersion,
} from "./validator";

type EnvelopeField = keyof MessageEnvelope;

const FIELD_ORDER: readonly EnvelopeField[] = [
  "ciphertext",
  "receiverPublicKey",
  "senderEphemeralPublicKey",
  "nonce",
  "senderIdentityPublicKey",
  "signature",
];

const LENGTH_PREFIX = 4;

/**
 * Check field sizes and curve points, returning a frozen envelope with
 * public keys in compressed form.
 */
export function validateEnvelope(fields: Record<EnvelopeField, unknown>): MessageEnvelope {
  const ciphertext = validateUint8Array(fields.ciphertext, "ciphertext", {
    minLength: TAG_LENGTH,
  });
  const nonce = validateUint8Array(fields.nonce, "nonce", {
    exactLength: NONCE_LENGTH,
  });
  const signature = validateUint8Array(fields.signature, "signature", {
    exactLength: SIGNATURE_LENGTH,
  });
  const receiverPublicKey = validateUint8Array(
    fields.receiverPublicKey,
    "receiverPublicKey",
    { exactLength: PUBLIC_KEY_LENGTH },
  );
  const senderEphemeralPublicKey = validateUint8Array(
    fields.senderEphemeralPublicKey,
    "senderEphemeralPublicKey",
    { exactLength: PUBLIC_KEY_LENGTH },
  );
  const senderIdentityPublicKey = validateUint8Array(
    fields.senderIdentityPublicKey,
    "senderIdentityPublicKey",
    { exactLength: PUBLIC_KEY_LENGTH },
  );

  return Object.freeze({
    ciphertext,
    receiverPublicKey: parsePublicKey(receiverPublicKey),
    senderEphemeralPublicKey: parsePublicKey(senderEphemeralPublicKey),
    nonce,
    senderIdentityPublicKey: parsePublicKey(senderIdentityPublicKey),
    signature,
  });
}

export function encodeEnvelope(envelope: MessageEnvelope): Uint8Array {
  const total = FIELD_ORDER.reduce(
    (sum, field) => sum + LENGTH_PREFIX + envelope[field].length,
    1,
  );
  const out = new Uint8Array(total);
  const view = new DataView(out.buffer);

  out[0] = ENVELOPE_FORMAT_VERSION;
  let offset = 1;
  for (const field of FIELD_ORDER) {
    const bytes = envelope[field];
    view.setUint32(offset, bytes.length, false);
    offset += LENGTH_PREFIX;
    out.set(bytes, offset);
    offset += bytes.length;
  }

  return out;
}

export function decodeEnvelope(bytes: Uint8Array): MessageEnvelope {
  if (bytes.length < 1) {
    throw new EnvelopeFormatError("empty input");
  }
  validateVersion(bytes[0], ENVELOPE_FORMAT_VERSION);

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const fields: Partial<Record<EnvelopeField, Uint8Array>> = {};
  let offset = 1;

  for (const field of FIELD_ORDER) {
    if (offset + LENGTH_PREFIX > bytes.length) {
      throw new EnvelopeFormatError("truncated length prefix", field);
    }
    const length = view.getUint32(offset, false);
    offset += LENGTH_PREFIX;

    if (offset + length > bytes.length) {
      throw new EnvelopeFormatError("field exceeds input", field, {
        length,
        remaining: bytes.length - offset,
      });
    }
    fields[field] = bytes.slice(offset, offset + length);
    offset += length;
  }

  if (offset !== bytes.length) {
    throw new EnvelopeFormatError("trailing bytes", undefined, {
      trailing: bytes.length - offset,
    });
  }

  return validateEnvelope({
    ciphertext: fields.ciphertext,
    receiverPublicKey: fields.receiverPublicKey,
    senderEphemeralPublicKey: fields.senderEphemeralPublicKey,
    nonce: fields.nonce,
    senderIdentityPublicKey: fields.senderIdentityPublicKey,
    signature: fields.signature,
  });
}

export function envelopeToJSON(envelope: MessageEnvelope): EnvelopeJSON {
  return {
    v: ENVELOPE_FORMAT_VERSION,
    ciphertext: bytesToBase64(envelope.ciphertext),
    receiverPublicKey: bytesToBase64(envelope.receiverPublicKey),
    senderEphemeralPublicKey: bytesToBase64(envelope.senderEphemeralPublicKey),
    nonce: bytesToBase64(envelope.nonce),
    senderIdentityPublicKey: bytesToBase64(envelope.senderIdentityPublicKey),
    signature: bytesToBase64(envelope.signature),
  };
}

export function envelopeFromJSON(value: unknown): MessageEnvelope {
  const record = validateRecord(value, "envelope");
  validateVersion(record.v, ENVELOPE_FORMAT_VERSION);

  const decodeField = (field: EnvelopeField): Uint8Array =>
    base64ToBytes(validateBase64(record[field], field));

  return validateEnvelope({
    ciphertext: decodeField("ciphertext"),
    receiverPublicKey: decodeField("receiverPublicKey"),
    senderEphemeralPublicKey: decodeField("senderEphemeralPublicKey"),
    nonce: decodeField("nonce"),
    senderIdentityPublicKey: decodeField("senderIdentityPublicKey"),
    signature: decodeField("signature"),
  });
}
