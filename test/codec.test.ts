import { describe, it, expect } from "vitest";
import { Sealpost } from "../src/sealpost";
import {
  encodeEnvelope,
  decodeEnvelope,
  envelopeToJSON,
  envelopeFromJSON,
} from "../src/codec";
import { bytesToString } from "../src/encoding";
import { EnvelopeFormatError, InvalidPointError } from "../src/errors";
import { validateBase64, validateUint8Array } from "../src/validator";

describe("Envelope codec", () => {
  const sealpost = new Sealpost();
  const alice = sealpost.generateKeyPair();
  const bob = sealpost.generateKeyPair();
  const envelope = sealpost.seal("milady", alice, bob.publicKey);

  describe("Binary", () => {
    it("should length-prefix six fields after a version byte", () => {
      const bytes = encodeEnvelope(envelope);

      // 1 + 6 * 4 + (22 + 33 + 33 + 12 + 33 + 64)
      expect(bytes.length).toBe(222);
      expect(bytes[0]).toBe(1);
      expect(Array.from(bytes.slice(1, 5))).toEqual([0, 0, 0, 22]);
    });

    it("should decode what it encodes", () => {
      const decoded = decodeEnvelope(encodeEnvelope(envelope));
      expect(decoded).toEqual(envelope);
      expect(bytesToString(sealpost.open(decoded, bob.secretKey).plaintext)).toBe(
        "milady",
      );
    });

    it("should decode from a view into a larger buffer", () => {
      const encoded = encodeEnvelope(envelope);
      const padded = new Uint8Array(encoded.length + 8);
      padded.set(encoded, 4);

      expect(decodeEnvelope(padded.subarray(4, 4 + encoded.length))).toEqual(envelope);
    });

    it("should reject empty input and unknown versions", () => {
      expect(() => decodeEnvelope(new Uint8Array(0))).toThrow(EnvelopeFormatError);

      const bytes = encodeEnvelope(envelope);
      bytes[0] = 2;
      expect(() => decodeEnvelope(bytes)).toThrow(EnvelopeFormatError);
    });

    it("should reject truncated input", () => {
      const bytes = encodeEnvelope(envelope);
      expect(() => decodeEnvelope(bytes.slice(0, bytes.length - 1))).toThrow(
        EnvelopeFormatError,
      );
      expect(() => decodeEnvelope(bytes.slice(0, 3))).toThrow(EnvelopeFormatError);
    });

    it("should reject trailing bytes", () => {
      const bytes = encodeEnvelope(envelope);
      const extended = new Uint8Array(bytes.length + 1);
      extended.set(bytes);
      expect(() => decodeEnvelope(extended)).toThrow(EnvelopeFormatError);
    });

    it("should name the field with the wrong size", () => {
      const bytes = encodeEnvelope({ ...envelope, nonce: new Uint8Array(11) });

      try {
        decodeEnvelope(bytes);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EnvelopeFormatError);
        if (error instanceof EnvelopeFormatError) {
          expect(error.field).toBe("nonce");
          expect(error.message).toBe(
            "Malformed envelope: nonce must be exactly 12 bytes",
          );
        }
      }
    });

    it("should reject a ciphertext shorter than the tag", () => {
      const bytes = encodeEnvelope({ ...envelope, ciphertext: new Uint8Array(15) });
      expect(() => decodeEnvelope(bytes)).toThrow(EnvelopeFormatError);
    });

    it("should reject public keys that are not curve points", () => {
      const bytes = encodeEnvelope({
        ...envelope,
        senderEphemeralPublicKey: new Uint8Array(33),
      });
      expect(() => decodeEnvelope(bytes)).toThrow(InvalidPointError);
    });
  });

  describe("JSON", () => {
    it("should encode every field as unpadded base64url", () => {
      const json = envelopeToJSON(envelope);

      expect(json.v).toBe(1);
      expect(json.nonce.length).toBe(16);
      expect(json.signature.length).toBe(86);
      expect(json.receiverPublicKey.length).toBe(44);
      expect(json.ciphertext).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it("should survive a trip through JSON text", () => {
      const text = JSON.stringify(sealpost.toJSON(envelope));
      const restored = sealpost.fromJSON(JSON.parse(text));

      expect(restored).toEqual(envelope);
      expect(bytesToString(sealpost.open(restored, bob.secretKey).plaintext)).toBe(
        "milady",
      );
    });

    it("should reject non-objects and unknown versions", () => {
      expect(() => envelopeFromJSON(null)).toThrow(EnvelopeFormatError);
      expect(() => envelopeFromJSON([])).toThrow(EnvelopeFormatError);
      expect(() =>
        envelopeFromJSON({ ...envelopeToJSON(envelope), v: 2 }),
      ).toThrow(EnvelopeFormatError);
    });

    it("should reject missing and non-base64url fields", () => {
      const { signature: _omitted, ...missing } = envelopeToJSON(envelope);
      expect(() => envelopeFromJSON(missing)).toThrow("signature must be a string");

      expect(() =>
        envelopeFromJSON({ ...envelopeToJSON(envelope), nonce: "a+b/c=" }),
      ).toThrow("nonce must be valid base64url");
    });
  });

  describe("Facade", () => {
    it("should expose encode and decode", () => {
      expect(sealpost.decode(sealpost.encode(envelope))).toEqual(envelope);
    });
  });

  describe("Field validation", () => {
    it("should never accept an empty field", () => {
      expect(() => validateUint8Array(new Uint8Array(0), "ciphertext")).toThrow(
        "Malformed envelope: ciphertext must not be empty",
      );
      expect(() => validateBase64("", "nonce")).toThrow(
        "Malformed envelope: nonce must not be empty",
      );
    });

    it("should apply exact and minimum lengths", () => {
      expect(() =>
        validateUint8Array(new Uint8Array(11), "nonce", { exactLength: 12 }),
      ).toThrow("Malformed envelope: nonce must be exactly 12 bytes");
      expect(() =>
        validateUint8Array(new Uint8Array(15), "ciphertext", { minLength: 16 }),
      ).toThrow("Malformed envelope: ciphertext must be at least 16 bytes");
      expect(
        validateUint8Array(new Uint8Array(16), "ciphertext", { minLength: 16 }),
      ).toHaveLength(16);
    });
  });
});
