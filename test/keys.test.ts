import { describe, it, expect } from "vitest";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils.js";
import {
  generateKeyPair,
  keyPairFromSecretKey,
  parsePublicKey,
  diffieHellman,
  isValidScalar,
} from "../src/keys";
import {
  InvalidPointError,
  InvalidSecretKeyError,
  RandomSourceError,
} from "../src/errors";
import { createDeterministicRandom, createScriptedRandom } from "./setup";

const G_COMPRESSED =
  "0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798";
const G_UNCOMPRESSED =
  "0479be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798" +
  "483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8";
const TWO_G_COMPRESSED =
  "02c6047f9441ed7d6d3045406e95c07cd85c778e4b8cef3ca7abac09b95c709ee5";
const ORDER =
  "fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141";
const ORDER_MINUS_ONE =
  "fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364140";

function scalar(value: number): Uint8Array {
  const bytes = new Uint8Array(32);
  bytes[31] = value;
  return bytes;
}

describe("Curve Key Provider", () => {
  describe("Key generation", () => {
    it("should generate a compressed public key and a 32-byte secret", () => {
      const keyPair = generateKeyPair();
      expect(keyPair.secretKey.length).toBe(32);
      expect(keyPair.publicKey.length).toBe(33);
      expect([0x02, 0x03]).toContain(keyPair.publicKey[0]);
    });

    it("should derive the public key from the secret key", () => {
      const keyPair = generateKeyPair();
      const rederived = keyPairFromSecretKey(keyPair.secretKey);
      expect(bytesToHex(rederived.publicKey)).toBe(bytesToHex(keyPair.publicKey));
    });

    it("should map the scalar 1 to the generator point", () => {
      const keyPair = keyPairFromSecretKey(scalar(1));
      expect(bytesToHex(keyPair.publicKey)).toBe(G_COMPRESSED);
    });

    it("should produce distinct key pairs", () => {
      const a = generateKeyPair();
      const b = generateKeyPair();
      expect(bytesToHex(a.secretKey)).not.toBe(bytesToHex(b.secretKey));
    });

    it("should be reproducible with a deterministic random source", () => {
      const a = generateKeyPair(createDeterministicRandom("keys"));
      const b = generateKeyPair(createDeterministicRandom("keys"));
      expect(a).toEqual(b);
    });

    it("should skip the zero scalar and scalars at or above the order", () => {
      const valid = scalar(7);
      const random = createScriptedRandom([
        new Uint8Array(32),
        hexToBytes(ORDER),
        valid,
      ]);

      const keyPair = generateKeyPair(random);
      expect(bytesToHex(keyPair.secretKey)).toBe(bytesToHex(valid));
    });

    it("should give up when the random source never yields a valid scalar", () => {
      const random = createScriptedRandom([new Uint8Array(32)]);
      expect(() => generateKeyPair(random)).toThrow(RandomSourceError);
    });

    it("should reject a random source returning the wrong length", () => {
      const random = createScriptedRandom([new Uint8Array(16).fill(1)]);
      expect(() => generateKeyPair(random)).toThrow(RandomSourceError);
    });
  });

  describe("Scalar validation", () => {
    it("should accept 1 and n-1", () => {
      expect(isValidScalar(scalar(1))).toBe(true);
      expect(isValidScalar(hexToBytes(ORDER_MINUS_ONE))).toBe(true);
    });

    it("should reject 0, n and wrong lengths", () => {
      expect(isValidScalar(new Uint8Array(32))).toBe(false);
      expect(isValidScalar(hexToBytes(ORDER))).toBe(false);
      expect(isValidScalar(new Uint8Array(31).fill(1))).toBe(false);
    });

    it("should refuse to import an out-of-range secret key", () => {
      expect(() => keyPairFromSecretKey(new Uint8Array(32))).toThrow(
        InvalidSecretKeyError,
      );
    });
  });

  describe("Public key parsing", () => {
    it("should compress an uncompressed key", () => {
      expect(bytesToHex(parsePublicKey(hexToBytes(G_UNCOMPRESSED)))).toBe(
        G_COMPRESSED,
      );
    });

    it("should return compressed keys unchanged", () => {
      expect(bytesToHex(parsePublicKey(hexToBytes(G_COMPRESSED)))).toBe(
        G_COMPRESSED,
      );
    });

    it("should reject a point that is not on the curve", () => {
      const offCurve = hexToBytes(G_UNCOMPRESSED);
      offCurve[64] ^= 1;
      expect(() => parsePublicKey(offCurve)).toThrow(InvalidPointError);
    });

    it("should reject an x coordinate above the field prime", () => {
      const bytes = new Uint8Array(33).fill(0xff);
      bytes[0] = 0x02;
      expect(() => parsePublicKey(bytes)).toThrow(InvalidPointError);
    });

    it("should reject unknown prefixes and the identity encoding", () => {
      const badPrefix = hexToBytes(G_COMPRESSED);
      badPrefix[0] = 0x05;
      expect(() => parsePublicKey(badPrefix)).toThrow(InvalidPointError);
      expect(() => parsePublicKey(new Uint8Array(33))).toThrow(InvalidPointError);
      expect(() => parsePublicKey(new Uint8Array([0]))).toThrow(InvalidPointError);
    });
  });

  describe("Diffie-Hellman", () => {
    it("should agree on the same secret from both sides", () => {
      const alice = generateKeyPair();
      const bob = generateKeyPair();

      const fromAlice = diffieHellman(alice.secretKey, bob.publicKey);
      const fromBob = diffieHellman(bob.secretKey, alice.publicKey);

      expect(fromAlice.length).toBe(32);
      expect(bytesToHex(fromAlice)).toBe(bytesToHex(fromBob));
    });

    it("should return the x coordinate of the product point", () => {
      const fromOne = diffieHellman(scalar(1), hexToBytes(TWO_G_COMPRESSED));
      const fromTwo = diffieHellman(scalar(2), hexToBytes(G_COMPRESSED));

      expect(bytesToHex(fromOne)).toBe(TWO_G_COMPRESSED.slice(2));
      expect(bytesToHex(fromTwo)).toBe(TWO_G_COMPRESSED.slice(2));
    });

    it("should differ for unrelated peers", () => {
      const alice = generateKeyPair();
      const bob = generateKeyPair();
      const carol = generateKeyPair();

      expect(bytesToHex(diffieHellman(alice.secretKey, bob.publicKey))).not.toBe(
        bytesToHex(diffieHellman(alice.secretKey, carol.publicKey)),
      );
    });

    it("should reject an invalid peer point before any arithmetic", () => {
      const alice = generateKeyPair();
      const offCurve = hexToBytes(G_UNCOMPRESSED);
      offCurve[64] ^= 1;

      expect(() => diffieHellman(alice.secretKey, offCurve)).toThrow(
        InvalidPointError,
      );
      expect(() => diffieHellman(alice.secretKey, new Uint8Array(33))).toThrow(
        InvalidPointError,
      );
    });

    it("should reject an invalid secret scalar", () => {
      expect(() =>
        diffieHellman(new Uint8Array(32), hexToBytes(G_COMPRESSED)),
      ).toThrow(InvalidSecretKeyError);
    });
  });
});
