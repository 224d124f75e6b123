// validator.ts
import { EnvelopeFormatError } from "./errors";

export interface ValidationOptions {
  minLength?: number;
  exactLength?: number;
}

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

function checkLength(
  length: number,
  name: string,
  unit: string,
  options?: ValidationOptions,
): void {
  if (length === 0) {
    throw new EnvelopeFormatError(`${name} must not be empty`, name);
  }

  if (options?.exactLength !== undefined && length !== options.exactLength) {
    throw new EnvelopeFormatError(
      `${name} must be exactly ${options.exactLength} ${unit}`,
      name,
      { length, exactLength: options.exactLength },
    );
  }

  if (options?.minLength !== undefined && length < options.minLength) {
    throw new EnvelopeFormatError(
      `${name} must be at least ${options.minLength} ${unit}`,
      name,
      { length, minLength: options.minLength },
    );
  }
}

// Basic type validators
export function validateUint8Array(
  value: unknown,
  name: string,
  options?: ValidationOptions,
): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new EnvelopeFormatError(`${name} must be a Uint8Array`, name);
  }

  checkLength(value.length, name, "bytes", options);
  return value;
}

export function validateBase64(value: unknown, name: string): string {
  if (typeof value !== "string") {
    throw new EnvelopeFormatError(`${name} must be a string`, name);
  }

  if (value.trim() === "") {
    throw new EnvelopeFormatError(`${name} must not be empty`, name);
  }

  if (!BASE64URL_PATTERN.test(value) || value.length % 4 === 1) {
    throw new EnvelopeFormatError(`${name} must be valid base64url`, name);
  }

  return value;
}

export function validateRecord(
  value: unknown,
  name: string,
): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new EnvelopeFormatError(`${name} must be an object`, name);
  }
  return Object.fromEntries(Object.entries(value));
}

export function validateVersion(value: unknown, expected: number): number {
  if (value !== expected) {
    throw new EnvelopeFormatError("Unsupported envelope version", "v", {
      received: value,
      expected,
    });
  }
  return expected;
}
