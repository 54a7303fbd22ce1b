import { randomBytes } from '@noble/ciphers/webcrypto';

/**
 * Domain separator for device key derivation
 */
export const DOMAIN_SEPARATOR = 'burrow-device-v1';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Generate cryptographically secure random bytes
 */
export function secureRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert hex string to Uint8Array.
 * Accepts an optional 0x prefix and surrounding whitespace.
 */
export function hexToBytes(hex: string): Uint8Array {
  const trimmed = hex.trim();
  const cleanHex = trimmed.startsWith('0x') ? trimmed.slice(2) : trimmed;
  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string length');
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw new Error('Invalid hex digit');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Decode a hex string that must hold exactly 32 bytes (keys)
 */
export function hexToBytes32(hex: string): Uint8Array {
  const bytes = hexToBytes(hex);
  if (bytes.length !== 32) {
    throw new Error(`Expected 32 bytes, got ${bytes.length}`);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function utf8Encode(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Decode UTF-8, throwing on malformed input
 */
export function utf8Decode(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}
