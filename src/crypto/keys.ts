import { x25519 } from '@noble/curves/ed25519';
import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha256';
import { DOMAIN_SEPARATOR, secureRandomBytes, bytesToHex, utf8Encode } from './utils.js';

/**
 * Device static key pair used as the Noise local static key
 */
export interface DeviceKeyPair {
  privateKey: Uint8Array;  // 32 bytes X25519 scalar
  publicKey: Uint8Array;   // 32 bytes X25519 public key
}

/**
 * Derive a device key pair from seed material.
 * Uses HKDF-SHA256 with a domain separator so the same seed always
 * produces the same device identity.
 */
export function deriveDeviceKeyPair(seed: Uint8Array): DeviceKeyPair {
  if (seed.length < 32) {
    throw new Error(`Seed too short: expected at least 32 bytes, got ${seed.length}`);
  }

  const privateKey = hkdf(
    sha256,
    seed,
    new Uint8Array(0), // salt
    utf8Encode(DOMAIN_SEPARATOR),
    32 // output length
  );

  return { privateKey, publicKey: x25519.getPublicKey(privateKey) };
}

/**
 * Generate a fresh device key pair from 64 bytes of entropy
 */
export function generateDeviceKeyPair(): DeviceKeyPair {
  return deriveDeviceKeyPair(secureRandomBytes(64));
}

/**
 * Generate a device identifier of the form `<prefix>-<epoch millis>`
 */
export function generateDeviceId(prefix: string, now: number = Date.now()): string {
  return `${prefix}-${now}`;
}

/**
 * Generate an ephemeral X25519 key pair
 */
export function generateEphemeralKeyPair(): DeviceKeyPair {
  const privateKey = x25519.utils.randomPrivateKey();
  return { privateKey, publicKey: x25519.getPublicKey(privateKey) };
}

/**
 * Get the X25519 public key for a private key
 */
export function getPublicKeyFromPrivate(privateKey: Uint8Array): Uint8Array {
  return x25519.getPublicKey(privateKey);
}

/**
 * Compute a raw X25519 shared secret
 */
export function dh(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  return x25519.getSharedSecret(privateKey, publicKey);
}

/**
 * Human-readable dump of a device identity (for provisioning output)
 */
export function describeKeys(deviceId: string, keys: DeviceKeyPair): string {
  return [
    `device_id=${deviceId}`,
    `public_key=${bytesToHex(keys.publicKey)}`,
    `private_key=${bytesToHex(keys.privateKey)}`,
  ].join('\n');
}
