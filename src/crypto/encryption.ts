import { gcm } from '@noble/ciphers/aes';

/**
 * AES-GCM nonce size in bytes (96 bits = 12 bytes)
 */
export const NONCE_SIZE = 12;

/**
 * AES-GCM authentication tag size in bytes (128 bits = 16 bytes)
 */
export const TAG_SIZE = 16;

/**
 * Largest nonce counter Noise allows before the key is exhausted
 */
const MAX_NONCE = 2n ** 64n - 1n;

/**
 * Build the Noise AESGCM nonce: 32 bits of zeros followed by the
 * 64-bit counter, big-endian.
 */
export function counterNonce(counter: bigint): Uint8Array {
  const nonce = new Uint8Array(NONCE_SIZE);
  new DataView(nonce.buffer).setBigUint64(4, counter, false);
  return nonce;
}

/**
 * Noise CipherState over AES-256-GCM.
 * Before a key is installed, encryption and decryption pass data through.
 */
export class CipherState {
  private key: Uint8Array | null = null;
  private counter = 0n;

  initializeKey(key: Uint8Array): void {
    if (key.length !== 32) {
      throw new Error('Invalid key length: expected 32 bytes for AES-256');
    }
    this.key = key;
    this.counter = 0n;
  }

  hasKey(): boolean {
    return this.key !== null;
  }

  /**
   * Encrypt with associated data, advancing the nonce counter
   */
  encryptWithAd(ad: Uint8Array, plaintext: Uint8Array): Uint8Array {
    if (!this.key) {
      return plaintext;
    }
    const cipher = gcm(this.key, this.nextNonce(), ad);
    return cipher.encrypt(plaintext);
  }

  /**
   * Decrypt with associated data (throws if the auth tag does not verify)
   */
  decryptWithAd(ad: Uint8Array, ciphertext: Uint8Array): Uint8Array {
    if (!this.key) {
      return ciphertext;
    }
    if (ciphertext.length < TAG_SIZE) {
      throw new Error('Ciphertext too short to contain an authentication tag');
    }
    const cipher = gcm(this.key, this.nextNonce(), ad);
    return cipher.decrypt(ciphertext);
  }

  private nextNonce(): Uint8Array {
    if (this.counter >= MAX_NONCE) {
      throw new Error('Nonce space exhausted');
    }
    const nonce = counterNonce(this.counter);
    this.counter += 1n;
    return nonce;
  }
}
