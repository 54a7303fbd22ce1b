import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha256';
import { CipherState } from './encryption.js';
import { dh, generateEphemeralKeyPair, type DeviceKeyPair } from './keys.js';
import { concatBytes, utf8Encode } from './utils.js';

const DHLEN = 32;
const HASHLEN = 32;

/**
 * Supported handshake patterns. Both pre-share the responder's static key.
 */
export type HandshakePattern = 'XK' | 'IK';

type Token = 'e' | 's' | 'ee' | 'es' | 'se' | 'ss';

interface PatternDefinition {
  /** Responder static key must be known to the initiator up front */
  requiresRemoteStatic: boolean;
  messages: Token[][];
}

const PATTERNS: Record<HandshakePattern, PatternDefinition> = {
  XK: {
    requiresRemoteStatic: true,
    messages: [
      ['e', 'es'],
      ['e', 'ee'],
      ['s', 'se'],
    ],
  },
  IK: {
    requiresRemoteStatic: true,
    messages: [
      ['e', 'es', 's', 'ss'],
      ['e', 'ee', 'se'],
    ],
  },
};

/**
 * Parse a pattern label (case-insensitive)
 */
export function parsePattern(label: string): HandshakePattern | null {
  const upper = label.trim().toUpperCase();
  return upper === 'XK' || upper === 'IK' ? upper : null;
}

export function patternRequiresRemoteStatic(pattern: HandshakePattern): boolean {
  return PATTERNS[pattern].requiresRemoteStatic;
}

export function protocolName(pattern: HandshakePattern): string {
  return `Noise_${pattern}_25519_AESGCM_SHA256`;
}

export interface NoiseConfig {
  pattern: HandshakePattern;
  prologue: Uint8Array;
  localStatic: DeviceKeyPair;
  /** Responder static public key (initiator side) */
  remoteStaticPublic?: Uint8Array;
}

/**
 * Noise SymmetricState: chaining key, handshake hash and the cipher
 */
class SymmetricState {
  private ck: Uint8Array;
  private h: Uint8Array;
  private readonly cipher = new CipherState();

  constructor(name: string) {
    const nameBytes = utf8Encode(name);
    if (nameBytes.length <= HASHLEN) {
      this.h = new Uint8Array(HASHLEN);
      this.h.set(nameBytes);
    } else {
      this.h = sha256(nameBytes);
    }
    this.ck = this.h;
  }

  get handshakeHash(): Uint8Array {
    return this.h;
  }

  mixKey(inputKeyMaterial: Uint8Array): void {
    // Noise HKDF with two outputs is HKDF-extract(ck) + expand with empty info
    const output = hkdf(sha256, inputKeyMaterial, this.ck, new Uint8Array(0), HASHLEN * 2);
    this.ck = output.slice(0, HASHLEN);
    this.cipher.initializeKey(output.slice(HASHLEN));
  }

  mixHash(data: Uint8Array): void {
    this.h = sha256(concatBytes(this.h, data));
  }

  hasKey(): boolean {
    return this.cipher.hasKey();
  }

  encryptAndHash(plaintext: Uint8Array): Uint8Array {
    const ciphertext = this.cipher.encryptWithAd(this.h, plaintext);
    this.mixHash(ciphertext);
    return ciphertext;
  }

  decryptAndHash(ciphertext: Uint8Array): Uint8Array {
    const plaintext = this.cipher.decryptWithAd(this.h, ciphertext);
    this.mixHash(ciphertext);
    return plaintext;
  }
}

/**
 * Noise HandshakeState for the XK and IK patterns.
 *
 * The initiator writes messages 0, 2, ...; the responder writes 1, 3, ...
 * Each call to writeMessage/readMessage consumes the next message of the
 * pattern; calling out of turn throws.
 */
export class HandshakeState {
  private readonly symmetric: SymmetricState;
  private readonly definition: PatternDefinition;
  private readonly s: DeviceKeyPair;
  private e: DeviceKeyPair | null = null;
  private rs: Uint8Array | null;
  private re: Uint8Array | null = null;
  private messageIndex = 0;

  private constructor(
    config: NoiseConfig,
    readonly initiator: boolean
  ) {
    this.definition = PATTERNS[config.pattern];
    this.s = config.localStatic;
    this.rs = initiator ? config.remoteStaticPublic ?? null : null;

    if (this.rs && this.rs.length !== DHLEN) {
      throw new Error(`Invalid remote static key length: ${this.rs.length} != ${DHLEN}`);
    }

    this.symmetric = new SymmetricState(protocolName(config.pattern));
    this.symmetric.mixHash(config.prologue);

    // Pre-message: <- s
    if (this.definition.requiresRemoteStatic) {
      const responderStatic = initiator ? this.rs : this.s.publicKey;
      if (!responderStatic) {
        throw new Error(`Pattern ${config.pattern} requires the remote static key`);
      }
      this.symmetric.mixHash(responderStatic);
    }
  }

  static initiator(config: NoiseConfig): HandshakeState {
    return new HandshakeState(config, true);
  }

  static responder(config: Omit<NoiseConfig, 'remoteStaticPublic'>): HandshakeState {
    return new HandshakeState(config, false);
  }

  isFinished(): boolean {
    return this.messageIndex >= this.definition.messages.length;
  }

  /**
   * The peer's static public key once it is known
   */
  get remoteStatic(): Uint8Array | null {
    return this.rs;
  }

  get handshakeHash(): Uint8Array {
    return this.symmetric.handshakeHash;
  }

  writeMessage(payload: Uint8Array = new Uint8Array(0)): Uint8Array {
    const tokens = this.nextTokens(true);
    const parts: Uint8Array[] = [];

    for (const token of tokens) {
      switch (token) {
        case 'e': {
          this.e = generateEphemeralKeyPair();
          parts.push(this.e.publicKey);
          this.symmetric.mixHash(this.e.publicKey);
          break;
        }
        case 's':
          parts.push(this.symmetric.encryptAndHash(this.s.publicKey));
          break;
        default:
          this.symmetric.mixKey(this.computeDh(token));
      }
    }

    parts.push(this.symmetric.encryptAndHash(payload));
    this.messageIndex++;
    return concatBytes(...parts);
  }

  readMessage(message: Uint8Array): Uint8Array {
    const tokens = this.nextTokens(false);
    let offset = 0;

    const take = (length: number): Uint8Array => {
      if (offset + length > message.length) {
        throw new Error('Handshake message too short');
      }
      const slice = message.slice(offset, offset + length);
      offset += length;
      return slice;
    };

    for (const token of tokens) {
      switch (token) {
        case 'e': {
          this.re = take(DHLEN);
          this.symmetric.mixHash(this.re);
          break;
        }
        case 's': {
          const length = this.symmetric.hasKey() ? DHLEN + 16 : DHLEN;
          this.rs = this.symmetric.decryptAndHash(take(length));
          break;
        }
        default:
          this.symmetric.mixKey(this.computeDh(token));
      }
    }

    const payload = this.symmetric.decryptAndHash(message.slice(offset));
    this.messageIndex++;
    return payload;
  }

  private nextTokens(writing: boolean): Token[] {
    if (this.isFinished()) {
      throw new Error('Handshake already finished');
    }
    const initiatorTurn = this.messageIndex % 2 === 0;
    if ((initiatorTurn === this.initiator) !== writing) {
      throw new Error(writing ? 'Not our turn to write' : 'Not our turn to read');
    }
    return this.definition.messages[this.messageIndex];
  }

  private computeDh(token: Exclude<Token, 'e' | 's'>): Uint8Array {
    const local = token[this.initiator ? 0 : 1] === 'e' ? this.e?.privateKey : this.s.privateKey;
    const remote = token[this.initiator ? 1 : 0] === 'e' ? this.re : this.rs;
    if (!local || !remote) {
      throw new Error(`Missing key material for ${token}`);
    }
    return dh(local, remote);
  }
}
