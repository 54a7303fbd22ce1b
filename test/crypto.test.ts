import { describe, it, expect } from 'vitest';
import {
  CipherState,
  HandshakeState,
  bytesToHex,
  concatBytes,
  counterNonce,
  deriveDeviceKeyPair,
  describeKeys,
  generateDeviceId,
  generateDeviceKeyPair,
  getPublicKeyFromPrivate,
  hexToBytes,
  hexToBytes32,
  parsePattern,
  protocolName,
  utf8Decode,
  utf8Encode,
  type DeviceKeyPair,
  type HandshakePattern,
} from '../src/crypto/index.js';

describe('Crypto Utils', () => {
  describe('hexToBytes / bytesToHex', () => {
    it('should convert hex to bytes and back', () => {
      const hex = 'deadbeef0102030405060708090a0b0c0d0e0f';
      const bytes = hexToBytes(hex);
      expect(bytesToHex(bytes)).toBe(hex);
    });

    it('should handle 0x prefix and surrounding whitespace', () => {
      expect(bytesToHex(hexToBytes('0xdeadbeef'))).toBe('deadbeef');
      expect(bytesToHex(hexToBytes('  beef\n'))).toBe('beef');
    });

    it('should throw on invalid hex length', () => {
      expect(() => hexToBytes('abc')).toThrow('Invalid hex string length');
    });

    it('should throw on non-hex digits', () => {
      expect(() => hexToBytes('zz')).toThrow('Invalid hex digit');
    });

    it('should require exactly 32 bytes for keys', () => {
      expect(hexToBytes32('11'.repeat(32))).toHaveLength(32);
      expect(() => hexToBytes32('11'.repeat(31))).toThrow('Expected 32 bytes, got 31');
    });
  });

  describe('utf8', () => {
    it('should reject malformed input', () => {
      expect(utf8Decode(utf8Encode('héllo'))).toBe('héllo');
      expect(() => utf8Decode(new Uint8Array([0xff, 0xfe]))).toThrow();
    });
  });

  describe('concatBytes', () => {
    it('should join arrays in order', () => {
      const joined = concatBytes(new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3]));
      expect(Array.from(joined)).toEqual([1, 2, 3]);
    });
  });
});

describe('Device identity', () => {
  it('should derive the same key pair from the same seed', () => {
    const seed = new Uint8Array(64).fill(7);
    const first = deriveDeviceKeyPair(seed);
    const second = deriveDeviceKeyPair(seed);

    expect(bytesToHex(first.privateKey)).toBe(bytesToHex(second.privateKey));
    expect(bytesToHex(first.publicKey)).toBe(bytesToHex(second.publicKey));
    expect(bytesToHex(first.publicKey)).toBe(bytesToHex(getPublicKeyFromPrivate(first.privateKey)));
  });

  it('should derive different key pairs from different seeds', () => {
    const a = deriveDeviceKeyPair(new Uint8Array(64).fill(1));
    const b = deriveDeviceKeyPair(new Uint8Array(64).fill(2));
    expect(bytesToHex(a.publicKey)).not.toBe(bytesToHex(b.publicKey));
  });

  it('should reject short seeds', () => {
    expect(() => deriveDeviceKeyPair(new Uint8Array(16))).toThrow('Seed too short');
  });

  it('should generate 32-byte keys', () => {
    const keys = generateDeviceKeyPair();
    expect(keys.privateKey).toHaveLength(32);
    expect(keys.publicKey).toHaveLength(32);
  });

  it('should build device ids from a prefix and a timestamp', () => {
    expect(generateDeviceId('device', 1700000000123)).toBe('device-1700000000123');
    expect(generateDeviceId('cli')).toMatch(/^cli-\d+$/);
  });

  it('should describe keys one field per line', () => {
    const keys: DeviceKeyPair = {
      privateKey: new Uint8Array(32).fill(0xaa),
      publicKey: new Uint8Array(32).fill(0xbb),
    };
    expect(describeKeys('device-1', keys).split('\n')).toEqual([
      'device_id=device-1',
      `public_key=${'bb'.repeat(32)}`,
      `private_key=${'aa'.repeat(32)}`,
    ]);
  });
});

describe('CipherState', () => {
  it('should build nonces as four zero bytes and a big-endian counter', () => {
    expect(bytesToHex(counterNonce(0n))).toBe('000000000000000000000000');
    expect(bytesToHex(counterNonce(258n))).toBe('000000000000000000000102');
  });

  it('should pass data through before a key is installed', () => {
    const cipher = new CipherState();
    const data = new Uint8Array([1, 2, 3]);
    expect(cipher.hasKey()).toBe(false);
    expect(cipher.encryptWithAd(new Uint8Array(0), data)).toBe(data);
  });

  it('should encrypt and decrypt with matching counters', () => {
    const key = new Uint8Array(32).fill(9);
    const sender = new CipherState();
    const receiver = new CipherState();
    sender.initializeKey(key);
    receiver.initializeKey(key);

    const ad = utf8Encode('ad');
    const first = sender.encryptWithAd(ad, utf8Encode('one'));
    const second = sender.encryptWithAd(ad, utf8Encode('two'));

    expect(first).toHaveLength(3 + 16);
    expect(utf8Decode(receiver.decryptWithAd(ad, first))).toBe('one');
    expect(utf8Decode(receiver.decryptWithAd(ad, second))).toBe('two');
  });

  it('should reject the wrong associated data', () => {
    const key = new Uint8Array(32).fill(9);
    const sender = new CipherState();
    const receiver = new CipherState();
    sender.initializeKey(key);
    receiver.initializeKey(key);

    const ciphertext = sender.encryptWithAd(utf8Encode('a'), utf8Encode('secret'));
    expect(() => receiver.decryptWithAd(utf8Encode('b'), ciphertext)).toThrow();
  });

  it('should reject keys of the wrong size', () => {
    expect(() => new CipherState().initializeKey(new Uint8Array(16))).toThrow('Invalid key length');
  });
});

describe('Noise handshake', () => {
  const prologue = utf8Encode('burrow');

  function setup(pattern: HandshakePattern) {
    const client = generateDeviceKeyPair();
    const server = generateDeviceKeyPair();
    const initiator = HandshakeState.initiator({
      pattern,
      prologue,
      localStatic: client,
      remoteStaticPublic: server.publicKey,
    });
    const responder = HandshakeState.responder({ pattern, prologue, localStatic: server });
    return { client, server, initiator, responder };
  }

  it('should parse pattern labels case-insensitively', () => {
    expect(parsePattern('xk')).toBe('XK');
    expect(parsePattern(' IK ')).toBe('IK');
    expect(parsePattern('NN')).toBeNull();
  });

  it('should name the protocol', () => {
    expect(protocolName('XK')).toBe('Noise_XK_25519_AESGCM_SHA256');
  });

  it('should complete XK in three messages', () => {
    const { client, initiator, responder } = setup('XK');

    responder.readMessage(initiator.writeMessage());
    const reply = responder.writeMessage(utf8Encode('{"session":"s-1"}'));
    expect(utf8Decode(initiator.readMessage(reply))).toBe('{"session":"s-1"}');
    expect(initiator.isFinished()).toBe(false);

    responder.readMessage(initiator.writeMessage());

    expect(initiator.isFinished()).toBe(true);
    expect(responder.isFinished()).toBe(true);
    expect(bytesToHex(responder.remoteStatic ?? new Uint8Array(0))).toBe(bytesToHex(client.publicKey));
    expect(bytesToHex(initiator.handshakeHash)).toBe(bytesToHex(responder.handshakeHash));
  });

  it('should complete IK in two messages', () => {
    const { client, initiator, responder } = setup('IK');

    responder.readMessage(initiator.writeMessage());
    expect(bytesToHex(responder.remoteStatic ?? new Uint8Array(0))).toBe(bytesToHex(client.publicKey));

    initiator.readMessage(responder.writeMessage());

    expect(initiator.isFinished()).toBe(true);
    expect(responder.isFinished()).toBe(true);
    expect(bytesToHex(initiator.handshakeHash)).toBe(bytesToHex(responder.handshakeHash));
  });

  it('should produce a 48-byte XK opener with an empty payload', () => {
    const { initiator } = setup('XK');
    // e (32) + encrypted empty payload (16-byte tag)
    expect(initiator.writeMessage()).toHaveLength(48);
  });

  it('should fail when the responder static key does not match', () => {
    const { initiator } = setup('XK');
    const impostor = HandshakeState.responder({
      pattern: 'XK',
      prologue,
      localStatic: generateDeviceKeyPair(),
    });
    expect(() => impostor.readMessage(initiator.writeMessage())).toThrow();
  });

  it('should fail when the prologues differ', () => {
    const { server, initiator } = setup('XK');
    const responder = HandshakeState.responder({
      pattern: 'XK',
      prologue: utf8Encode('other'),
      localStatic: server,
    });
    expect(() => responder.readMessage(initiator.writeMessage())).toThrow();
  });

  it('should detect a tampered message', () => {
    const { initiator, responder } = setup('XK');
    const message = initiator.writeMessage();
    message[message.length - 1] ^= 0x01;
    expect(() => responder.readMessage(message)).toThrow();
  });

  it('should reject truncated messages', () => {
    const { responder } = setup('XK');
    expect(() => responder.readMessage(new Uint8Array(10))).toThrow('Handshake message too short');
  });

  it('should enforce turn order', () => {
    const { initiator, responder } = setup('XK');
    expect(() => initiator.readMessage(new Uint8Array(48))).toThrow('Not our turn to read');
    expect(() => responder.writeMessage()).toThrow('Not our turn to write');
  });

  it('should refuse messages after completion', () => {
    const { initiator, responder } = setup('IK');
    responder.readMessage(initiator.writeMessage());
    initiator.readMessage(responder.writeMessage());
    expect(() => initiator.writeMessage()).toThrow('Handshake already finished');
  });

  it('should require the remote static key on the initiator', () => {
    expect(() =>
      HandshakeState.initiator({ pattern: 'XK', prologue, localStatic: generateDeviceKeyPair() })
    ).toThrow('Pattern XK requires the remote static key');
  });
});
