export {
  DOMAIN_SEPARATOR,
  secureRandomBytes,
  concatBytes,
  hexToBytes,
  hexToBytes32,
  bytesToHex,
  utf8Encode,
  utf8Decode,
} from './utils.js';

export {
  type DeviceKeyPair,
  deriveDeviceKeyPair,
  generateDeviceKeyPair,
  generateDeviceId,
  generateEphemeralKeyPair,
  getPublicKeyFromPrivate,
  describeKeys,
  dh,
} from './keys.js';

export {
  NONCE_SIZE,
  TAG_SIZE,
  CipherState,
  counterNonce,
} from './encryption.js';

export {
  type HandshakePattern,
  type NoiseConfig,
  HandshakeState,
  parsePattern,
  patternRequiresRemoteStatic,
  protocolName,
} from './noise.js';
