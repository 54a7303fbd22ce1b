// Engine
export {
  createEngine,
  EngineHandle,
  EngineError,
  EngineOfflineError,
  type Engine,
  type EngineCommand,
  type ClientEvent,
  type EngineErrorKind,
  type EngineErrorCategory,
} from './engine/index.js';

// Configuration
export {
  DEFAULT_CLIENT_ID,
  DEFAULT_ENGINE_CONFIG,
  resolveConfig,
  type EngineConfig,
  type ResolvedEngineConfig,
} from './types.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Codec
export {
  FrameType,
  PayloadKind,
  PROTOCOL_VERSION,
  MAX_FRAME_SIZE,
  encodeFrame,
  decodeFrame,
  controlFrame,
  opaqueFrame,
  frameTypeName,
  type Frame,
  type FramePayload,
  type ControlProperties,
  type DecodeResult,
} from './codec/index.js';

// Crypto utilities
export {
  generateDeviceKeyPair,
  deriveDeviceKeyPair,
  generateDeviceId,
  describeKeys,
  hexToBytes,
  bytesToHex,
  HandshakeState,
  type DeviceKeyPair,
  type HandshakePattern,
} from './crypto/index.js';

// Profiles
export {
  createProfile,
  parseProfile,
  normalizeProfile,
  mergeUserIdentity,
  deviceKeyPairFromProfile,
  FileProfileStore,
  defaultProfilePath,
  type Profile,
  type ProfileParams,
  type ProfileStore,
} from './profile/index.js';

// Transport
export {
  Http2Connector,
  parseServerTarget,
  type TransportConnector,
  type TransportSession,
  type FrameStream,
  type ServerTarget,
} from './transport/index.js';
