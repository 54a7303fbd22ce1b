export {
  PROTOCOL_VERSION,
  LENGTH_PREFIX_SIZE,
  FRAME_HEADER_SIZE,
  MAX_FRAME_SIZE,
  FrameType,
  PayloadKind,
  type JsonValue,
  type ControlProperties,
  type FramePayload,
  type Frame,
  type DecodeResult,
} from './types.js';

export {
  encodeFrame,
  decodeFrame,
  controlFrame,
  opaqueFrame,
  controlProperties,
  frameTypeName,
  isFrameType,
} from './frame.js';
