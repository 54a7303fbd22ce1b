/**
 * Protocol version advertised in the Hello frame
 */
export const PROTOCOL_VERSION = 1;

/**
 * Frame length prefix size in bytes (u32, big-endian)
 */
export const LENGTH_PREFIX_SIZE = 4;

/**
 * Fixed part of a frame body:
 * channelId(8) + sequence(8) + frameType(1) + payloadKind(1) = 18 bytes
 */
export const FRAME_HEADER_SIZE = 18;

/**
 * Largest accepted frame body (16 MiB)
 */
export const MAX_FRAME_SIZE = 16 * 1024 * 1024;

/**
 * Frame types
 */
export enum FrameType {
  Hello = 0x01,        // Handshake opener (client → server)
  Auth = 0x02,         // Handshake continuation (both directions)
  Join = 0x03,         // Join a channel
  Leave = 0x04,        // Leave a channel
  Msg = 0x05,          // Opaque chat payload
  Ack = 0x06,          // Acknowledgement (handshake completion or delivery)
  Typing = 0x07,
  Presence = 0x08,
  KeyUpdate = 0x09,
  GroupCreate = 0x0a,
  GroupInvite = 0x0b,
  GroupEvent = 0x0c,
  CallOffer = 0x0d,
  CallAnswer = 0x0e,
  CallEnd = 0x0f,
  VoiceFrame = 0x10,
  VideoFrame = 0x11,
  CallStats = 0x12,
  Error = 0x13,        // Server-side error report
}

/**
 * Payload kind tag on the wire
 */
export enum PayloadKind {
  Control = 0x00,
  Opaque = 0x01,
}

/**
 * JSON value carried by control envelopes
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Structured (key/value) frame payload
 */
export type ControlProperties = { [key: string]: JsonValue };

export type FramePayload =
  | { kind: 'control'; properties: ControlProperties }
  | { kind: 'opaque'; bytes: Uint8Array };

/**
 * Atomic wire unit
 */
export interface Frame {
  channelId: number;
  sequence: number;
  frameType: FrameType;
  payload: FramePayload;
}

/**
 * Result of decoding from the front of a byte buffer
 */
export type DecodeResult =
  | { status: 'frame'; frame: Frame; consumed: number }
  | { status: 'incomplete' }
  | { status: 'error'; reason: string };
