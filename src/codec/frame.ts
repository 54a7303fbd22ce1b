import { z } from 'zod';
import {
  FRAME_HEADER_SIZE,
  LENGTH_PREFIX_SIZE,
  MAX_FRAME_SIZE,
  FrameType,
  PayloadKind,
  type ControlProperties,
  type DecodeResult,
  type Frame,
  type JsonValue,
} from './types.js';
import { utf8Decode, utf8Encode } from '../crypto/utils.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const controlPropertiesSchema = z.record(jsonValueSchema);

export function isFrameType(value: number): value is FrameType {
  return FrameType[value] !== undefined;
}

/**
 * Encode a frame to its length-prefixed binary form
 *
 * Binary layout (4 + 18 + payload bytes):
 * [0-3]    body length  (u32, big-endian)
 * [4-11]   channelId    (u64, big-endian)
 * [12-19]  sequence     (u64, big-endian)
 * [20]     frameType    (1 byte)
 * [21]     payloadKind  (1 byte, 0 = control JSON, 1 = opaque)
 * [22+]    payload      (variable)
 */
export function encodeFrame(frame: Frame): Uint8Array {
  assertWireId('channel id', frame.channelId);
  assertWireId('sequence', frame.sequence);

  const payloadKind = frame.payload.kind === 'control' ? PayloadKind.Control : PayloadKind.Opaque;
  const payload = frame.payload.kind === 'control'
    ? utf8Encode(JSON.stringify(frame.payload.properties))
    : frame.payload.bytes;

  const bodyLength = FRAME_HEADER_SIZE + payload.length;
  if (bodyLength > MAX_FRAME_SIZE) {
    throw new Error(`Frame too large: ${bodyLength} > ${MAX_FRAME_SIZE}`);
  }

  const buffer = new Uint8Array(LENGTH_PREFIX_SIZE + bodyLength);
  const view = new DataView(buffer.buffer);

  view.setUint32(0, bodyLength, false);
  view.setBigUint64(4, BigInt(frame.channelId), false);
  view.setBigUint64(12, BigInt(frame.sequence), false);
  buffer[20] = frame.frameType;
  buffer[21] = payloadKind;
  buffer.set(payload, LENGTH_PREFIX_SIZE + FRAME_HEADER_SIZE);

  return buffer;
}

/**
 * Decode one frame from the front of a buffer.
 * Returns `incomplete` when the buffer does not yet hold a whole frame.
 */
export function decodeFrame(data: Uint8Array): DecodeResult {
  if (data.length < LENGTH_PREFIX_SIZE) {
    return { status: 'incomplete' };
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const bodyLength = view.getUint32(0, false);

  if (bodyLength > MAX_FRAME_SIZE) {
    return { status: 'error', reason: `frame too large: ${bodyLength}` };
  }
  if (bodyLength < FRAME_HEADER_SIZE) {
    return { status: 'error', reason: `frame too short: ${bodyLength}` };
  }
  if (data.length < LENGTH_PREFIX_SIZE + bodyLength) {
    return { status: 'incomplete' };
  }

  const channelId = view.getBigUint64(4, false);
  const sequence = view.getBigUint64(12, false);
  if (channelId > BigInt(Number.MAX_SAFE_INTEGER) || sequence > BigInt(Number.MAX_SAFE_INTEGER)) {
    return { status: 'error', reason: 'frame id out of range' };
  }

  const frameType = data[20];
  if (!isFrameType(frameType)) {
    return { status: 'error', reason: `invalid frame type: ${frameType}` };
  }

  const consumed = LENGTH_PREFIX_SIZE + bodyLength;
  const payloadBytes = data.slice(LENGTH_PREFIX_SIZE + FRAME_HEADER_SIZE, consumed);
  const base = { channelId: Number(channelId), sequence: Number(sequence), frameType };

  switch (data[21]) {
    case PayloadKind.Opaque:
      return {
        status: 'frame',
        frame: { ...base, payload: { kind: 'opaque', bytes: payloadBytes } },
        consumed,
      };
    case PayloadKind.Control: {
      const properties = parseControl(payloadBytes);
      if (!properties) {
        return { status: 'error', reason: 'invalid control payload' };
      }
      return {
        status: 'frame',
        frame: { ...base, payload: { kind: 'control', properties } },
        consumed,
      };
    }
    default:
      return { status: 'error', reason: `invalid payload kind: ${data[21]}` };
  }
}

/**
 * Build a frame with a control envelope payload
 */
export function controlFrame(
  frameType: FrameType,
  channelId: number,
  sequence: number,
  properties: ControlProperties
): Frame {
  return { channelId, sequence, frameType, payload: { kind: 'control', properties } };
}

/**
 * Build a frame with an opaque payload
 */
export function opaqueFrame(
  frameType: FrameType,
  channelId: number,
  sequence: number,
  bytes: Uint8Array
): Frame {
  return { channelId, sequence, frameType, payload: { kind: 'opaque', bytes } };
}

/**
 * Control properties of a frame, or null for opaque payloads
 */
export function controlProperties(frame: Frame): ControlProperties | null {
  return frame.payload.kind === 'control' ? frame.payload.properties : null;
}

export function frameTypeName(frameType: FrameType): string {
  return FrameType[frameType];
}

function parseControl(bytes: Uint8Array): ControlProperties | null {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8Decode(bytes));
  } catch {
    return null;
  }
  const parsed = controlPropertiesSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function assertWireId(label: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
}
