import { z } from 'zod';
import {
  FrameType,
  PROTOCOL_VERSION,
  controlFrame,
  controlProperties,
  decodeFrame,
  frameTypeName,
  type ControlProperties,
  type Frame,
} from '../codec/index.js';
import {
  HandshakeState,
  bytesToHex,
  concatBytes,
  hexToBytes,
  hexToBytes32,
  parsePattern,
  patternRequiresRemoteStatic,
  utf8Decode,
  utf8Encode,
  type DeviceKeyPair,
  type HandshakePattern,
} from '../crypto/index.js';
import type { Logger } from '../logger.js';
import {
  deviceKeyPairFromProfile,
  mergeUserIdentity,
  type Profile,
  type UserIdentity,
} from '../profile/types.js';
import { EngineError, unreachable } from './errors.js';
import type { ByteSource } from './reader.js';
import type { EventSink } from './types.js';
import type { FrameWriter } from './writer.js';

export const HELLO_SEQUENCE = 1;
export const AUTH_SEQUENCE = 2;
export const FIRST_APPLICATION_SEQUENCE = 3;

/**
 * Session id used when the server's key-exchange reply carries no payload
 */
export const UNKNOWN_SESSION = 'unknown';

/**
 * Everything derived from the profile before touching the network
 */
export interface PreparedHandshake {
  pattern: HandshakePattern;
  keys: DeviceKeyPair;
  noise: HandshakeState;
}

export interface HandshakeIo {
  writer: FrameWriter;
  source: ByteSource;
  /** Resolves with the response status of the connect stream */
  response: () => Promise<number>;
}

export interface HandshakeContext {
  events: EventSink;
  logger: Logger;
  capabilities: string[];
}

export interface HandshakeOutcome {
  sessionId: string;
  pairingRequired: boolean;
  /** Bytes read past the completing Ack, handed to the inbound reader */
  buffered: Uint8Array;
  profile: Profile;
  /** True when the server changed user identity fields */
  profileDirty: boolean;
}

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const serverPayloadSchema = z.object({
  session: z.string().optional(),
  user: z
    .object({
      id: nullableString,
      handle: nullableString,
      display_name: nullableString,
      avatar_url: nullableString,
    })
    .nullish(),
});

const handshakeAckSchema = z.object({
  handshake: z.literal('ok'),
  pairing_required: z.boolean().optional(),
});

/**
 * Build the Noise initiator from the profile.
 * Fails with a configuration error before any I/O.
 */
export function prepareHandshake(profile: Profile): PreparedHandshake {
  const pattern = parsePattern(profile.noisePattern);
  if (!pattern) {
    throw new EngineError('unsupported-pattern', `unsupported pattern: ${profile.noisePattern.toUpperCase()}`);
  }

  const keys = deviceKeyPairFromProfile(profile);

  let remoteStaticPublic: Uint8Array | undefined;
  if (patternRequiresRemoteStatic(pattern)) {
    if (!profile.serverStatic) {
      throw new EngineError('missing-remote-key', `server_static required for ${pattern}`);
    }
    try {
      remoteStaticPublic = hexToBytes32(profile.serverStatic);
    } catch (error) {
      throw EngineError.wrap('invalid-profile', 'invalid server_static', error);
    }
  }

  let noise: HandshakeState;
  try {
    noise = HandshakeState.initiator({
      pattern,
      prologue: utf8Encode(profile.prologue),
      localStatic: keys,
      remoteStaticPublic,
    });
  } catch (error) {
    throw EngineError.wrap('invalid-profile', 'noise init', error);
  }

  return { pattern, keys, noise };
}

export function buildHelloProperties(
  profile: Profile,
  prepared: PreparedHandshake,
  message: Uint8Array,
  capabilities: string[]
): ControlProperties {
  const properties: ControlProperties = {
    protocol_version: PROTOCOL_VERSION,
    pattern: prepared.pattern,
    device_id: profile.deviceId,
    client_static: bytesToHex(prepared.keys.publicKey),
    handshake: bytesToHex(message),
    capabilities: [...capabilities],
  };

  if (profile.userHandle) {
    const user: ControlProperties = { handle: profile.userHandle };
    if (profile.userId) user.id = profile.userId;
    if (profile.userDisplayName) user.display_name = profile.userDisplayName;
    if (profile.userAvatarUrl) user.avatar_url = profile.userAvatarUrl;
    properties.user = user;
  }

  return properties;
}

/**
 * The Ack that completes the handshake, with its pairing flag.
 * Any other Ack is ordinary traffic.
 */
export function parseHandshakeAck(frame: Frame): { pairingRequired: boolean } | null {
  const properties = controlProperties(frame);
  if (!properties) {
    return null;
  }
  const parsed = handshakeAckSchema.safeParse(properties);
  return parsed.success ? { pairingRequired: parsed.data.pairing_required ?? false } : null;
}

/**
 * Decode the server's key-exchange payload: a session id and optionally
 * updated user identity fields.
 */
export function parseServerPayload(payload: Uint8Array): { session: string; user: UserIdentity } {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8Decode(payload));
  } catch (error) {
    throw EngineError.wrap('decode', 'handshake payload decode', error);
  }

  const parsed = serverPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError('decode', `handshake payload decode: ${parsed.error.issues[0].message}`);
  }
  if (parsed.data.session === undefined) {
    throw new EngineError('missing-session', 'session missing');
  }

  const user = parsed.data.user;
  return {
    session: parsed.data.session,
    user: {
      userId: user?.id,
      userHandle: user?.handle,
      userDisplayName: user?.display_name,
      userAvatarUrl: user?.avatar_url,
    },
  };
}

type Phase = 'await-auth' | 'await-ack';

/**
 * Drive Hello → Auth → Ack over an open stream.
 *
 * Frames that are not part of the exchange are republished as `frame`
 * events; an Error frame is republished and then aborts the attempt.
 */
export async function runHandshake(
  profile: Profile,
  prepared: PreparedHandshake,
  io: HandshakeIo,
  context: HandshakeContext
): Promise<HandshakeOutcome> {
  const { events, logger } = context;
  const { noise } = prepared;

  let helloMessage: Uint8Array;
  try {
    helloMessage = noise.writeMessage();
  } catch (error) {
    throw EngineError.wrap('handshake', 'noise message one', error);
  }

  events.send({ kind: 'log', line: `handshake start for ${profile.deviceId}` });
  await io.writer.send(
    controlFrame(
      FrameType.Hello,
      0,
      HELLO_SEQUENCE,
      buildHelloProperties(profile, prepared, helloMessage, context.capabilities)
    )
  );

  let status: number;
  try {
    status = await io.response();
  } catch (error) {
    throw EngineError.wrap('request', 'handshake response', error);
  }
  if (status < 200 || status >= 300) {
    throw new EngineError('request', `handshake response: status ${status}`);
  }

  let phase: Phase = 'await-auth';
  let buffer: Uint8Array = new Uint8Array(0);
  let sessionId: string | null = null;
  let current = profile;
  let profileDirty = false;

  const forward = (frame: Frame) => {
    events.send({ kind: 'frame', frame });
  };

  for (;;) {
    let chunk: Uint8Array | null;
    try {
      chunk = await io.source.next();
    } catch (error) {
      throw EngineError.wrap('read', 'handshake read failed', error);
    }
    if (chunk === null) {
      throw new EngineError('remote-closed', 'server closed during handshake');
    }
    buffer = concatBytes(buffer, chunk);

    for (;;) {
      const result = decodeFrame(buffer);
      if (result.status === 'incomplete') {
        break;
      }
      if (result.status === 'error') {
        throw new EngineError('decode', `handshake decode failed: ${result.reason}`);
      }
      buffer = buffer.slice(result.consumed);
      const frame = result.frame;

      switch (frame.frameType) {
        case FrameType.Auth: {
          if (phase !== 'await-auth') {
            throw new EngineError('unexpected-frame', 'unexpected auth frame after key exchange');
          }
          const reply = readAuth(noise, frame);
          if (reply.server) {
            sessionId = reply.server.session;
            const merged = mergeUserIdentity(current, reply.server.user);
            current = merged.profile;
            profileDirty = profileDirty || merged.changed;
          }
          await io.writer.send(
            controlFrame(FrameType.Auth, frame.channelId, AUTH_SEQUENCE, {
              handshake: bytesToHex(reply.finalMessage),
            })
          );
          phase = 'await-ack';
          break;
        }
        case FrameType.Ack: {
          const ack = parseHandshakeAck(frame);
          if (!ack) {
            forward(frame);
            break;
          }
          if (phase !== 'await-ack') {
            throw new EngineError('unexpected-frame', 'handshake acknowledged before auth');
          }
          const session = sessionId ?? UNKNOWN_SESSION;
          events.send({ kind: 'log', line: `handshake ok: session ${session}` });
          return {
            sessionId: session,
            pairingRequired: ack.pairingRequired,
            buffered: buffer,
            profile: current,
            profileDirty,
          };
        }
        case FrameType.Error:
          forward(frame);
          throw new EngineError('rejected', 'handshake rejected');
        case FrameType.Hello:
        case FrameType.Join:
        case FrameType.Leave:
        case FrameType.Msg:
        case FrameType.Typing:
        case FrameType.Presence:
        case FrameType.KeyUpdate:
        case FrameType.GroupCreate:
        case FrameType.GroupInvite:
        case FrameType.GroupEvent:
        case FrameType.CallOffer:
        case FrameType.CallAnswer:
        case FrameType.CallEnd:
        case FrameType.VoiceFrame:
        case FrameType.VideoFrame:
        case FrameType.CallStats:
          forward(frame);
          logger.warn(`unexpected frame during handshake: ${frameTypeName(frame.frameType)}`);
          break;
        default:
          unreachable(frame.frameType);
      }
    }
  }
}

/**
 * Consume the server's Auth frame and produce our final message.
 * For patterns that finish in two messages the final message is empty.
 */
function readAuth(
  noise: HandshakeState,
  frame: Frame
): { server: { session: string; user: UserIdentity } | null; finalMessage: Uint8Array } {
  const properties = controlProperties(frame);
  if (!properties) {
    throw new EngineError('handshake', 'expected control payload');
  }
  const handshakeHex = properties.handshake;
  if (typeof handshakeHex !== 'string') {
    throw new EngineError('handshake', 'missing handshake');
  }

  let message: Uint8Array;
  try {
    message = hexToBytes(handshakeHex);
  } catch (error) {
    throw EngineError.wrap('decode', 'handshake hex', error);
  }

  let payload: Uint8Array;
  try {
    payload = noise.readMessage(message);
  } catch (error) {
    throw EngineError.wrap('handshake', 'noise message two', error);
  }

  const server = payload.length > 0 ? parseServerPayload(payload) : null;

  if (noise.isFinished()) {
    return { server, finalMessage: new Uint8Array(0) };
  }
  try {
    return { server, finalMessage: noise.writeMessage() };
  } catch (error) {
    throw EngineError.wrap('handshake', 'noise message three', error);
  }
}
