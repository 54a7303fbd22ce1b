export { createEngine, EngineHandle, type Engine } from './engine.js';
export { ActiveConnection, establishConnection, frameForCommand, type ConnectionDeps } from './connection.js';
export {
  HELLO_SEQUENCE,
  AUTH_SEQUENCE,
  FIRST_APPLICATION_SEQUENCE,
  UNKNOWN_SESSION,
  prepareHandshake,
  runHandshake,
  buildHelloProperties,
  parseHandshakeAck,
  parseServerPayload,
  type PreparedHandshake,
  type HandshakeIo,
  type HandshakeContext,
  type HandshakeOutcome,
} from './handshake.js';
export { FrameWriter } from './writer.js';
export { ByteSource, spawnReader } from './reader.js';
export { Task, spawn, type TaskBody } from './task.js';
export {
  createChannel,
  type Channel,
  type ChannelSender,
  type ChannelReceiver,
} from './channel.js';
export {
  EngineError,
  EngineOfflineError,
  categoryOf,
  type EngineErrorKind,
  type EngineErrorCategory,
} from './errors.js';
export type { EngineCommand, ApplicationCommand, ClientEvent, EventSink } from './types.js';
