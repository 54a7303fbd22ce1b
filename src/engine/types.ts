import type { Frame } from '../codec/index.js';
import type { Profile } from '../profile/types.js';

/**
 * Commands accepted by the engine actor
 */
export type EngineCommand =
  | { kind: 'connect'; profile: Profile }
  | { kind: 'disconnect' }
  | { kind: 'join'; channelId: number; members: string[]; relay: boolean }
  | { kind: 'send-message'; channelId: number; body: Uint8Array }
  | { kind: 'leave'; channelId: number }
  | { kind: 'presence'; state: string };

/**
 * Commands that turn into a frame on an established connection
 */
export type ApplicationCommand = Extract<
  EngineCommand,
  { kind: 'join' | 'send-message' | 'leave' | 'presence' }
>;

/**
 * Events published to the engine's single consumer
 */
export type ClientEvent =
  | { kind: 'connected'; sessionId: string; pairingRequired: boolean }
  | { kind: 'disconnected'; reason: string }
  | { kind: 'frame'; frame: Frame }
  | { kind: 'error'; detail: string }
  | { kind: 'log'; line: string };

/**
 * Where background units publish events. Sends never block; a false return
 * means the event was dropped (queue full) or the consumer is gone
 * (`isClosed()`).
 */
export interface EventSink {
  send(event: ClientEvent): boolean;
  isClosed(): boolean;
}
