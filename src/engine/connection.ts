import { FrameType, controlFrame, opaqueFrame, type Frame } from '../codec/index.js';
import { describeError, type Logger } from '../logger.js';
import type { ProfileStore } from '../profile/adapter.js';
import type { Profile } from '../profile/types.js';
import { parseServerTarget } from '../transport/target.js';
import type { FrameStream, TransportConnector, TransportSession } from '../transport/types.js';
import { EngineError, unreachable } from './errors.js';
import {
  FIRST_APPLICATION_SEQUENCE,
  prepareHandshake,
  runHandshake,
  type HandshakeOutcome,
} from './handshake.js';
import { ByteSource, spawnReader } from './reader.js';
import type { Task } from './task.js';
import type { ApplicationCommand, EventSink } from './types.js';
import { FrameWriter } from './writer.js';

/**
 * Wrap an application command as a wire frame.
 * Presence is connection-wide and always travels on channel 0.
 */
export function frameForCommand(command: ApplicationCommand, sequence: number): Frame {
  switch (command.kind) {
    case 'join':
      return controlFrame(FrameType.Join, command.channelId, sequence, {
        members: [...command.members],
        relay: command.relay,
      });
    case 'leave':
      return controlFrame(FrameType.Leave, command.channelId, sequence, {});
    case 'send-message':
      return opaqueFrame(FrameType.Msg, command.channelId, sequence, command.body);
    case 'presence':
      return controlFrame(FrameType.Presence, 0, sequence, { state: command.state });
    default:
      return unreachable(command);
  }
}

/**
 * An authenticated connection. Owned exclusively by the engine actor.
 */
export class ActiveConnection {
  private sequence: number = FIRST_APPLICATION_SEQUENCE;

  constructor(
    readonly sessionId: string,
    readonly pairingRequired: boolean,
    private readonly writer: FrameWriter,
    private readonly reader: Task,
    private readonly driver: Task
  ) {}

  /**
   * False once the inbound reader or the connection driver has stopped
   */
  get alive(): boolean {
    return !this.reader.isFinished && !this.driver.isFinished;
  }

  /**
   * Reserve the next sequence number; numbers are never reused
   */
  nextSequence(): number {
    return this.sequence++;
  }

  async sendCommand(command: ApplicationCommand): Promise<Frame> {
    const frame = frameForCommand(command, this.nextSequence());
    await this.writer.send(frame);
    return frame;
  }

  /**
   * Signal end of stream to the peer, then abort both background tasks.
   * Returns without waiting for either task.
   */
  close(): void {
    this.writer.finish();
    this.reader.abort();
    this.driver.abort();
  }
}

export interface ConnectionDeps {
  connector: TransportConnector;
  events: EventSink;
  logger: Logger;
  clientId: string;
  capabilities: string[];
  profileStore?: ProfileStore;
}

/**
 * Bootstrap the transport, run the handshake and start reading.
 *
 * Publishes `connected` before the reader is started, so frames that
 * arrived with the final Ack are delivered after it. Every failure path
 * releases what was opened so far.
 */
export async function establishConnection(profile: Profile, deps: ConnectionDeps): Promise<ActiveConnection> {
  const { events, logger } = deps;

  const target = parseServerTarget(profile.serverUrl);
  const prepared = prepareHandshake(profile);

  if (profile.insecure) {
    logger.warn(`tls certificate verification disabled for ${target.host}`);
  }

  const session = await deps.connector.connect(
    target,
    { caPath: profile.tlsCaPath, insecure: profile.insecure },
    (line) => {
      events.send({ kind: 'log', line });
    }
  );

  const stream = openStream(session, deps.clientId, profile.traceparent);
  const writer = new FrameWriter(stream.outbound);
  const source = new ByteSource(stream.inbound);

  let outcome: HandshakeOutcome;
  try {
    outcome = await runHandshake(
      profile,
      prepared,
      { writer, source, response: () => stream.response() },
      { events, logger, capabilities: deps.capabilities }
    );
  } catch (error) {
    writer.finish();
    source.cancel();
    session.driver.abort();
    throw error;
  }

  if (outcome.profileDirty && deps.profileStore) {
    try {
      await deps.profileStore.save(outcome.profile);
    } catch (error) {
      const line = `profile save failed: ${describeError(error)}`;
      logger.warn(line);
      events.send({ kind: 'log', line });
    }
  }

  events.send({ kind: 'connected', sessionId: outcome.sessionId, pairingRequired: outcome.pairingRequired });

  const reader = spawnReader(source, outcome.buffered, events, logger);
  return new ActiveConnection(outcome.sessionId, outcome.pairingRequired, writer, reader, session.driver);
}

function openStream(session: TransportSession, clientId: string, traceparent: string | undefined): FrameStream {
  try {
    return session.openStream({ clientId, traceparent });
  } catch (error) {
    session.driver.abort();
    throw EngineError.wrap('request', 'request failed', error);
  }
}
