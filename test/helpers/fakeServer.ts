import { PassThrough, type Readable } from 'node:stream';
import {
  FrameType,
  controlFrame,
  controlProperties,
  decodeFrame,
  encodeFrame,
  type ControlProperties,
  type Frame,
} from '../../src/codec/index.js';
import {
  HandshakeState,
  bytesToHex,
  concatBytes,
  hexToBytes,
  parsePattern,
  utf8Encode,
  type DeviceKeyPair,
} from '../../src/crypto/index.js';
import type { ChannelReceiver } from '../../src/engine/channel.js';
import { spawn, type Task } from '../../src/engine/task.js';
import type { ClientEvent } from '../../src/engine/types.js';
import { silentLogger, type Logger } from '../../src/logger.js';
import type { ProfileStore } from '../../src/profile/adapter.js';
import type { Profile } from '../../src/profile/types.js';
import type {
  FrameStream,
  ProgressLog,
  ServerTarget,
  StreamRequest,
  TransportConnector,
  TransportOptions,
  TransportSession,
} from '../../src/transport/types.js';

/**
 * How the scripted server answers one connection
 */
export interface ServerScript {
  /** Response status of the connect stream (default 200) */
  status?: number;
  /** Answer Hello with an Error frame carrying this document */
  reject?: ControlProperties;
  closeAfterHello?: boolean;
  /** Send the completing Ack instead of Auth */
  ackBeforeAuth?: boolean;
  /** Answer Hello with these bytes instead of a frame */
  rawReply?: Uint8Array;
  /** Payload of the server's key-exchange message; null sends none */
  sessionPayload?: ControlProperties | null;
  authChannel?: number;
  pairingRequired?: boolean;
  /** Written just before the completing Ack, in the same chunk */
  beforeAck?: Frame[];
  /** Written right after the completing Ack, in the same chunk */
  afterAck?: Frame[];
}

/**
 * Collects the frames a client writes to a stream
 */
export class FrameTap {
  readonly frames: Frame[] = [];
  readonly ended: Promise<void>;
  private buffer: Uint8Array = new Uint8Array(0);
  private cursor = 0;
  private finished = false;
  private waiters: Array<() => void> = [];

  constructor(stream: Readable) {
    stream.on('data', (chunk: Uint8Array) => {
      this.buffer = concatBytes(this.buffer, chunk);
      for (;;) {
        const result = decodeFrame(this.buffer);
        if (result.status !== 'frame') break;
        this.buffer = this.buffer.slice(result.consumed);
        this.frames.push(result.frame);
      }
      this.wake();
    });
    this.ended = new Promise((resolve) => {
      const onEnd = () => {
        this.finished = true;
        this.wake();
        resolve();
      };
      stream.once('end', onEnd);
      stream.once('close', onEnd);
    });
  }

  /**
   * Next frame not yet taken by anyone
   */
  async next(): Promise<Frame> {
    while (this.cursor >= this.frames.length) {
      if (this.finished) {
        throw new Error('client stream ended');
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return this.frames[this.cursor++];
  }

  private wake(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter();
    }
  }
}

/**
 * One connection to the scripted server. `outbound` carries what the
 * client writes, `inbound` what the server answers.
 */
export class FakeSession implements TransportSession, ScriptedPeer {
  readonly driver: Task;
  readonly outbound = new PassThrough();
  readonly inbound = new PassThrough();
  readonly tap = new FrameTap(this.outbound);
  readonly requests: StreamRequest[] = [];
  served: Promise<void> = Promise.resolve();
  failure: unknown = null;

  constructor(
    private readonly keys: DeviceKeyPair,
    private readonly script: ServerScript
  ) {
    this.driver = spawn(
      'fake connection',
      (signal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        }),
      silentLogger
    );
  }

  openStream(request: StreamRequest): FrameStream {
    this.requests.push(request);
    this.served = this.serve().catch((error: unknown) => {
      this.failure = error;
    });
    return {
      outbound: this.outbound,
      inbound: this.inbound,
      response: async () => this.script.status ?? 200,
    };
  }

  /**
   * Write frames to the client in a single chunk
   */
  send(...frames: Frame[]): void {
    if (this.inbound.destroyed || this.inbound.writableEnded) return;
    this.inbound.write(concatBytes(...frames.map((frame) => encodeFrame(frame))));
  }

  /**
   * Close the server side of the stream
   */
  end(): void {
    if (!this.inbound.destroyed) this.inbound.end();
  }

  sendRaw(bytes: Uint8Array): void {
    if (this.inbound.destroyed || this.inbound.writableEnded) return;
    this.inbound.write(bytes);
  }

  private serve(): Promise<void> {
    return playScript(this, this.keys, this.script);
  }
}

/**
 * Server end of one connect stream
 */
export interface ScriptedPeer {
  readonly tap: FrameTap;
  send(...frames: Frame[]): void;
  sendRaw(bytes: Uint8Array): void;
  end(): void;
}

/**
 * Answer the client's handshake the way the script says, as a Noise responder
 */
export async function playScript(peer: ScriptedPeer, keys: DeviceKeyPair, script: ServerScript): Promise<void> {
  const hello = await peer.tap.next();

  if (script.closeAfterHello) {
    peer.end();
    return;
  }
  if (script.reject) {
    peer.send(controlFrame(FrameType.Error, 0, 1, script.reject));
    return;
  }
  if (script.rawReply) {
    peer.sendRaw(script.rawReply);
    return;
  }
  if ((script.status ?? 200) >= 300) {
    return;
  }

  const properties = controlProperties(hello) ?? {};
  const noise = HandshakeState.responder({
    pattern: parsePattern(String(properties.pattern)) ?? 'XK',
    prologue: utf8Encode('burrow'),
    localStatic: keys,
  });
  noise.readMessage(hexToBytes(String(properties.handshake)));

  const ackProperties: ControlProperties = { handshake: 'ok' };
  if (script.pairingRequired !== undefined) {
    ackProperties.pairing_required = script.pairingRequired;
  }
  const ack = controlFrame(FrameType.Ack, 0, 2, ackProperties);

  if (script.ackBeforeAuth) {
    peer.send(ack);
    return;
  }

  const payload =
    script.sessionPayload === null
      ? new Uint8Array(0)
      : utf8Encode(JSON.stringify(script.sessionPayload ?? { session: 'session-1' }));
  peer.send(
    controlFrame(FrameType.Auth, script.authChannel ?? 0, 1, {
      handshake: bytesToHex(noise.writeMessage(payload)),
    })
  );

  const auth = await peer.tap.next();
  if (!noise.isFinished()) {
    noise.readMessage(hexToBytes(String(controlProperties(auth)?.handshake)));
  }

  peer.send(...(script.beforeAck ?? []), ack, ...(script.afterAck ?? []));
}

/**
 * In-process connector; each connect() opens a session that follows the
 * next script in line
 */
export class FakeConnector implements TransportConnector {
  readonly sessions: FakeSession[] = [];
  readonly targets: ServerTarget[] = [];
  readonly options: TransportOptions[] = [];

  constructor(
    private readonly serverKeys: DeviceKeyPair,
    private readonly scripts: ServerScript[] = []
  ) {}

  async connect(target: ServerTarget, options: TransportOptions, log: ProgressLog): Promise<TransportSession> {
    this.targets.push(target);
    this.options.push(options);
    log(`connected to ${target.host}:${target.port}`);

    const session = new FakeSession(this.serverKeys, this.scripts[this.sessions.length] ?? {});
    this.sessions.push(session);
    return session;
  }

  get calls(): number {
    return this.sessions.length;
  }

  latest(): FakeSession {
    const session = this.sessions[this.sessions.length - 1];
    if (!session) {
      throw new Error('no session opened');
    }
    return session;
  }
}

/**
 * Profile store that keeps every saved profile
 */
export class RecordingStore implements ProfileStore {
  readonly saves: Profile[] = [];

  constructor(private readonly failWith: Error | null = null) {}

  async load(): Promise<Profile | null> {
    return this.saves[this.saves.length - 1] ?? null;
  }

  async save(profile: Profile): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saves.push(profile);
  }

  async close(): Promise<void> {}
}

/**
 * Next event other than a log line; log lines are appended to `logs`
 */
export async function nextEvent(events: ChannelReceiver<ClientEvent>, logs: string[] = []): Promise<ClientEvent> {
  for (;;) {
    const event = await events.recv();
    if (event === null) {
      throw new Error('event queue closed');
    }
    if (event.kind !== 'log') {
      return event;
    }
    logs.push(event.line);
  }
}

/**
 * Every remaining event until the queue closes
 */
export async function remainingEvents(events: ChannelReceiver<ClientEvent>): Promise<ClientEvent[]> {
  const rest: ClientEvent[] = [];
  for await (const event of events) {
    rest.push(event);
  }
  return rest;
}

/**
 * Logger that keeps warnings and errors for assertions
 */
export function recordingLogger(): { logger: Logger; warnings: string[]; errors: string[] } {
  const warnings: string[] = [];
  const errors: string[] = [];
  const logger: Logger = {
    ...silentLogger,
    warn: (message) => {
      warnings.push(message);
    },
    error: (message) => {
      errors.push(message);
    },
  };
  return { logger, warnings, errors };
}
