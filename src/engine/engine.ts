import { describeError } from '../logger.js';
import type { Profile } from '../profile/types.js';
import { resolveConfig, type EngineConfig, type ResolvedEngineConfig } from '../types.js';
import { createChannel, type Channel, type ChannelReceiver } from './channel.js';
import { establishConnection, type ActiveConnection } from './connection.js';
import { EngineError, EngineOfflineError, unreachable } from './errors.js';
import type { ApplicationCommand, ClientEvent, EngineCommand } from './types.js';

/**
 * Front door to a running engine. Cheap to clone; all clones feed the same
 * command queue.
 */
export class EngineHandle {
  constructor(private readonly commands: Pick<Channel<EngineCommand>, 'send' | 'close' | 'isClosed'>) {}

  /**
   * Enqueue a command. Throws EngineOfflineError once the engine has shut down.
   * Connect takes a private copy of the profile.
   */
  send(command: EngineCommand): void {
    const queued: EngineCommand =
      command.kind === 'connect' ? { kind: 'connect', profile: structuredClone(command.profile) } : command;
    if (!this.commands.send(queued)) {
      throw new EngineOfflineError();
    }
  }

  clone(): EngineHandle {
    return new EngineHandle(this.commands);
  }

  /**
   * Stop accepting commands. Queued commands still run, then the engine
   * tears down its connection and closes the event queue.
   */
  close(): void {
    this.commands.close();
  }

  get closed(): boolean {
    return this.commands.isClosed();
  }

  connect(profile: Profile): void {
    this.send({ kind: 'connect', profile });
  }

  disconnect(): void {
    this.send({ kind: 'disconnect' });
  }

  join(channelId: number, members: string[], relay = false): void {
    this.send({ kind: 'join', channelId, members, relay });
  }

  sendMessage(channelId: number, body: Uint8Array): void {
    this.send({ kind: 'send-message', channelId, body });
  }

  leave(channelId: number): void {
    this.send({ kind: 'leave', channelId });
  }

  presence(state: string): void {
    this.send({ kind: 'presence', state });
  }
}

/**
 * Sole owner of the connection slot. Processes commands strictly in order.
 */
class EngineActor {
  private connection: ActiveConnection | null = null;

  constructor(
    private readonly commands: ChannelReceiver<EngineCommand>,
    private readonly events: Channel<ClientEvent>,
    private readonly config: ResolvedEngineConfig
  ) {}

  async run(): Promise<void> {
    try {
      for await (const command of this.commands) {
        try {
          await this.dispatch(command);
        } catch (error) {
          this.config.logger.error(`${command.kind} failed: ${describeError(error)}`);
          this.emit({ kind: 'error', detail: describeError(error) });
        }
      }
    } finally {
      this.release();
      this.events.close();
    }
  }

  private async dispatch(command: EngineCommand): Promise<void> {
    switch (command.kind) {
      case 'connect':
        return this.connect(command.profile);
      case 'disconnect':
        return this.disconnect();
      case 'join':
      case 'send-message':
      case 'leave':
      case 'presence':
        return this.forward(command);
      default:
        unreachable(command);
    }
  }

  private async connect(profile: Profile): Promise<void> {
    if (this.connection) {
      if (this.connection.alive) {
        this.refuse(new EngineError('already-connected', 'already connected'));
        return;
      }
      // Reader already reported the disconnect; drop the remains
      this.release();
    }

    try {
      this.connection = await establishConnection(profile, {
        connector: this.config.connector,
        events: this.events,
        logger: this.config.logger,
        clientId: this.config.clientId,
        capabilities: this.config.capabilities,
        profileStore: this.config.profileStore,
      });
    } catch (error) {
      const detail = describeError(error);
      this.config.logger.error(`connect failed: ${detail}`);
      this.emit({ kind: 'error', detail });
    }
  }

  private disconnect(): void {
    if (!this.connection) {
      this.refuse(new EngineError('not-connected', 'no active connection'));
      return;
    }
    this.release();
    this.emit({ kind: 'disconnected', reason: 'disconnected' });
  }

  private async forward(command: ApplicationCommand): Promise<void> {
    if (!this.connection) {
      this.refuse(new EngineError('not-connected', 'no active connection'));
      return;
    }
    try {
      await this.connection.sendCommand(command);
    } catch (error) {
      this.emit({ kind: 'error', detail: describeError(error) });
    }
  }

  /**
   * A command that does not fit the current state; the engine carries on
   */
  private refuse(error: EngineError): void {
    this.config.logger.warn(`${error.kind}: ${error.message}`);
    this.emit({ kind: 'error', detail: error.message });
  }

  private release(): void {
    this.connection?.close();
    this.connection = null;
  }

  /**
   * Best effort: a full or closed event queue drops the event
   */
  private emit(event: ClientEvent): void {
    this.events.send(event);
  }
}

export interface Engine {
  handle: EngineHandle;
  events: ChannelReceiver<ClientEvent>;
  /** Resolves once the actor has exited and the event queue is closed */
  done: Promise<void>;
}

/**
 * Start an engine actor
 */
export function createEngine(config: EngineConfig = {}): Engine {
  const resolved = resolveConfig(config);
  const commands = createChannel<EngineCommand>();
  const events = createChannel<ClientEvent>(resolved.eventCapacity);

  const actor = new EngineActor(commands, events, resolved);
  const done = actor.run().catch((error: unknown) => {
    resolved.logger.error(`engine stopped: ${describeError(error)}`);
  });

  return { handle: new EngineHandle(commands), events, done };
}
