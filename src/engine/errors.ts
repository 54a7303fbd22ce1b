import { describeError } from '../logger.js';

/**
 * Every distinct way a connect attempt or command can fail
 */
export type EngineErrorKind =
  // configuration
  | 'invalid-url'
  | 'unsupported-scheme'
  | 'invalid-profile'
  | 'unsupported-pattern'
  | 'missing-remote-key'
  | 'invalid-trust-root'
  // transport
  | 'dns'
  | 'tcp'
  | 'tls'
  | 'multiplex'
  | 'request'
  | 'stream'
  // protocol
  | 'remote-closed'
  | 'read'
  | 'decode'
  | 'handshake'
  | 'missing-session'
  | 'unexpected-frame'
  // rejection
  | 'rejected'
  // usage
  | 'already-connected'
  | 'not-connected';

export type EngineErrorCategory = 'configuration' | 'transport' | 'protocol' | 'rejection' | 'usage';

export function categoryOf(kind: EngineErrorKind): EngineErrorCategory {
  switch (kind) {
    case 'invalid-url':
    case 'unsupported-scheme':
    case 'invalid-profile':
    case 'unsupported-pattern':
    case 'missing-remote-key':
    case 'invalid-trust-root':
      return 'configuration';
    case 'dns':
    case 'tcp':
    case 'tls':
    case 'multiplex':
    case 'request':
    case 'stream':
      return 'transport';
    case 'remote-closed':
    case 'read':
    case 'decode':
    case 'handshake':
    case 'missing-session':
    case 'unexpected-frame':
      return 'protocol';
    case 'rejected':
      return 'rejection';
    case 'already-connected':
    case 'not-connected':
      return 'usage';
  }
}

/**
 * Descriptive, typed engine failure. The message is what callers see in
 * `Error` events.
 */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly category: EngineErrorCategory;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.kind = kind;
    this.category = categoryOf(kind);
  }

  /**
   * Wrap an underlying failure as `<context>: <cause message>`
   */
  static wrap(kind: EngineErrorKind, context: string, cause: unknown): EngineError {
    return new EngineError(kind, `${context}: ${describeError(cause)}`, { cause });
  }
}

/**
 * Thrown by EngineHandle.send once the actor has terminated
 */
export class EngineOfflineError extends Error {
  constructor() {
    super('engine offline');
    this.name = 'EngineOfflineError';
  }
}

export function unreachable(value: never): never {
  throw new Error(`unhandled variant: ${String(value)}`);
}
