import type { Readable, Writable } from 'node:stream';
import type { Task } from '../engine/task.js';

/**
 * Where to connect, derived from the profile's server URL
 */
export interface ServerTarget {
  host: string;
  port: number;
  /** host[:port] as written in the URL */
  authority: string;
  /** Request path for the connect stream */
  path: string;
}

export interface TransportOptions {
  /** PEM file with the trust roots to use instead of the platform set */
  caPath?: string;
  /** Accept any server certificate. Development only. */
  insecure: boolean;
}

/**
 * Extra request headers for the connect stream
 */
export interface StreamRequest {
  clientId: string;
  traceparent?: string;
}

/**
 * One bidirectional request stream. `outbound` is the request body,
 * `inbound` the response body.
 */
export interface FrameStream {
  readonly outbound: Writable;
  readonly inbound: Readable;
  /**
   * Resolves with the response status once headers arrive
   */
  response(): Promise<number>;
}

/**
 * An established multiplexed connection. The driver task keeps protocol
 * I/O flowing for as long as the connection lives; aborting it tears the
 * connection down.
 */
export interface TransportSession {
  readonly driver: Task;
  openStream(request: StreamRequest): FrameStream;
}

/**
 * Receives human-readable progress lines during bootstrap
 */
export type ProgressLog = (line: string) => void;

/**
 * Dials a server and negotiates the multiplexed transport
 */
export interface TransportConnector {
  connect(target: ServerTarget, options: TransportOptions, log: ProgressLog): Promise<TransportSession>;
}
