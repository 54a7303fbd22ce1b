import type { LookupAddress } from 'node:dns';
import { lookup } from 'node:dns/promises';
import * as http2 from 'node:http2';
import * as net from 'node:net';
import * as tls from 'node:tls';
import { EngineError } from '../engine/errors.js';
import { spawn, type Task } from '../engine/task.js';
import { describeError, type Logger } from '../logger.js';
import { buildTlsOptions } from './tls.js';
import type {
  FrameStream,
  ProgressLog,
  ServerTarget,
  StreamRequest,
  TransportConnector,
  TransportOptions,
  TransportSession,
} from './types.js';

/**
 * Opens a TCP connection to one resolved address
 */
export type TcpDialer = (candidate: LookupAddress, port: number) => Promise<net.Socket>;

export function formatCandidate(candidate: LookupAddress, port: number): string {
  return candidate.family === 6 ? `[${candidate.address}]:${port}` : `${candidate.address}:${port}`;
}

/**
 * Resolve a host to every candidate address, in resolver order
 */
export async function resolveCandidates(host: string): Promise<LookupAddress[]> {
  let addresses: LookupAddress[];
  try {
    addresses = await lookup(host, { all: true });
  } catch (error) {
    throw EngineError.wrap('dns', 'dns lookup failed', error);
  }
  if (addresses.length === 0) {
    throw new EngineError('dns', 'no address for server');
  }
  return addresses;
}

export const connectTcp: TcpDialer = (candidate, port) =>
  new Promise((resolve, reject) => {
    const socket = net.connect({ host: candidate.address, port, family: candidate.family });
    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });

/**
 * Try each candidate in order and keep the first socket that connects.
 * When every candidate fails the error carries the last failure.
 */
export async function dialCandidates(
  candidates: LookupAddress[],
  port: number,
  log: ProgressLog,
  dial: TcpDialer = connectTcp
): Promise<net.Socket> {
  let lastError: unknown = null;
  for (const candidate of candidates) {
    const label = formatCandidate(candidate, port);
    try {
      const socket = await dial(candidate, port);
      log(`connected to ${label}`);
      return socket;
    } catch (error) {
      lastError = error;
      log(`connect attempt ${label} failed: ${describeError(error)}`);
    }
  }
  const detail = lastError === null ? 'all sockets failed' : describeError(lastError);
  throw new EngineError('tcp', `tcp connect failed: ${detail}`, { cause: lastError });
}

function startTls(socket: net.Socket, options: tls.ConnectionOptions): Promise<tls.TLSSocket> {
  return new Promise((resolve, reject) => {
    const tlsSocket = tls.connect({ ...options, socket });
    const onError = (error: Error) => {
      tlsSocket.destroy();
      reject(error);
    };
    tlsSocket.once('error', onError);
    tlsSocket.once('secureConnect', () => {
      tlsSocket.off('error', onError);
      resolve(tlsSocket);
    });
  });
}

function startHttp2(tlsSocket: tls.TLSSocket, target: ServerTarget): Promise<http2.ClientHttp2Session> {
  return new Promise((resolve, reject) => {
    const session = http2.connect(`https://${target.authority}`, {
      createConnection: () => tlsSocket,
    });
    const onError = (error: Error) => {
      session.destroy();
      reject(error);
    };
    session.once('error', onError);
    session.once('connect', () => {
      session.off('error', onError);
      resolve(session);
    });
  });
}

/**
 * Request stream whose response status is recorded as soon as it arrives,
 * so a caller may ask for it after writing the first frame.
 */
class Http2FrameStream implements FrameStream {
  private status: number | null = null;
  private failure: Error | null = null;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly stream: http2.ClientHttp2Stream) {
    stream.once('response', (headers) => {
      this.status = headers[':status'] ?? 0;
      this.wake();
    });
    stream.on('error', (error: Error) => {
      this.failure ??= error;
      this.wake();
    });
    stream.once('close', () => {
      this.failure ??= new Error('stream closed before response');
      this.wake();
    });
  }

  get outbound(): http2.ClientHttp2Stream {
    return this.stream;
  }

  get inbound(): http2.ClientHttp2Stream {
    return this.stream;
  }

  async response(): Promise<number> {
    while (this.status === null) {
      if (this.failure) {
        throw this.failure;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return this.status;
  }

  private wake(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter();
    }
  }
}

class Http2TransportSession implements TransportSession {
  constructor(
    private readonly session: http2.ClientHttp2Session,
    private readonly target: ServerTarget,
    readonly driver: Task
  ) {}

  openStream(request: StreamRequest): FrameStream {
    const headers: http2.OutgoingHttpHeaders = {
      ':method': 'POST',
      ':scheme': 'https',
      ':authority': this.target.authority,
      ':path': this.target.path,
      'content-type': 'application/octet-stream',
      'user-agent': request.clientId,
      te: 'trailers',
    };
    if (request.traceparent) {
      headers.traceparent = request.traceparent;
    }
    return new Http2FrameStream(this.session.request(headers, { endStream: false }));
  }
}

/**
 * DNS → TCP (candidate fallback) → TLS with ALPN → HTTP/2
 */
export class Http2Connector implements TransportConnector {
  constructor(
    private readonly logger: Logger,
    private readonly dial: TcpDialer = connectTcp
  ) {}

  async connect(target: ServerTarget, options: TransportOptions, log: ProgressLog): Promise<TransportSession> {
    const tlsOptions = await buildTlsOptions(target.host, options);
    const candidates = await resolveCandidates(target.host);
    const socket = await dialCandidates(candidates, target.port, log, this.dial);
    socket.setNoDelay(true);

    let tlsSocket: tls.TLSSocket;
    try {
      tlsSocket = await startTls(socket, tlsOptions);
    } catch (error) {
      socket.destroy();
      throw EngineError.wrap('tls', 'tls connect failed', error);
    }

    if (tlsSocket.alpnProtocol !== 'h2') {
      tlsSocket.destroy();
      const negotiated = tlsSocket.alpnProtocol || 'no protocol';
      throw new EngineError('multiplex', `h2 handshake failed: server negotiated ${negotiated}`);
    }

    let session: http2.ClientHttp2Session;
    try {
      session = await startHttp2(tlsSocket, target);
    } catch (error) {
      tlsSocket.destroy();
      throw EngineError.wrap('multiplex', 'h2 handshake failed', error);
    }

    const driver = spawn(
      'h2 connection',
      (signal) =>
        new Promise<void>((resolve, reject) => {
          session.on('error', reject);
          session.once('close', () => resolve());
          signal.addEventListener('abort', () => session.destroy(), { once: true });
        }),
      this.logger
    );

    return new Http2TransportSession(session, target, driver);
  }
}
