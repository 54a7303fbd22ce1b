import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import type { ConnectionOptions } from 'node:tls';
import { EngineError } from '../engine/errors.js';
import type { TransportOptions } from './types.js';

/**
 * ALPN offer: multiplexed protocol first, single-stream fallback second
 */
export const ALPN_PROTOCOLS = ['h2', 'http/1.1'];

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Read the certificates from a PEM bundle
 */
export async function loadTrustRoots(caPath: string): Promise<string[]> {
  let pem: string;
  try {
    pem = await readFile(caPath, 'utf8');
  } catch (error) {
    throw EngineError.wrap('invalid-trust-root', 'open tls ca', error);
  }
  const certificates = pem.match(PEM_CERTIFICATE) ?? [];
  if (certificates.length === 0) {
    throw new EngineError('invalid-trust-root', 'no certificates loaded');
  }
  return certificates;
}

/**
 * TLS client options for a server host.
 *
 * A custom CA replaces the platform trust roots. Insecure mode disables
 * certificate and hostname verification entirely.
 */
export async function buildTlsOptions(host: string, options: TransportOptions): Promise<ConnectionOptions> {
  const tlsOptions: ConnectionOptions = {
    ALPNProtocols: ALPN_PROTOCOLS,
    // SNI must not carry an IP literal
    servername: isIP(host) === 0 ? host : undefined,
  };

  if (options.caPath) {
    tlsOptions.ca = await loadTrustRoots(options.caPath);
  }

  if (options.insecure) {
    tlsOptions.rejectUnauthorized = false;
    tlsOptions.checkServerIdentity = () => undefined;
  }

  return tlsOptions;
}
