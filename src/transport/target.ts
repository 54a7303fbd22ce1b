import { EngineError } from '../engine/errors.js';
import type { ServerTarget } from './types.js';

export const DEFAULT_HTTPS_PORT = 443;
export const DEFAULT_CONNECT_PATH = '/connect';

/**
 * Parse the server URL into a connect target.
 * Only https is accepted; a root path becomes `/connect`.
 */
export function parseServerTarget(serverUrl: string): ServerTarget {
  let url: URL;
  try {
    url = new URL(serverUrl);
  } catch (error) {
    throw EngineError.wrap('invalid-url', 'invalid server url', error);
  }

  if (url.protocol !== 'https:') {
    throw new EngineError('unsupported-scheme', `only https is supported, got ${url.protocol.replace(/:$/, '')}`);
  }
  if (!url.hostname) {
    throw new EngineError('invalid-url', 'invalid server url: host missing');
  }

  // IPv6 literals come back bracketed
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const port = url.port ? Number(url.port) : DEFAULT_HTTPS_PORT;
  const pathAndQuery = `${url.pathname}${url.search}`;
  const path = pathAndQuery === '/' || pathAndQuery === '' ? DEFAULT_CONNECT_PATH : pathAndQuery;

  return { host, port, authority: url.host, path };
}
