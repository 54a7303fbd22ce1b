import { consoleLogger, type Logger } from './logger.js';
import type { ProfileStore } from './profile/adapter.js';
import { Http2Connector } from './transport/bootstrap.js';
import type { TransportConnector } from './transport/types.js';

/**
 * Client identifier sent in the user-agent header
 */
export const DEFAULT_CLIENT_ID = 'burrow-engine/0.1';

/**
 * Configuration for createEngine
 */
export interface EngineConfig {
  /** Undelivered events held before new ones are dropped (default 1024) */
  eventCapacity?: number;
  /** Transport bootstrap (defaults to the HTTP/2 connector) */
  connector?: TransportConnector;
  /** Where learned profile changes are written back; none by default */
  profileStore?: ProfileStore;
  logger?: Logger;
  /** User-agent value for the connect stream */
  clientId?: string;
  /** Capabilities advertised in Hello */
  capabilities?: string[];
}

export const DEFAULT_ENGINE_CONFIG = {
  eventCapacity: 1024,
  clientId: DEFAULT_CLIENT_ID,
  capabilities: ['noise'],
} as const;

export interface ResolvedEngineConfig {
  eventCapacity: number;
  connector: TransportConnector;
  profileStore?: ProfileStore;
  logger: Logger;
  clientId: string;
  capabilities: string[];
}

export function resolveConfig(config: EngineConfig = {}): ResolvedEngineConfig {
  const eventCapacity = config.eventCapacity ?? DEFAULT_ENGINE_CONFIG.eventCapacity;
  if (!Number.isInteger(eventCapacity) || eventCapacity < 1) {
    throw new Error(`eventCapacity must be a positive integer, got ${eventCapacity}`);
  }

  const logger = config.logger ?? consoleLogger;
  return {
    eventCapacity,
    connector: config.connector ?? new Http2Connector(logger),
    profileStore: config.profileStore,
    logger,
    clientId: config.clientId ?? DEFAULT_ENGINE_CONFIG.clientId,
    capabilities: [...(config.capabilities ?? DEFAULT_ENGINE_CONFIG.capabilities)],
  };
}
