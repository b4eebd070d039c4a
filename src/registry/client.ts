import WebSocket from 'ws';
import {
  createConnection,
  createLongLivedTokenAuth,
  ERR_CONNECTION_LOST,
  ERR_INVALID_AUTH
} from 'home-assistant-js-websocket';
import type { Logger } from 'pino';

import { HousekeeperError, isTransportError } from '../errors.js';
import {
  deviceUpdateToWire,
  entityUpdateToWire,
  normalizeArea,
  normalizeAreas,
  normalizeDevices,
  normalizeEntities,
  normalizeLiveStates
} from './normalizer.js';
import type {
  Area,
  AreaUpdate,
  Device,
  DeviceUpdate,
  Entity,
  EntityUpdate,
  LiveState,
  RegistryClient
} from './types.js';

export interface RegistryMessage {
  type: string;
  [key: string]: unknown;
}

export interface RegistryConnection {
  sendMessagePromise(message: RegistryMessage): Promise<unknown>;
  close(): void;
}

export type RegistryConnectionFactory = (options: { url: string; token: string }) => Promise<RegistryConnection>;

export interface HomeAssistantRegistryClientOptions {
  url: string;
  token?: string;
  timeoutMs: number;
  connectTimeoutMs: number;
  logger: Logger;
  connect?: RegistryConnectionFactory;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function mapConnectFailure(error: unknown, url: string): HousekeeperError {
  if (error instanceof HousekeeperError) {
    return error;
  }
  if (error === ERR_INVALID_AUTH) {
    return new HousekeeperError('AUTH', `Registry at ${url} rejected the access token`);
  }
  return new HousekeeperError('TRANSPORT', `Cannot connect to registry at ${url}`, { cause: error });
}

/**
 * Rejections from the socket library come in two shapes: the registry's own
 * `{ code, message }` error object, or a synthetic result envelope whose
 * numeric code marks a dropped connection.
 */
function mapRequestFailure(error: unknown, type: string): HousekeeperError {
  if (error instanceof HousekeeperError) {
    return error;
  }

  const shape = isObject(error) && isObject(error.error) ? error.error : error;
  if (isObject(shape)) {
    const message = typeof shape.message === 'string' ? shape.message : 'unknown error';
    if (shape.code === ERR_CONNECTION_LOST) {
      return new HousekeeperError('TRANSPORT', `Connection lost during ${type}`, { cause: error });
    }
    if (typeof shape.code === 'string') {
      return new HousekeeperError('REGISTRY', `Registry rejected ${type}: ${message}`, {
        registryCode: shape.code,
        details: { type }
      });
    }
  }

  return new HousekeeperError('TRANSPORT', `Request ${type} failed`, { cause: error });
}

export async function connectHomeAssistant(options: { url: string; token: string }): Promise<RegistryConnection> {
  // The socket library expects a browser-style global WebSocket.
  if (!('WebSocket' in globalThis)) {
    Object.assign(globalThis, { WebSocket });
  }

  const auth = createLongLivedTokenAuth(options.url, options.token);
  return createConnection({ auth, setupRetry: 0 });
}

export class HomeAssistantRegistryClient implements RegistryClient {
  private readonly connectImpl: RegistryConnectionFactory;
  private connection: RegistryConnection | null = null;
  private connecting: Promise<RegistryConnection> | null = null;

  constructor(private readonly options: HomeAssistantRegistryClientOptions) {
    this.connectImpl = options.connect ?? connectHomeAssistant;
  }

  private async getConnection(): Promise<RegistryConnection> {
    if (this.connection) {
      return this.connection;
    }
    if (this.connecting) {
      return this.connecting;
    }

    const token = this.options.token;
    if (!token) {
      throw new HousekeeperError('AUTH', 'No registry access token configured (HOUSEKEEPER_REGISTRY_TOKEN)');
    }

    const url = this.options.url;
    this.options.logger.info({ url }, 'Connecting to registry');

    const pending = this.connectImpl({ url, token });
    this.connecting = withTimeout(pending, this.options.connectTimeoutMs, () => {
      this.closeWhenSettled(pending, url);
      return new HousekeeperError('TIMEOUT', `Timed out connecting to registry at ${url}`);
    }).catch((error: unknown) => {
      throw mapConnectFailure(error, url);
    });

    try {
      const connection = await this.connecting;
      this.connection = connection;
      this.options.logger.info({ url }, 'Connected to registry');
      return connection;
    } finally {
      this.connecting = null;
    }
  }

  /** A connect that outlives its timeout is never used; close it once it lands. */
  private closeWhenSettled(pending: Promise<RegistryConnection>, url: string): void {
    void pending.then(
      (connection) => {
        this.options.logger.warn({ url }, 'Closing registry connection that completed after the connect timeout');
        connection.close();
      },
      (error: unknown) => {
        this.options.logger.debug({ url, err: error }, 'Registry connect failed after the connect timeout');
      }
    ).catch((error: unknown) => {
      this.options.logger.warn({ url, err: error }, 'Closing late registry connection failed');
    });
  }

  private resetConnection(): void {
    const current = this.connection;
    this.connection = null;
    current?.close();
  }

  private async send(type: string, payload: Record<string, unknown> = {}): Promise<unknown> {
    const connection = await this.getConnection();

    this.options.logger.debug({ type, fields: Object.keys(payload) }, 'Registry request');

    try {
      return await withTimeout(
        connection.sendMessagePromise({ type, ...payload }),
        this.options.timeoutMs,
        () => new HousekeeperError('TIMEOUT', `Timed out waiting for ${type}`)
      );
    } catch (error) {
      const mapped = mapRequestFailure(error, type);
      if (isTransportError(mapped)) {
        this.options.logger.warn({ type, code: mapped.code }, 'Registry connection dropped; reconnecting on next call');
        this.resetConnection();
      }
      throw mapped;
    }
  }

  async listAreas(): Promise<Area[]> {
    return normalizeAreas(await this.send('config/area_registry/list'));
  }

  async createArea(name: string): Promise<Area> {
    const created = normalizeArea(await this.send('config/area_registry/create', { name }));
    if (!created) {
      throw new HousekeeperError('REGISTRY', `Registry returned no area for created name '${name}'`);
    }
    return created;
  }

  async updateArea(areaId: string, update: AreaUpdate): Promise<Area> {
    const updated = normalizeArea(await this.send('config/area_registry/update', { area_id: areaId, name: update.name }));
    return updated ?? { areaId, name: update.name };
  }

  async listDevices(): Promise<Device[]> {
    return normalizeDevices(await this.send('config/device_registry/list'));
  }

  async updateDevice(deviceId: string, update: DeviceUpdate): Promise<void> {
    await this.send('config/device_registry/update', { device_id: deviceId, ...deviceUpdateToWire(update) });
  }

  async listEntities(): Promise<Entity[]> {
    return normalizeEntities(await this.send('config/entity_registry/list'));
  }

  async updateEntity(entityId: string, update: EntityUpdate): Promise<void> {
    await this.send('config/entity_registry/update', { entity_id: entityId, ...entityUpdateToWire(update) });
  }

  async removeEntity(entityId: string): Promise<void> {
    await this.send('config/entity_registry/remove', { entity_id: entityId });
  }

  async getLiveStates(): Promise<LiveState[]> {
    return normalizeLiveStates(await this.send('get_states'));
  }

  async close(): Promise<void> {
    this.resetConnection();
  }
}
