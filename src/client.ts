/**
 * Client session for one GDO account.
 *
 * Connecting logs in over HTTPS, loads every device, then opens the
 * command socket and authorizes it with the session's API key. `close()`
 * tears down both the socket and the remote session.
 */

import { z } from "zod";
import { GdoApiClient, type GdoApi } from "./api-client.js";
import { DEFAULT_SOCKET_URL, JSON_RPC_VERSION, RPC_METHODS, SOCKET_AUTH_REQUEST_ID } from "./constants.js";
import { Device } from "./device.js";
import { GdoError, SocketAuthError, errorMessage } from "./errors.js";
import { defaultLogger, type GdoLogger } from "./logger.js";
import type { GdoModule } from "./modules.js";
import type { CommandPayload, Session, SocketAuthRequest } from "./types.js";
import { GdoSocket, type CommandSocket } from "./ws-client.js";

export type SocketOpener = (url: string) => Promise<CommandSocket>;

export interface GdoClientOptions {
  username: string;
  password: string;
  apiUrl?: string;
  socketUrl?: string;
  /** Replaces the HTTPS client, e.g. with an in-process fake. */
  api?: GdoApi;
  openSocket?: SocketOpener;
  logger?: GdoLogger;
}

const NonEmptyObjectSchema = z.record(z.unknown()).refine((value) => Object.keys(value).length > 0);

const SocketAuthReplySchema = z.object({ params: NonEmptyObjectSchema }).passthrough();

const AuthorizedParamsSchema = z.object({ authorized: z.literal(true) }).passthrough();

export function socketAuthRequest(username: string, apiKey: string): SocketAuthRequest {
  return {
    jsonrpc: JSON_RPC_VERSION,
    id: SOCKET_AUTH_REQUEST_ID,
    method: RPC_METHODS.SOCKET_AUTH,
    params: { varName: username, apiKey },
  };
}

/**
 * Send the auth handshake and check that the reply says `authorized: true`.
 */
export async function authenticateSocket(socket: CommandSocket, username: string, apiKey: string): Promise<void> {
  const reply = await socket.request(socketAuthRequest(username, apiKey));

  if (!NonEmptyObjectSchema.safeParse(reply).success) {
    throw new SocketAuthError("no socket auth returned", reply);
  }
  const parsed = SocketAuthReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new SocketAuthError("no socket auth params received", reply);
  }
  if (!AuthorizedParamsSchema.safeParse(parsed.data.params).success) {
    throw new SocketAuthError(`socket not authorized: ${JSON.stringify(reply)}`, reply);
  }
}

async function loadDevices(api: GdoApi, logger: GdoLogger): Promise<Device[]> {
  const metas = await api.listDevices();
  const devices: Device[] = [];
  // One at a time; the API is never asked for two things at once.
  for (const meta of metas) {
    const details = await api.getDeviceDetails(meta.varName);
    devices.push(new Device(meta, details, { logger }));
  }
  return devices;
}

function findMaster(devices: Device[]): GdoModule {
  for (const device of devices) {
    if (device.master !== null) return device.master;
  }
  throw new GdoError("couldn't find master unit");
}

export class GdoClient {
  readonly username: string;
  readonly session: Session;
  readonly devices: readonly Device[];
  readonly master: GdoModule;
  readonly socketUrl: string;

  private readonly api: GdoApi;
  private readonly socket: CommandSocket;
  private readonly logger: GdoLogger;
  private closed = false;

  private constructor(fields: {
    username: string;
    session: Session;
    devices: Device[];
    master: GdoModule;
    socketUrl: string;
    api: GdoApi;
    socket: CommandSocket;
    logger: GdoLogger;
  }) {
    this.username = fields.username;
    this.session = fields.session;
    this.devices = fields.devices;
    this.master = fields.master;
    this.socketUrl = fields.socketUrl;
    this.api = fields.api;
    this.socket = fields.socket;
    this.logger = fields.logger;
  }

  /**
   * Log in and open an authorized command socket. If any step after login
   * fails, whatever was acquired is released before the error is rethrown.
   */
  static async connect(options: GdoClientOptions): Promise<GdoClient> {
    const logger = options.logger ?? defaultLogger;
    const api = options.api ?? new GdoApiClient({ baseUrl: options.apiUrl, logger });
    const openSocket: SocketOpener = options.openSocket ?? ((url) => GdoSocket.open(url, { logger }));
    const socketUrl = options.socketUrl ?? DEFAULT_SOCKET_URL;

    const session = await api.login(options.username, options.password);
    logger.info(`Logged in as ${options.username}`);

    let socket: CommandSocket | null = null;
    try {
      const devices = await loadDevices(api, logger);
      const master = findMaster(devices);

      socket = await openSocket(socketUrl);
      await authenticateSocket(socket, options.username, session.apiKey);
      logger.info("Command socket authorized");

      return new GdoClient({
        username: options.username,
        session,
        devices,
        master,
        socketUrl,
        api,
        socket,
        logger,
      });
    } catch (error: unknown) {
      await releaseAfterFailure(api, socket, logger);
      throw error;
    }
  }

  get apiKey(): string {
    return this.session.apiKey;
  }

  /** Master unit time zone offset, if reported. */
  get tzOffset(): number | undefined {
    return this.master.lookupNumber("timeZoneOffset", "value");
  }

  /** The device at `index`, clamped into the device list. */
  device(index = 0): Device {
    if (!Number.isInteger(index)) {
      throw new GdoError(`Device index must be an integer, got ${index}`);
    }
    if (this.devices.length === 0) {
      throw new GdoError("No devices on this account");
    }
    const clamped = Math.max(0, Math.min(this.devices.length - 1, index));
    return this.devices[clamped];
  }

  /**
   * Send a payload built by one of the Device `cmd*` builders and return the reply.
   */
  async sendCommand(command: CommandPayload): Promise<unknown> {
    if (this.closed) {
      throw new GdoError("Client is closed");
    }
    return this.socket.request(command);
  }

  /**
   * Close the socket, then log out. Calling it again does nothing.
   * A socket failure is logged and rethrown after logout; a logout
   * failure takes precedence.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    let socketError: unknown = null;
    try {
      await this.socket.close();
    } catch (error: unknown) {
      this.logger.error(`Failed to close socket: ${errorMessage(error)}`);
      socketError = error;
    }

    await this.api.logout();
    this.logger.info("Logged out");
    if (socketError !== null) throw socketError;
  }
}

async function releaseAfterFailure(api: GdoApi, socket: CommandSocket | null, logger: GdoLogger): Promise<void> {
  if (socket !== null) {
    try {
      await socket.close();
    } catch (error: unknown) {
      logger.error(`Failed to close socket: ${errorMessage(error)}`);
    }
  }
  try {
    await api.logout();
  } catch (error: unknown) {
    logger.error(`Failed to log out: ${errorMessage(error)}`);
  }
}

/**
 * Run `fn` with a connected client and close it on every exit path.
 * A close failure after `fn` threw is logged, and `fn`'s error wins.
 */
export async function withClient<T>(options: GdoClientOptions, fn: (client: GdoClient) => Promise<T>): Promise<T> {
  const client = await GdoClient.connect(options);
  let result: T;
  try {
    result = await fn(client);
  } catch (error: unknown) {
    try {
      await client.close();
    } catch (closeError: unknown) {
      (options.logger ?? defaultLogger).error(`Failed to close client: ${errorMessage(closeError)}`);
    }
    throw error;
  }
  await client.close();
  return result;
}
