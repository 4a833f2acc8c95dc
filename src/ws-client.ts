/**
 * WebSocket connection to the GDO command endpoint.
 *
 * The endpoint speaks JSON-RPC, but the client only ever has one request
 * in flight: send a message, take the next message as its reply.
 */

import { WebSocket, type RawData } from "ws";
import { API_TIMEOUT_MS } from "./constants.js";
import { GdoError } from "./errors.js";
import { defaultLogger, type GdoLogger } from "./logger.js";

/** What the client needs from the socket. */
export interface CommandSocket {
  request(message: unknown): Promise<unknown>;
  close(): Promise<void>;
}

export interface GdoSocketOptions {
  timeoutMs?: number;
  logger?: GdoLogger;
}

export class GdoSocket implements CommandSocket {
  private readonly ws: WebSocket;
  private readonly timeoutMs: number;
  private readonly logger: GdoLogger;
  private busy = false;

  private constructor(ws: WebSocket, timeoutMs: number, logger: GdoLogger) {
    this.ws = ws;
    this.timeoutMs = timeoutMs;
    this.logger = logger;

    // Runtime errors surface through the pending request's close/timeout path.
    this.ws.on("error", (error) => {
      this.logger.error(`WebSocket error: ${error.message}`);
    });
  }

  /**
   * Open a connection. Resolves once the socket is open.
   */
  static open(url: string, options: GdoSocketOptions = {}): Promise<GdoSocket> {
    const timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
    const logger = options.logger ?? defaultLogger;

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);

      const timeout = setTimeout(() => {
        ws.removeAllListeners();
        ws.on("error", (error) => logger.debug(`WebSocket aborted: ${error.message}`));
        ws.terminate();
        reject(new GdoError(`WebSocket connection timeout after ${timeoutMs}ms: ${url}`));
      }, timeoutMs);

      ws.once("open", () => {
        clearTimeout(timeout);
        ws.removeAllListeners("error");
        logger.debug(`WebSocket connected to ${url}`);
        resolve(new GdoSocket(ws, timeoutMs, logger));
      });

      ws.once("error", (error) => {
        clearTimeout(timeout);
        reject(new GdoError(`WebSocket connection failed: ${error.message}`));
      });
    });
  }

  isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  /**
   * Send `message` as JSON and resolve with the next message received, parsed.
   */
  request(message: unknown): Promise<unknown> {
    if (!this.isOpen()) {
      return Promise.reject(new GdoError("WebSocket not connected"));
    }
    if (this.busy) {
      return Promise.reject(new GdoError("WebSocket request already in flight"));
    }
    this.busy = true;

    return new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        reject(new GdoError(`WebSocket reply timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      const cleanup = () => {
        clearTimeout(timeout);
        this.ws.off("message", onMessage);
        this.ws.off("close", onClose);
        this.busy = false;
      };

      const onMessage = (data: RawData) => {
        cleanup();
        try {
          resolve(JSON.parse(data.toString()));
        } catch {
          reject(new GdoError("Invalid JSON reply on WebSocket"));
        }
      };

      const onClose = () => {
        cleanup();
        reject(new GdoError("WebSocket closed before a reply arrived"));
      };

      this.ws.on("message", onMessage);
      this.ws.on("close", onClose);

      this.ws.send(JSON.stringify(message), (error) => {
        if (error) {
          cleanup();
          reject(new GdoError(`WebSocket send failed: ${error.message}`));
        }
      });
    });
  }

  /**
   * Close the connection and wait for the close handshake. Safe to call twice.
   */
  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.ws.once("close", () => resolve());
      if (this.ws.readyState !== WebSocket.CLOSING) {
        this.ws.close();
      }
    });
  }
}
