/**
 * Error types for the GDO client
 */

import type { ApiResponse } from "./types.js";

export class GdoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GdoError";
  }
}

/**
 * Raised when an HTTPS response is unusable: non-200 status,
 * an application error in the body, or no result payload.
 */
export class ResponseError extends GdoError {
  readonly reason: string;
  readonly response: ApiResponse;

  constructor(reason: string, response: ApiResponse) {
    super(`${reason}: ${describeFailure(response)}`);
    this.name = "ResponseError";
    this.reason = reason;
    this.response = response;
  }
}

export class SocketAuthError extends GdoError {
  readonly reply: unknown;

  constructor(message: string, reply: unknown) {
    super(message);
    this.name = "SocketAuthError";
    this.reply = reply;
  }
}

export function describeFailure(response: ApiResponse): string {
  switch (response.failure) {
    case "http":
      return `HTTP ${response.status}`;
    case "application":
      return JSON.stringify(response.data);
    case "missing-result":
      return "No result";
    case null:
      return "ok";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
