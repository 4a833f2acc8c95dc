/**
 * TypeScript type definitions for the GDO cloud client
 */

import type { DoorCommandCode, RPC_METHODS, MODULE_COMMAND_MSG_TYPE, JSON_RPC_VERSION } from "./constants.js";

export type ResponseFailure = "http" | "application" | "missing-result";

/**
 * A classified HTTPS response. `failure` is null when the response
 * carries a usable `result`.
 */
export interface ApiResponse {
  status: number;
  failure: ResponseFailure | null;
  data: Record<string, unknown>;
  raw: string;
}

export interface Session {
  apiKey: string;
  /** The `result` object of the login response. */
  data: Record<string, unknown>;
}

export interface DeviceMeta {
  varName: string;
  name: string;
  [key: string]: unknown;
}

/** One module's attributes, e.g. the tree under "garageDoor_8". */
export type AttributeTree = Readonly<Record<string, unknown>>;

export interface DeviceDetails {
  attributes: Record<string, unknown>;
  [key: string]: unknown;
}

export type AttributeScalar = string | number | boolean;

export type ModuleMessage =
  | { doorCommand: DoorCommandCode }
  | { presetPosition: number }
  | { lightState: boolean }
  | { lightTimer: number }
  | { speed: number }
  | { vacationMode: boolean }
  | { motionSensor: boolean };

export interface CommandPayload {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: typeof RPC_METHODS.MODULE_COMMAND;
  params: {
    msgType: typeof MODULE_COMMAND_MSG_TYPE;
    moduleType: number | null;
    portId: number | null;
    topic: string;
    moduleMsg: ModuleMessage;
  };
}

export interface SocketAuthRequest {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: number;
  method: typeof RPC_METHODS.SOCKET_AUTH;
  params: {
    varName: string;
    apiKey: string;
  };
}
