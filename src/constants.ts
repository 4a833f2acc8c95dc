/**
 * Constants for the GDO cloud client
 */

export const DEFAULT_API_URL = "https://tti.tiwiconnect.com/api";
export const DEFAULT_SOCKET_URL = "wss://tti.tiwiconnect.com/api/wsrpc";

// Headers the vendor app sends; the API answers in its "tti-app" shape only with these.
export const TRANSFORM_HEADER = "x-tc-transform";
export const TRANSFORM_VALUE = "tti-app";
export const TRANSFORM_VERSION_HEADER = "x-tc-transformversion";
export const TRANSFORM_VERSION_VALUE = "0.2";

export const JSON_RPC_VERSION = "2.0";

export const RPC_METHODS = {
  MODULE_COMMAND: "gdoModuleCommand",
  SOCKET_AUTH: "srvWebSocketAuth",
} as const;

export const SOCKET_AUTH_REQUEST_ID = 3;
export const MODULE_COMMAND_MSG_TYPE = 16;

// Door commands travel as decimal strings.
export const DOOR_COMMANDS = {
  close: "0",
  open: "1",
  preset: "2",
} as const;

export type DoorCommandCode = (typeof DOOR_COMMANDS)[keyof typeof DOOR_COMMANDS];

export const FAN_SPEED_MIN = 0;
export const FAN_SPEED_MAX = 100;

export type ModuleKind = "master" | "charger" | "door" | "fan" | "wifi" | "light";

export interface ModuleKeyRule {
  match: "exact" | "prefix";
  pattern: string;
  kind: ModuleKind;
}

/**
 * Attribute map keys → module kind. Checked in order, first match wins.
 */
export const MODULE_KEY_RULES: readonly ModuleKeyRule[] = [
  { match: "exact", pattern: "masterUnit", kind: "master" },
  { match: "prefix", pattern: "backupCharger_", kind: "charger" },
  { match: "prefix", pattern: "garageDoor_", kind: "door" },
  { match: "prefix", pattern: "fan_", kind: "fan" },
  { match: "prefix", pattern: "wifiModule_", kind: "wifi" },
  { match: "prefix", pattern: "garageLight_", kind: "light" },
];

export const API_TIMEOUT_MS = 10000;
