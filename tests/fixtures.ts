/**
 * Shared test data and fakes.
 */

import type { GdoApi } from "../src/api-client.js";
import type { GdoLogger } from "../src/logger.js";
import type { DeviceDetails, DeviceMeta, Session } from "../src/types.js";
import type { CommandSocket } from "../src/ws-client.js";

export const META: DeviceMeta = { varName: "gdo-0001", name: "Garage" };

export function fullAttributes(): Record<string, unknown> {
  return {
    masterUnit: {
      timeZoneOffset: { value: -300 },
      portId: { value: 0 },
      moduleId: { value: 1 },
    },
    backupCharger_8: {
      chargeLevel: { value: 87 },
      portId: { value: 8 },
      moduleId: { value: 6 },
    },
    garageDoor_7: {
      doorState: { value: 1 },
      opMode: { value: 0 },
      maxDoorPosition: { value: 100 },
      doorPosition: { value: 100 },
      presetPosition: { value: 40 },
      motionSensor: { value: true },
      alarmState: { value: false },
      motorStatus: { value: 0 },
      sensorFlag: { value: 1 },
      vacationMode: { value: false },
      portId: { value: 7 },
      moduleId: { value: 5 },
    },
    fan_3: {
      speed: { value: 50 },
      portId: { value: 3 },
      moduleId: { value: 4 },
    },
    wifiModule_1: {
      rssi: { value: -60 },
      portId: { value: 1 },
      moduleId: { value: 2 },
    },
    garageLight_7: {
      lightState: { value: false },
      lightTimer: { value: 10 },
      portId: { value: 7 },
      moduleId: { value: 3 },
    },
  };
}

export function details(attributes: Record<string, unknown> = fullAttributes()): DeviceDetails {
  return { attributes };
}

export interface CapturedLogger {
  logger: GdoLogger;
  warnings: string[];
  errors: string[];
}

export function captureLogger(): CapturedLogger {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    logger: {
      debug: () => undefined,
      info: () => undefined,
      warn: (message) => warnings.push(message),
      error: (message) => errors.push(message),
    },
    warnings,
    errors,
  };
}

export const SESSION: Session = { apiKey: "test-api-key", data: { auth: { apiKey: "test-api-key" } } };

/** In-process stand-in for the HTTPS API. */
export class FakeApi implements GdoApi {
  calls: string[] = [];
  devices: DeviceMeta[] = [META];
  deviceDetails = new Map<string, DeviceDetails>([[META.varName, details()]]);
  loginError: Error | null = null;
  logoutError: Error | null = null;

  async login(username: string, password: string): Promise<Session> {
    this.calls.push(`login ${username} ${password}`);
    if (this.loginError) throw this.loginError;
    return SESSION;
  }

  async logout(): Promise<void> {
    this.calls.push("logout");
    if (this.logoutError) throw this.logoutError;
  }

  async listDevices(): Promise<DeviceMeta[]> {
    this.calls.push("listDevices");
    return this.devices;
  }

  async getDeviceDetails(varName: string): Promise<DeviceDetails> {
    this.calls.push(`getDeviceDetails ${varName}`);
    const found = this.deviceDetails.get(varName);
    if (!found) throw new Error(`no details for ${varName}`);
    return found;
  }
}

/** Command socket that answers from a queue of canned replies. */
export class FakeSocket implements CommandSocket {
  sent: unknown[] = [];
  replies: unknown[];
  closed = 0;
  closeError: Error | null = null;

  constructor(replies: unknown[] = []) {
    this.replies = replies;
  }

  async request(message: unknown): Promise<unknown> {
    this.sent.push(message);
    if (this.replies.length === 0) throw new Error("no reply queued");
    return this.replies.shift();
  }

  async close(): Promise<void> {
    this.closed += 1;
    if (this.closeError) throw this.closeError;
  }
}

export const AUTHORIZED = { jsonrpc: "2.0", id: 3, params: { authorized: true } };
