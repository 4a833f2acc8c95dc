/**
 * Status reports printed by `gdo status <thing>`.
 *
 * Readings a module does not report come out as null.
 */

import type { Device } from "./device.js";
import type { DoorError, DoorStatus } from "./modules.js";
import type { AttributeScalar, DeviceDetails, DeviceMeta, Session } from "./types.js";

export const STATUS_TARGETS = ["config", "charger", "door", "light", "fan"] as const;
export type StatusTarget = (typeof STATUS_TARGETS)[number];

type Reading<T> = T | null;

export interface ChargerReport {
  level: Reading<number>;
}

export interface DoorReport {
  status: DoorStatus;
  error: DoorError;
  pos: Reading<number>;
  max: Reading<number>;
  preset: Reading<number>;
  motion: Reading<AttributeScalar>;
  alarm: Reading<AttributeScalar>;
  motor: Reading<AttributeScalar>;
  sensor: Reading<AttributeScalar>;
  vacation: Reading<AttributeScalar>;
}

export interface LightReport {
  light: Reading<AttributeScalar>;
  timer: Reading<number>;
}

export interface FanReport {
  speed: Reading<number>;
}

export interface ConfigReport {
  session: Record<string, unknown>;
  devices: Array<{ meta: DeviceMeta; data: DeviceDetails }>;
}

export function chargerReport(device: Device): ChargerReport {
  return { level: device.requireCharger().level() ?? null };
}

export function doorReport(device: Device): DoorReport {
  const door = device.requireDoor();
  return {
    status: door.doorStatus(),
    error: door.doorError(),
    pos: door.doorPosition() ?? null,
    max: door.maxPosition() ?? null,
    preset: door.presetPosition() ?? null,
    motion: door.motionSensor() ?? null,
    alarm: door.alarm() ?? null,
    motor: door.motor() ?? null,
    sensor: door.sensorFlag() ?? null,
    vacation: door.vacationMode() ?? null,
  };
}

export function lightReport(device: Device): LightReport {
  const light = device.requireLight();
  return {
    light: light.isOn() ?? null,
    timer: light.timer() ?? null,
  };
}

export function fanReport(device: Device): FanReport {
  return { speed: device.requireFan().speed() ?? null };
}

export function configReport(session: Session, devices: readonly Device[]): ConfigReport {
  return {
    session: session.data,
    devices: devices.map((device) => ({ meta: device.meta, data: device.data })),
  };
}

export type StatusReport = ChargerReport | DoorReport | LightReport | FanReport | ConfigReport;

export function statusReport(
  target: StatusTarget,
  device: Device,
  context: { session: Session; devices: readonly Device[] },
): StatusReport {
  switch (target) {
    case "config":
      return configReport(context.session, context.devices);
    case "charger":
      return chargerReport(device);
    case "door":
      return doorReport(device);
    case "light":
      return lightReport(device);
    case "fan":
      return fanReport(device);
  }
}
