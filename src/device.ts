/**
 * A garage door opener unit and the commands it accepts.
 *
 * The device details map module keys ("garageDoor_8", "garageLight_8", ...)
 * to attribute trees. Keys are classified once at construction; unknown
 * keys are reported and skipped.
 */

import {
  DOOR_COMMANDS,
  FAN_SPEED_MAX,
  FAN_SPEED_MIN,
  JSON_RPC_VERSION,
  MODULE_COMMAND_MSG_TYPE,
  MODULE_KEY_RULES,
  RPC_METHODS,
  type ModuleKind,
} from "./constants.js";
import { GdoError } from "./errors.js";
import { defaultLogger, type GdoLogger } from "./logger.js";
import { ChargerModule, DoorModule, FanModule, GdoModule, LightModule } from "./modules.js";
import type { CommandPayload, DeviceDetails, DeviceMeta, ModuleMessage } from "./types.js";

export function classifyModuleKey(key: string): ModuleKind | "unknown" {
  for (const rule of MODULE_KEY_RULES) {
    const matched = rule.match === "exact" ? key === rule.pattern : key.startsWith(rule.pattern);
    if (matched) return rule.kind;
  }
  return "unknown";
}

export interface DeviceOptions {
  logger?: GdoLogger;
}

function wholeNumber(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new GdoError(`${field} must be a finite number, got ${value}`);
  }
  return Math.trunc(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class Device {
  readonly meta: DeviceMeta;
  readonly data: DeviceDetails;

  readonly master: GdoModule | null = null;
  readonly charger: ChargerModule | null = null;
  readonly door: DoorModule | null = null;
  // Only one fan is kept per device.
  readonly fan: FanModule | null = null;
  readonly wifi: GdoModule | null = null;
  readonly light: LightModule | null = null;

  constructor(meta: DeviceMeta, data: DeviceDetails, options: DeviceOptions = {}) {
    const logger = options.logger ?? defaultLogger;
    this.meta = meta;
    this.data = data;

    for (const [key, value] of Object.entries(data.attributes)) {
      const kind = classifyModuleKey(key);
      switch (kind) {
        case "master":
          this.master = new GdoModule(key, value);
          break;
        case "charger":
          this.charger = new ChargerModule(key, value);
          break;
        case "door":
          this.door = new DoorModule(key, value);
          break;
        case "fan":
          this.fan = new FanModule(key, value);
          break;
        case "wifi":
          this.wifi = new GdoModule(key, value);
          break;
        case "light":
          this.light = new LightModule(key, value);
          break;
        case "unknown":
          logger.warn(`Unknown module key "${key}" on device ${meta.varName}`);
          break;
      }
    }
  }

  get id(): string {
    return this.meta.varName;
  }

  get name(): string {
    return this.meta.name;
  }

  requireDoor(): DoorModule {
    return this.requireModule(this.door, "door");
  }

  requireLight(): LightModule {
    return this.requireModule(this.light, "light");
  }

  requireFan(): FanModule {
    return this.requireModule(this.fan, "fan");
  }

  requireCharger(): ChargerModule {
    return this.requireModule(this.charger, "charger");
  }

  // --------------------------------------------------------------------------
  // Command builders. None of these send anything.
  // --------------------------------------------------------------------------

  cmdOpen(): CommandPayload {
    return this.modulePayload(this.requireDoor(), { doorCommand: DOOR_COMMANDS.open });
  }

  cmdClose(): CommandPayload {
    return this.modulePayload(this.requireDoor(), { doorCommand: DOOR_COMMANDS.close });
  }

  /** Move the door to its stored preset position. */
  cmdPreset(): CommandPayload {
    return this.modulePayload(this.requireDoor(), { doorCommand: DOOR_COMMANDS.preset });
  }

  /**
   * Store a new preset position, clamped to [0, max door position].
   * A door that reports no max position clamps to 0.
   */
  cmdPresetPosition(position: number): CommandPayload {
    const requested = wholeNumber(position, "presetPosition");
    const door = this.requireDoor();
    const max = door.maxPosition() ?? 0;
    return this.modulePayload(door, {
      presetPosition: Math.max(0, Math.min(max, requested)),
    });
  }

  cmdLight(on: boolean): CommandPayload {
    return this.modulePayload(this.requireLight(), { lightState: on });
  }

  /** Minutes must be non-negative; they are not clamped here. */
  cmdLightTimer(minutes: number): CommandPayload {
    return this.modulePayload(this.requireLight(), { lightTimer: wholeNumber(minutes, "lightTimer") });
  }

  cmdFan(speed: number): CommandPayload {
    const requested = wholeNumber(speed, "speed");
    return this.modulePayload(this.requireFan(), {
      speed: clamp(requested, FAN_SPEED_MIN, FAN_SPEED_MAX),
    });
  }

  /** Vacation mode lives on the door module, where it is also read from. */
  cmdVacation(on: boolean): CommandPayload {
    return this.modulePayload(this.requireDoor(), { vacationMode: on });
  }

  cmdMotion(on: boolean): CommandPayload {
    return this.modulePayload(this.requireDoor(), { motionSensor: on });
  }

  private modulePayload(module: GdoModule, moduleMsg: ModuleMessage): CommandPayload {
    return {
      jsonrpc: JSON_RPC_VERSION,
      method: RPC_METHODS.MODULE_COMMAND,
      params: {
        msgType: MODULE_COMMAND_MSG_TYPE,
        moduleType: module.moduleId() ?? null,
        portId: module.portId() ?? null,
        topic: this.id,
        moduleMsg,
      },
    };
  }

  private requireModule<T extends GdoModule>(module: T | null, label: string): T {
    if (module === null) {
      throw new GdoError(`Device "${this.name}" (${this.id}) has no ${label} module`);
    }
    return module;
  }
}
