/**
 * Typed views over the modules a GDO reports (door, light, fan, ...).
 *
 * Each reading is stored as `{ "<field>": { "value": ... } }`.
 */

import { AttributeAccessor } from "./attributes.js";
import type { AttributeScalar } from "./types.js";

export const DOOR_STATUS = {
  OPENING: "opening",
  CLOSING: "closing",
  OPEN: "open",
  CLOSED: "closed",
} as const;

export type DoorStatus = (typeof DOOR_STATUS)[keyof typeof DOOR_STATUS];

export const DOOR_ERROR = {
  ERROR: "error",
  LOCKED: "locked",
} as const;

/** `null` means no error. */
export type DoorError = (typeof DOOR_ERROR)[keyof typeof DOOR_ERROR] | null;

/**
 * Decode `doorState`. Codes other than 0-2, including a missing code,
 * decode as "opening".
 */
export function decodeDoorStatus(code: unknown): DoorStatus {
  switch (code) {
    case 0:
      return DOOR_STATUS.CLOSED;
    case 1:
      return DOOR_STATUS.OPEN;
    case 2:
      return DOOR_STATUS.CLOSING;
    default:
      return DOOR_STATUS.OPENING;
  }
}

/**
 * Decode `opMode`. Only 1 and 2 name an error; every other code is no error.
 */
export function decodeDoorError(code: unknown): DoorError {
  switch (code) {
    case 1:
      return DOOR_ERROR.ERROR;
    case 2:
      return DOOR_ERROR.LOCKED;
    default:
      return null;
  }
}

/** Generic module: wifi, master unit. */
export class GdoModule extends AttributeAccessor {
  protected reading(field: string): AttributeScalar | undefined {
    return this.lookupScalar(field, "value");
  }

  protected numericReading(field: string): number | undefined {
    return this.lookupNumber(field, "value");
  }

  /** Port ID for addressing socket commands. */
  portId(): number | undefined {
    return this.numericReading("portId");
  }

  /** Module type ID for addressing socket commands. */
  moduleId(): number | undefined {
    return this.numericReading("moduleId");
  }
}

export class ChargerModule extends GdoModule {
  /** Battery charge, 0-100. */
  level(): number | undefined {
    return this.numericReading("chargeLevel");
  }
}

export class DoorModule extends GdoModule {
  maxPosition(): number | undefined {
    return this.numericReading("maxDoorPosition");
  }

  presetPosition(): number | undefined {
    return this.numericReading("presetPosition");
  }

  doorPosition(): number | undefined {
    return this.numericReading("doorPosition");
  }

  alarm(): AttributeScalar | undefined {
    return this.reading("alarmState");
  }

  motor(): AttributeScalar | undefined {
    return this.reading("motorStatus");
  }

  motionSensor(): AttributeScalar | undefined {
    return this.reading("motionSensor");
  }

  /** Safety sensor state. */
  sensorFlag(): AttributeScalar | undefined {
    return this.reading("sensorFlag");
  }

  vacationMode(): AttributeScalar | undefined {
    return this.reading("vacationMode");
  }

  doorStatus(): DoorStatus {
    return decodeDoorStatus(this.lookup("doorState", "value"));
  }

  doorError(): DoorError {
    return decodeDoorError(this.lookup("opMode", "value"));
  }
}

export class FanModule extends GdoModule {
  /** 0 is off, 100 is full speed. */
  speed(): number | undefined {
    return this.numericReading("speed");
  }
}

export class LightModule extends GdoModule {
  isOn(): AttributeScalar | undefined {
    return this.reading("lightState");
  }

  /** Auto-off delay in minutes. */
  timer(): number | undefined {
    return this.numericReading("lightTimer");
  }
}
