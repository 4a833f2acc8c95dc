import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Device, classifyModuleKey } from "../src/device.js";
import { GdoError } from "../src/errors.js";
import { ChargerModule, DoorModule, FanModule, GdoModule, LightModule } from "../src/modules.js";
import { META, captureLogger, details, fullAttributes } from "./fixtures.js";

function device(attributes: Record<string, unknown> = fullAttributes()): Device {
  return new Device(META, details(attributes), { logger: captureLogger().logger });
}

describe("classifyModuleKey", () => {
  it("matches masterUnit exactly", () => {
    assert.equal(classifyModuleKey("masterUnit"), "master");
    assert.equal(classifyModuleKey("masterUnit_2"), "unknown");
  });

  it("matches module prefixes", () => {
    assert.equal(classifyModuleKey("backupCharger_8"), "charger");
    assert.equal(classifyModuleKey("garageDoor_7"), "door");
    assert.equal(classifyModuleKey("fan_3"), "fan");
    assert.equal(classifyModuleKey("wifiModule_1"), "wifi");
    assert.equal(classifyModuleKey("garageLight_7"), "light");
  });

  it("needs the underscore", () => {
    assert.equal(classifyModuleKey("fanatic"), "unknown");
    assert.equal(classifyModuleKey("garageDoor"), "unknown");
  });
});

describe("Device construction", () => {
  it("discovers one module per category and reports one unknown key", () => {
    const captured = captureLogger();
    const attributes = { ...fullAttributes(), btSpeaker_9: { speakerState: { value: 0 } } };
    const gdo = new Device(META, details(attributes), { logger: captured.logger });

    assert.ok(gdo.master instanceof GdoModule);
    assert.ok(gdo.charger instanceof ChargerModule);
    assert.ok(gdo.door instanceof DoorModule);
    assert.ok(gdo.fan instanceof FanModule);
    assert.ok(gdo.wifi instanceof GdoModule);
    assert.ok(gdo.light instanceof LightModule);
    assert.deepEqual(captured.warnings, ['Unknown module key "btSpeaker_9" on device gdo-0001']);
  });

  it("exposes id and name from the listing", () => {
    const gdo = device();
    assert.equal(gdo.id, "gdo-0001");
    assert.equal(gdo.name, "Garage");
  });

  it("leaves unreported modules empty", () => {
    const gdo = device({ garageDoor_1: { doorState: { value: 0 } } });
    assert.equal(gdo.light, null);
    assert.equal(gdo.fan, null);
    assert.equal(gdo.master, null);
    assert.equal(gdo.door?.key, "garageDoor_1");
  });

  it("keeps exactly one module when keys collide", () => {
    const gdo = device({ fan_1: { speed: { value: 10 } }, fan_2: { speed: { value: 20 } } });
    assert.ok(["fan_1", "fan_2"].includes(gdo.fan?.key ?? ""));
  });

  it("reads door status end to end", () => {
    assert.equal(device({ garageDoor_1: { doorState: { value: 1 } } }).door?.doorStatus(), "open");
    assert.equal(device({ garageDoor_1: {} }).door?.doorStatus(), "opening");
  });
});

describe("Device commands", () => {
  it("builds the door open payload", () => {
    assert.deepEqual(device().cmdOpen(), {
      jsonrpc: "2.0",
      method: "gdoModuleCommand",
      params: {
        msgType: 16,
        moduleType: 5,
        portId: 7,
        topic: "gdo-0001",
        moduleMsg: { doorCommand: "1" },
      },
    });
  });

  it("uses the close and preset codes", () => {
    assert.deepEqual(device().cmdClose().params.moduleMsg, { doorCommand: "0" });
    assert.deepEqual(device().cmdPreset().params.moduleMsg, { doorCommand: "2" });
  });

  it("clamps the preset position to the door's max", () => {
    const gdo = device({ garageDoor_1: { maxDoorPosition: { value: 100 } } });
    assert.deepEqual(gdo.cmdPresetPosition(150).params.moduleMsg, { presetPosition: 100 });
    assert.deepEqual(gdo.cmdPresetPosition(-5).params.moduleMsg, { presetPosition: 0 });
    assert.deepEqual(gdo.cmdPresetPosition(42.9).params.moduleMsg, { presetPosition: 42 });
  });

  it("clamps the preset position to 0 without a max position", () => {
    const gdo = device({ garageDoor_1: {} });
    assert.deepEqual(gdo.cmdPresetPosition(30).params.moduleMsg, { presetPosition: 0 });
  });

  it("clamps fan speed to 0-100", () => {
    const gdo = device();
    assert.deepEqual(gdo.cmdFan(-10).params.moduleMsg, { speed: 0 });
    assert.deepEqual(gdo.cmdFan(150).params.moduleMsg, { speed: 100 });
    assert.deepEqual(gdo.cmdFan(65).params.moduleMsg, { speed: 65 });
    assert.equal(gdo.cmdFan(65).params.portId, 3);
    assert.equal(gdo.cmdFan(65).params.moduleType, 4);
  });

  it("addresses light commands at the light module", () => {
    const on = device().cmdLight(true);
    assert.equal(on.params.moduleType, 3);
    assert.deepEqual(on.params.moduleMsg, { lightState: true });
    assert.deepEqual(device().cmdLightTimer(20).params.moduleMsg, { lightTimer: 20 });
  });

  it("does not clamp the light timer", () => {
    assert.deepEqual(device().cmdLightTimer(-4).params.moduleMsg, { lightTimer: -4 });
  });

  it("addresses motion sensor commands at the door", () => {
    const payload = device().cmdMotion(false);
    assert.equal(payload.params.moduleType, 5);
    assert.deepEqual(payload.params.moduleMsg, { motionSensor: false });
  });

  it("addresses vacation mode at the door module it is read from", () => {
    // Earlier clients pointed this command at a "vacation" module that no device reports.
    const payload = device().cmdVacation(true);
    assert.equal(payload.params.moduleType, 5);
    assert.equal(payload.params.portId, 7);
    assert.deepEqual(payload.params.moduleMsg, { vacationMode: true });
  });

  it("sends null ids when the module does not report them", () => {
    const payload = device({ garageDoor_1: {} }).cmdOpen();
    assert.equal(payload.params.moduleType, null);
    assert.equal(payload.params.portId, null);
  });

  it("rejects values that are not finite numbers", () => {
    const gdo = device();
    assert.throws(() => gdo.cmdFan(Number.NaN), {
      name: "GdoError",
      message: "speed must be a finite number, got NaN",
    });
    assert.throws(() => gdo.cmdPresetPosition(Number.POSITIVE_INFINITY), {
      message: "presetPosition must be a finite number, got Infinity",
    });
    assert.throws(() => gdo.cmdLightTimer(Number.NaN), GdoError);
  });

  it("refuses commands for modules the device lacks", () => {
    const gdo = device({ garageDoor_1: {} });
    assert.throws(() => gdo.cmdFan(50), GdoError);
    assert.throws(() => gdo.cmdLight(true), {
      message: 'Device "Garage" (gdo-0001) has no light module',
    });
  });
});
