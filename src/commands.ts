/**
 * Command intents accepted by the CLI and their mapping onto device payloads.
 */

import { z } from "zod";
import type { Device } from "./device.js";
import type { CommandPayload } from "./types.js";

export const DOOR_ACTIONS = ["open", "close", "preset"] as const;
export const SWITCH_STATES = ["on", "off"] as const;

const switchState = z.enum(SWITCH_STATES).transform((state) => state === "on");
const wholeNumber = z.number().int();

export const CommandIntentSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("door"), action: z.enum(DOOR_ACTIONS) }),
  z.object({ kind: z.literal("motion"), on: switchState }),
  z.object({ kind: z.literal("light"), on: switchState }),
  // Negative values are raised to 0 here; the device builder does not clamp minutes.
  z.object({ kind: z.literal("lightTimer"), minutes: wholeNumber.transform((m) => Math.max(0, m)) }),
  z.object({ kind: z.literal("fan"), speed: wholeNumber }),
  z.object({ kind: z.literal("vacation"), on: switchState }),
  z.object({ kind: z.literal("presetPosition"), inches: wholeNumber.transform((i) => Math.max(0, i)) }),
]);

export type CommandIntent = z.output<typeof CommandIntentSchema>;

function doorCommand(device: Device, action: (typeof DOOR_ACTIONS)[number]): CommandPayload {
  switch (action) {
    case "open":
      return device.cmdOpen();
    case "close":
      return device.cmdClose();
    case "preset":
      return device.cmdPreset();
  }
}

export function buildCommand(device: Device, intent: CommandIntent): CommandPayload {
  switch (intent.kind) {
    case "door":
      return doorCommand(device, intent.action);
    case "motion":
      return device.cmdMotion(intent.on);
    case "light":
      return device.cmdLight(intent.on);
    case "lightTimer":
      return device.cmdLightTimer(intent.minutes);
    case "fan":
      return device.cmdFan(intent.speed);
    case "vacation":
      return device.cmdVacation(intent.on);
    case "presetPosition":
      return device.cmdPresetPosition(intent.inches);
  }
}
