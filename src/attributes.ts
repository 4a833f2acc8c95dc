/**
 * Attribute access for device module records.
 *
 * Device details report each module as a nested tree, e.g.
 *
 *   "garageDoor_8": { "doorState": { "value": 1 }, "portId": { "value": 7 }, ... }
 *
 * Lookups return `undefined` for anything missing so callers can tell
 * "not reported" apart from a reported `false` or `0`.
 */

import type { AttributeScalar, AttributeTree } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` into `tree`. Returns `undefined` as soon as a step is
 * missing, null, or not an object.
 */
export function lookupPath(tree: AttributeTree | null, path: readonly string[]): unknown {
  if (tree === null) return undefined;

  let current: unknown = tree;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
    if (current === undefined || current === null) return undefined;
  }
  return current;
}

export class AttributeAccessor {
  readonly key: string;
  private readonly tree: AttributeTree | null;

  constructor(key: string, data: unknown) {
    this.key = key;
    this.tree = isRecord(data) ? data : null;
  }

  lookup(...path: string[]): unknown {
    return lookupPath(this.tree, path);
  }

  lookupNumber(...path: string[]): number | undefined {
    const value = this.lookup(...path);
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
  }

  lookupScalar(...path: string[]): AttributeScalar | undefined {
    const value = this.lookup(...path);
    switch (typeof value) {
      case "string":
      case "number":
      case "boolean":
        return value;
      default:
        return undefined;
    }
  }

  hasData(): boolean {
    return this.tree !== null;
  }

  /** The raw tree, for config dumps. */
  toJSON(): AttributeTree | null {
    return this.tree;
  }
}
