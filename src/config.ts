/**
 * Configuration for the GDO client
 */

import { config } from "dotenv";
import { z } from "zod";
import { DEFAULT_API_URL, DEFAULT_SOCKET_URL } from "./constants.js";
import { GdoError } from "./errors.js";

// Load environment variables from .env file
config({ quiet: true });

function protocolOf(value: string): string | null {
  try {
    return new URL(value).protocol;
  } catch {
    return null;
  }
}

const urlWithProtocol = (protocols: readonly string[]) =>
  z.string().refine((value) => protocols.includes(protocolOf(value) ?? ""), {
    message: `expected a ${protocols.join(" or ")} URL`,
  });

const ConfigSchema = z.object({
  apiUrl: urlWithProtocol(["https:", "http:"]).transform((url) => url.replace(/\/+$/, "")),
  socketUrl: urlWithProtocol(["wss:", "ws:"]),
  email: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
});

export type GdoConfig = z.infer<typeof ConfigSchema>;

/**
 * Read configuration from the environment. Unset or empty variables fall
 * back to the vendor endpoints; credentials stay undefined so the CLI can
 * take them from flags or a prompt.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): GdoConfig {
  const result = ConfigSchema.safeParse({
    apiUrl: env.GDO_API_URL || DEFAULT_API_URL,
    socketUrl: env.GDO_SOCKET_URL || DEFAULT_SOCKET_URL,
    email: env.GDO_EMAIL || undefined,
    password: env.GDO_PASSWORD || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new GdoError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
