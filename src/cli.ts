/**
 * Command-line interface: `gdo <command> [options]`.
 */

import yargs from "yargs";
import { z } from "zod";
import { withClient, type GdoClientOptions } from "./client.js";
import { CommandIntentSchema, DOOR_ACTIONS, SWITCH_STATES, buildCommand, type CommandIntent } from "./commands.js";
import { readConfig } from "./config.js";
import { GdoError, errorMessage } from "./errors.js";
import { createConsoleLogger, type GdoLogger } from "./logger.js";
import { resolveCredentials, type Credentials } from "./prompt.js";
import { STATUS_TARGETS, statusReport, type StatusTarget } from "./status.js";

export interface CliContext {
  stdout(line: string): void;
  stderr(line: string): void;
  env: NodeJS.ProcessEnv;
  credentials(given: Partial<Credentials>): Promise<Credentials>;
  logger?: GdoLogger;
  /** Merged into the client options, e.g. to swap in fakes. */
  clientOverrides?: Partial<GdoClientOptions>;
}

export const defaultCliContext: CliContext = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
  credentials: resolveCredentials,
};

interface GlobalArgs {
  email?: string;
  password?: string;
  dry: boolean;
  dev: number;
  verbose: boolean;
}

type Action = { type: "status"; target: StatusTarget } | { type: "command"; intent: CommandIntent };

const StatusTargetSchema = z.enum(STATUS_TARGETS);
const DeviceIndexSchema = z.number().int();

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function parseIntent(raw: Record<string, unknown>): CommandIntent {
  const result = CommandIntentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new GdoError(`Invalid arguments: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`);
  }
  return result.data;
}

function parseDeviceIndex(raw: unknown): number {
  const result = DeviceIndexSchema.safeParse(raw);
  if (!result.success) {
    throw new GdoError(`Invalid arguments: dev: ${result.error.issues[0]?.message ?? "expected an integer"}`);
  }
  return result.data;
}

async function execute(argv: GlobalArgs, action: Action, context: CliContext): Promise<void> {
  const dev = parseDeviceIndex(argv.dev);
  const config = readConfig(context.env);
  const logger = context.logger ?? createConsoleLogger(argv.verbose);
  const { email, password } = await context.credentials({
    email: argv.email ?? config.email,
    password: argv.password ?? config.password,
  });

  const options: GdoClientOptions = {
    username: email,
    password,
    apiUrl: config.apiUrl,
    socketUrl: config.socketUrl,
    logger,
    ...context.clientOverrides,
  };

  await withClient(options, async (client) => {
    const device = client.device(dev);

    if (action.type === "status") {
      context.stdout(toJson(statusReport(action.target, device, client)));
      return;
    }

    const command = buildCommand(device, action.intent);
    if (argv.dry) {
      context.stdout("Dry Run:");
      context.stdout(toJson(command));
      return;
    }

    context.stdout(`Request to ${client.socketUrl}:`);
    context.stdout(toJson(command));
    const reply = await client.sendCommand(command);
    context.stdout("Response:");
    context.stdout(toJson(reply));
  });
}

/**
 * Parse `args` and run the selected command. Resolves with the exit code.
 */
export async function runCli(args: string[], context: CliContext = defaultCliContext): Promise<number> {
  const run = async (argv: GlobalArgs, action: () => Action): Promise<void> => {
    await execute(argv, action(), context);
  };

  const parser = yargs(args)
    .scriptName("gdo")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .exitProcess(false)
    .fail(false)
    .demandCommand(1, "Specify a command")
    .option("email", {
      alias: "u",
      type: "string",
      describe: "Email address registered with the GDO app (default: GDO_EMAIL, then prompt)",
    })
    .option("password", {
      alias: ["p", "pwd"],
      type: "string",
      describe: "Password for the registered email (default: GDO_PASSWORD, then prompt)",
    })
    .option("dry", {
      alias: "n",
      type: "boolean",
      default: false,
      describe: "Dry run: print commands instead of sending them",
    })
    .option("dev", {
      alias: "d",
      type: "number",
      default: 0,
      describe: "Door opener device index, if the account has more than one",
    })
    .option("verbose", {
      type: "boolean",
      default: false,
      describe: "Log requests and session events to stderr",
    })
    .command(
      "status <thing>",
      "Output status for a given subsystem",
      (y) => y.positional("thing", { choices: STATUS_TARGETS, describe: "Subsystem" }),
      (argv) => run(argv, () => ({ type: "status", target: StatusTargetSchema.parse(argv.thing) })),
    )
    .command(
      "door <cmd>",
      "Manipulate the door: open, close, preset",
      (y) => y.positional("cmd", { choices: DOOR_ACTIONS }),
      (argv) => run(argv, () => ({ type: "command", intent: parseIntent({ kind: "door", action: argv.cmd }) })),
    )
    .command(
      "motion <set>",
      "Turn the motion sensor on or off",
      (y) => y.positional("set", { choices: SWITCH_STATES }),
      (argv) => run(argv, () => ({ type: "command", intent: parseIntent({ kind: "motion", on: argv.set }) })),
    )
    .command(
      "light <set>",
      "Turn the light on or off",
      (y) => y.positional("set", { choices: SWITCH_STATES }),
      (argv) => run(argv, () => ({ type: "command", intent: parseIntent({ kind: "light", on: argv.set }) })),
    )
    .command(
      "lighttimer <minutes>",
      "Set the number of minutes for the light timer",
      (y) => y.positional("minutes", { type: "number" }),
      (argv) =>
        run(argv, () => ({ type: "command", intent: parseIntent({ kind: "lightTimer", minutes: argv.minutes }) })),
    )
    .command(
      "fan <speed>",
      "Set fan to integer speed 0-100 (0 is off)",
      (y) => y.positional("speed", { type: "number" }),
      (argv) => run(argv, () => ({ type: "command", intent: parseIntent({ kind: "fan", speed: argv.speed }) })),
    )
    .command(
      "vacation <set>",
      "Turn vacation mode on or off",
      (y) => y.positional("set", { choices: SWITCH_STATES }),
      (argv) => run(argv, () => ({ type: "command", intent: parseIntent({ kind: "vacation", on: argv.set }) })),
    )
    .command(
      "preset <inches>",
      "Set the preset position in integer inches",
      (y) => y.positional("inches", { type: "number" }),
      (argv) =>
        run(argv, () => ({ type: "command", intent: parseIntent({ kind: "presetPosition", inches: argv.inches }) })),
    )
    .help();

  try {
    await parser.parseAsync();
    return 0;
  } catch (error: unknown) {
    context.stderr(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
