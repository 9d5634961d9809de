// src/cli.ts

import yargs from "yargs";
import { formatAddrPort } from "./address";
import { advertiseAll, readAdvertiseFile } from "./advertise_file";
import { AddressSource } from "./address_source";
import { loadEnvSettings, parsePortOption } from "./config";
import { ConfigurationError, PeerdiscError } from "./errors";
import {
  LogHandler,
  LogLevel,
  Logger,
  consoleLogHandler,
  describeError,
} from "./logger";
import { RegistryOptions, findService, listServices, startRegistry } from "./registry";
import { Service, formatLabels } from "./service";
import { TailscaleAddressSource } from "./tailscale_address_source";
import { RegistryTransport } from "./transport";

const LOG_LEVEL_CHOICES = ["debug", "info", "warn", "error", "none"] as const;

/**
 * Process bindings of the CLI, replaceable for tests.
 */
export interface CliContext {
  out: (line: string) => void;
  err: (line: string) => void;
  env: Record<string, string | undefined>;
  logHandler: LogHandler;
  /** Resolves when the advertise command should stop. */
  waitForShutdown: () => Promise<void>;
  addressSource?: AddressSource;
  transport?: RegistryTransport;
}

interface GlobalArgs {
  port?: number;
  logLevel?: LogLevel;
  tailscaleSocket?: string;
}

/**
 * Exit codes: 0 success, 1 runtime failure, 2 usage error.
 */
export async function runCli(
  args: string[],
  overrides: Partial<CliContext> = {},
): Promise<number> {
  const ctx: CliContext = {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
    logHandler: consoleLogHandler,
    waitForShutdown: waitForSignal,
    ...overrides,
  };

  let exitCode = 0;
  const parser = yargs(args)
    .scriptName("peerdisc")
    .usage("Usage: $0 <command> [parameters]")
    .option("port", {
      type: "number",
      describe: "Well-known discovery port",
    })
    .option("log-level", {
      choices: LOG_LEVEL_CHOICES,
      describe: "Minimum level of log output",
    })
    .option("tailscale-socket", {
      type: "string",
      describe: "Path of tailscaled's local API socket",
    })
    .command(
      "list",
      "Print a list of advertised services on the network",
      (y) => y,
      async (argv) => {
        exitCode = await runList(ctx, argv);
      },
    )
    .command(
      "find <name> [labels..]",
      "Find a service, given name and key=value labels",
      (y) =>
        y
          .positional("name", { type: "string", demandOption: true })
          .positional("labels", { type: "string", array: true }),
      async (argv) => {
        exitCode = await runFind(ctx, argv, argv.name, argv.labels ?? []);
      },
    )
    .command(
      "advertise <file>",
      "Read services from a JSON file (- for stdin) and advertise them",
      (y) => y.positional("file", { type: "string", demandOption: true }),
      async (argv) => {
        exitCode = await runAdvertise(ctx, argv, argv.file);
      },
    )
    .demandCommand(1, "No command given")
    .strict()
    .help()
    .exitProcess(false)
    .fail(false);

  try {
    await parser.parseAsync();
  } catch (err) {
    if (err instanceof PeerdiscError && !(err instanceof ConfigurationError)) {
      ctx.err(err.message);
      return 1;
    }
    ctx.err(describeError(err));
    ctx.err("Run 'peerdisc --help' for usage.");
    return 2;
  }
  return exitCode;
}

function buildOptions(ctx: CliContext, argv: GlobalArgs): RegistryOptions {
  const env = loadEnvSettings(ctx.env);
  const level = argv.logLevel ?? env.logLevel ?? "warn";
  return {
    port: parsePortOption(argv.port) ?? env.port,
    addressSource:
      ctx.addressSource ??
      new TailscaleAddressSource({
        socketPath: argv.tailscaleSocket ?? env.tailscaleSocket,
      }),
    transport: ctx.transport,
    logger: new Logger({ component: "cli" }, { handler: ctx.logHandler, level }),
  };
}

async function runList(ctx: CliContext, argv: GlobalArgs): Promise<number> {
  const services = await listServices(buildOptions(ctx, argv));
  if (services.length === 0) {
    ctx.err("No advertised services found");
    return 0;
  }
  for (const line of formatServiceTable(services)) {
    ctx.out(line);
  }
  return 0;
}

async function runFind(
  ctx: CliContext,
  argv: GlobalArgs,
  name: string,
  labelArgs: string[],
): Promise<number> {
  const labels: Record<string, string> = {};
  for (const arg of labelArgs) {
    const parsed = parseLabelArg(arg);
    if (!parsed) {
      ctx.err(`Cannot parse label '${arg}'`);
      return 2;
    }
    labels[parsed[0]] = parsed[1];
  }
  const target = await findService(name, labels, buildOptions(ctx, argv));
  ctx.out(formatAddrPort(target));
  return 0;
}

async function runAdvertise(
  ctx: CliContext,
  argv: GlobalArgs,
  file: string,
): Promise<number> {
  const services = await readAdvertiseFile(file);
  const registry = await startRegistry(buildOptions(ctx, argv));

  try {
    advertiseAll(registry, services);
    const fatal = new Promise<Error>((resolve) => {
      registry.controller.once("fatal", resolve);
    });
    ctx.err("Advertising services. Stop by sending SIGINT...");
    const failure = await Promise.race([
      ctx.waitForShutdown().then(() => undefined),
      fatal,
    ]);
    if (failure) {
      ctx.err(failure.message);
      return 1;
    }
    return 0;
  } finally {
    await registry.stop();
  }
}

/**
 * Splits `key=value` at the first '='.
 */
export function parseLabelArg(arg: string): [string, string] | undefined {
  const sep = arg.indexOf("=");
  if (sep < 0) {
    return undefined;
  }
  return [arg.slice(0, sep), arg.slice(sep + 1)];
}

/**
 * Aligned `* name  address  labels` rows, three spaces between columns.
 */
export function formatServiceTable(services: readonly Service[]): string[] {
  const rows = services.map((s) => [
    `* ${s.name}`,
    formatAddrPort(s.addrPort),
    formatLabels(s.labels),
  ]);
  const widths = [0, 1].map((col) =>
    Math.max(...rows.map((row) => row[col].length)),
  );
  return rows.map((row) =>
    [row[0].padEnd(widths[0] + 3), row[1].padEnd(widths[1] + 3), row[2]].join(""),
  );
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      process.removeListener("SIGINT", onSignal);
      process.removeListener("SIGTERM", onSignal);
      resolve();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}
