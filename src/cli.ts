import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { serverConfig } from "./config/server-config.js";
import { getMesosConfig } from "./config/mesos-config.js";
import { getHttpServerConfig } from "./config/http-config.js";
import { OperationResult } from "./models/maintenance-models.js";
import { MesosClient } from "./utils/mesos-client.js";
import { cordonMachine } from "./tools/cordon.js";
import { uncordonMachine } from "./tools/uncordon.js";
import { drainMachine, upMachine } from "./tools/machine-status.js";
import { maintenanceStatus } from "./tools/maintenance-status.js";
import { ServeOptions, serveMaintenanceTools } from "./server.js";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  /** Current time in seconds since the epoch. */
  now?: () => number;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  serve?: (client: MesosClient, options: ServeOptions) => Promise<void>;
}

interface GlobalOptions {
  mesosUrl: string;
  timeout?: number;
}

interface MachineOptions {
  ip?: string;
  dryRun?: boolean;
}

interface CordonOptions extends MachineOptions {
  duration: number;
}

interface ServeCommandOptions {
  transport: "stdio" | "http";
  port?: number;
  host?: string;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Must be a non-negative number of seconds.");
  }
  return seconds;
}

function parseMilliseconds(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError("Must be a non-negative whole number of milliseconds.");
  }
  return ms;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Must be a port number between 0 and 65535.");
  }
  return port;
}

// Subcommands are created through program.command() so they inherit
// exitOverride and the output configuration.
function machineCommand(program: Command, name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .argument("<hostname>", "Hostname of the node")
    .option("--ip <ip>", "IP of the node (if different from the hostname)")
    .option("--dry-run", "Print the request instead of sending it");
}

/**
 * Run one command. Resolves to the process exit code: 0 on success, 1 when a
 * maintenance schedule error was reported. Transport failures reject.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const config = getMesosConfig(deps.env ?? process.env);
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  let exitCode = 0;

  const program = new Command("dcosctl")
    .description("Commands for working with the Mesos maintenance API for old versions of DC/OS")
    .version(serverConfig.version)
    .option("--mesos-url <url>", "URL for the Mesos master", config.mesosUrl)
    .option(
      "--timeout <ms>",
      "Abort Mesos requests after this many milliseconds (0 waits indefinitely)",
      parseMilliseconds,
      config.timeoutMs
    )
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  const client = (): MesosClient => {
    const { mesosUrl, timeout } = program.opts<GlobalOptions>();
    return new MesosClient({
      baseUrl: mesosUrl,
      timeoutMs: timeout || undefined,
      fetch: deps.fetch,
    });
  };

  const report = (result: OperationResult): void => {
    for (const warning of result.warnings) {
      stderr(`WARN: ${warning}\n`);
    }
    if (result.ok) {
      stdout(`${result.message}\n`);
    } else {
      stderr(`ERROR: ${result.error.message}\n`);
      exitCode = 1;
    }
  };

  machineCommand(program, "cordon", "'Cordon' a node: schedule it for maintenance")
    .option(
      "--duration <seconds>",
      "Number of seconds to put the node into maintenance mode (starting from now)",
      parseSeconds,
      config.defaultDurationSeconds
    )
    .action(async (hostname: string, options: CordonOptions) => {
      report(
        await cordonMachine(
          client(),
          { hostname, ip: options.ip, duration: options.duration, dryRun: options.dryRun },
          { now: deps.now }
        )
      );
    });

  machineCommand(program, "uncordon", "'Uncordon' a node: remove it from the maintenance schedule")
    .action(async (hostname: string, options: MachineOptions) => {
      report(await uncordonMachine(client(), { hostname, ip: options.ip, dryRun: options.dryRun }));
    });

  machineCommand(program, "drain", "'Drain' a node: mark the machine as down")
    .action(async (hostname: string, options: MachineOptions) => {
      report(await drainMachine(client(), { hostname, ip: options.ip, dryRun: options.dryRun }));
    });

  machineCommand(program, "up", "Mark a node as up: the opposite of drain")
    .action(async (hostname: string, options: MachineOptions) => {
      report(await upMachine(client(), { hostname, ip: options.ip, dryRun: options.dryRun }));
    });

  program
    .command("status")
    .description("Show the maintenance schedule and draining machines, or the state of one node")
    .argument("[hostname]", "Hostname of the node")
    .option("--ip <ip>", "IP of the node (if different from the hostname); needs a hostname")
    .action(async (hostname: string | undefined, options: { ip?: string }, command: Command) => {
      if (options.ip && !hostname) {
        command.error("error: option '--ip <ip>' requires a hostname");
      }
      report(await maintenanceStatus(client(), { hostname, ip: options.ip }));
    });

  program
    .command("serve")
    .description("Serve the maintenance operations as MCP tools")
    .addOption(
      new Option("--transport <transport>", "MCP transport").choices(["stdio", "http"]).default("stdio")
    )
    .option("--port <port>", "Port for the http transport (default: PORT or 3000)", parsePort)
    .option("--host <host>", "Host for the http transport (default: HOST or localhost)")
    .action(async (options: ServeCommandOptions) => {
      const serve =
        deps.serve ??
        ((mesos: MesosClient, serveOptions: ServeOptions) =>
          serveMaintenanceTools(mesos, serveOptions, {
            now: deps.now,
            defaultDurationSeconds: config.defaultDurationSeconds,
          }));

      if (options.transport === "http") {
        const http = getHttpServerConfig(deps.env ?? process.env);
        await serve(client(), {
          transport: "http",
          http: {
            ...http,
            port: options.port ?? http.port,
            host: options.host ?? http.host,
          },
        });
      } else {
        await serve(client(), { transport: "stdio" });
      }
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
