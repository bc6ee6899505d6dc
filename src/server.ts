import { once } from "events";
import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { serverConfig } from "./config/server-config.js";
import { HttpServerConfig } from "./config/http-config.js";
import { getTelemetryConfigSummary } from "./config/telemetry-config.js";
import { withTelemetry } from "./middleware/telemetry-middleware.js";
import { OperationResult, ToolResponse } from "./models/maintenance-models.js";
import { TransportError } from "./models/maintenance-errors.js";
import { OperationOptions } from "./models/operation-options.js";
import { MesosClient } from "./utils/mesos-client.js";
import { startStreamableHTTPServer } from "./utils/streamable-http.js";
import { CordonArgsSchema, cordonMachine, cordonSchema } from "./tools/cordon.js";
import { UncordonArgsSchema, uncordonMachine, uncordonSchema } from "./tools/uncordon.js";
import {
  MachineArgsSchema,
  drainMachine,
  drainSchema,
  upMachine,
  upSchema,
} from "./tools/machine-status.js";
import {
  MaintenanceStatusArgsSchema,
  maintenanceStatus,
  maintenanceStatusSchema,
} from "./tools/maintenance-status.js";
import { ping, pingSchema } from "./tools/ping.js";

export const maintenanceTools = [
  cordonSchema,
  uncordonSchema,
  drainSchema,
  upSchema,
  maintenanceStatusSchema,
  pingSchema,
];

export function toToolResponse(result: OperationResult): ToolResponse {
  const content: ToolResponse["content"] = result.warnings.map((warning) => ({
    type: "text",
    text: `WARN: ${warning}`,
  }));

  if (result.ok) {
    content.push({ type: "text", text: result.message });
    return { content };
  }

  content.push({ type: "text", text: `ERROR: ${result.error.message}` });
  return { content, isError: true };
}

function parseArguments<T>(
  toolName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: Record<string, unknown> | undefined
): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Invalid arguments for ${toolName}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

async function runTool(
  client: MesosClient,
  name: string,
  args: Record<string, unknown> | undefined,
  options: OperationOptions
): Promise<ToolResponse> {
  switch (name) {
    case "cordon_machine":
      return toToolResponse(
        await cordonMachine(client, parseArguments(name, CordonArgsSchema, args), options)
      );
    case "uncordon_machine":
      return toToolResponse(
        await uncordonMachine(client, parseArguments(name, UncordonArgsSchema, args))
      );
    case "drain_machine":
      return toToolResponse(
        await drainMachine(client, parseArguments(name, MachineArgsSchema, args))
      );
    case "up_machine":
      return toToolResponse(await upMachine(client, parseArguments(name, MachineArgsSchema, args)));
    case "maintenance_status":
      return toToolResponse(
        await maintenanceStatus(client, parseArguments(name, MaintenanceStatusArgsSchema, args))
      );
    case "ping":
      return { content: [{ type: "text", text: JSON.stringify(await ping()) }] };
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * MCP server exposing the maintenance operations as tools against one Mesos
 * master.
 */
export function createMaintenanceServer(
  client: MesosClient,
  options: OperationOptions = {}
): Server {
  const server = new Server(
    { name: serverConfig.name, version: serverConfig.version },
    { capabilities: serverConfig.capabilities }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: maintenanceTools,
  }));

  server.setRequestHandler(
    CallToolRequestSchema,
    withTelemetry(async (request) => {
      const { name, arguments: args } = request.params;
      try {
        return await runTool(client, name, args, options);
      } catch (error: unknown) {
        if (error instanceof McpError) {
          throw error;
        }
        if (error instanceof TransportError) {
          throw new McpError(ErrorCode.InternalError, `Mesos request failed: ${error.message}`);
        }
        throw new McpError(
          ErrorCode.InternalError,
          `Failed to execute ${name}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    })
  );

  return server;
}

export type ServeOptions =
  | { transport: "stdio" }
  | { transport: "http"; http: HttpServerConfig };

/**
 * Serve the tools until the transport closes.
 */
export async function serveMaintenanceTools(
  client: MesosClient,
  serve: ServeOptions,
  options: OperationOptions = {}
): Promise<void> {
  console.error(`Mesos master: ${client.baseUrl}`);
  console.error(getTelemetryConfigSummary());

  if (serve.transport === "http") {
    const httpServer = startStreamableHTTPServer(
      () => createMaintenanceServer(client, options),
      serve.http
    );
    process.once("SIGTERM", () => httpServer.close());
    await once(httpServer, "close");
    return;
  }

  const server = createMaintenanceServer(client, options);
  const closed = new Promise<void>((resolve) => {
    server.onclose = () => resolve();
  });
  await server.connect(new StdioServerTransport());
  console.error("dcos-maintenance MCP server running on stdio");
  await closed;
}
