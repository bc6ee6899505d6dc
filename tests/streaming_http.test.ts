import { expect, test, describe, beforeAll, afterAll } from "vitest";
import http from "http";
import { startStreamableHTTPServer } from "../src/utils/streamable-http.js";
import { createMaintenanceServer } from "../src/server.js";
import { MesosClient } from "../src/utils/mesos-client.js";
import { findAvailablePort } from "./port-helper.js";
import { MESOS_URL, createFakeMesos } from "./fake-mesos.js";

interface ListToolsResponse {
  jsonrpc: "2.0";
  result: { tools: { name: string }[] };
}

function isListToolsResponse(data: unknown): data is ListToolsResponse {
  if (typeof data !== "object" || data === null || !("result" in data)) {
    return false;
  }
  const { result } = data;
  return (
    typeof result === "object" &&
    result !== null &&
    "tools" in result &&
    Array.isArray(result.tools)
  );
}

describe("Streamable HTTP Server", () => {
  let httpServer: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    const port = await findAvailablePort(3001);
    baseUrl = `http://127.0.0.1:${port}`;

    const mesos = new MesosClient({ baseUrl: MESOS_URL, fetch: createFakeMesos().fetch });
    httpServer = startStreamableHTTPServer(() => createMaintenanceServer(mesos), {
      port,
      host: "127.0.0.1",
      enableDnsRebindingProtection: false,
      allowedHosts: ["127.0.0.1"],
    });
    await new Promise<void>((resolve) => {
      if (httpServer.listening) {
        resolve();
      } else {
        httpServer.once("listening", () => resolve());
      }
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  });

  test("answers tools/list on the POST channel", async () => {
    const listToolsRequest = {
      jsonrpc: "2.0" as const,
      method: "tools/list" as const,
      params: {},
      id: 2,
    };
    const postResponse = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        accept: "application/json, text/event-stream",
      },
      body: JSON.stringify(listToolsRequest),
    });
    expect(postResponse.status).toBe(200);

    // The response arrives as a server-sent event on the same request
    const postResponseText = await postResponse.text();
    const messageLine = postResponseText.split("\n").find((line) => line.startsWith("data:"));

    expect(messageLine).toBeDefined();
    const postResponseJson: unknown = JSON.parse((messageLine ?? "").replace(/^data: /, ""));
    expect(isListToolsResponse(postResponseJson)).toBe(true);
    if (isListToolsResponse(postResponseJson)) {
      expect(postResponseJson.result.tools.map((tool) => tool.name)).toContain("cordon_machine");
    }
  });

  test("rejects GET and DELETE on /mcp", async () => {
    const get = await fetch(`${baseUrl}/mcp`);
    expect(get.status).toBe(405);
    await get.text();

    const del = await fetch(`${baseUrl}/mcp`, { method: "DELETE" });
    expect(del.status).toBe(405);
    await del.text();
  });

  test("serves a health check", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });
});
