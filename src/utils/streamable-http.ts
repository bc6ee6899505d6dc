import express from "express";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import http from "http";
import { HttpServerConfig } from "../config/http-config.js";

const methodNotAllowed = JSON.stringify({
  jsonrpc: "2.0",
  error: {
    code: -32000,
    message: "Method not allowed.",
  },
  id: null,
});

export function startStreamableHTTPServer(
  createServer: () => Server,
  config: HttpServerConfig
): http.Server {
  const app = express();
  app.use(express.json());

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    // Stateless: a fresh server and transport per request, otherwise request
    // IDs from concurrent clients collide.
    try {
      const server = createServer();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableDnsRebindingProtection: config.enableDnsRebindingProtection,
        allowedHosts: config.allowedHosts,
      });
      res.on("close", () => {
        transport.close().catch((error) => console.error("Error closing MCP transport:", error));
        server.close().catch((error) => console.error("Error closing MCP server:", error));
      });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("Error handling MCP request:", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: {
            code: -32603,
            message: "Internal server error",
          },
          id: null,
        });
      }
    }
  });

  // No SSE notifications and no sessions in stateless mode
  app.get("/mcp", (req: express.Request, res: express.Response) => {
    res.writeHead(405).end(methodNotAllowed);
  });

  app.delete("/mcp", (req: express.Request, res: express.Response) => {
    res.writeHead(405).end(methodNotAllowed);
  });

  app.get("/health", (req: express.Request, res: express.Response) => {
    res.json({ status: "ok" });
  });

  const httpServer = app.listen(config.port, config.host, () => {
    console.error(
      `dcos-maintenance MCP server is listening on port ${config.port}\nUse the following url to connect to the server:\nhttp://${config.host}:${config.port}/mcp`
    );
  });
  return httpServer;
}
