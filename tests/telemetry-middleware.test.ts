import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { trace, SpanStatusCode } from "@opentelemetry/api";
import { tracing } from "@opentelemetry/sdk-node";
import { withSpan, withTelemetry } from "../src/middleware/telemetry-middleware.js";
import type { ToolResponse } from "../src/models/maintenance-models.js";

const exporter = new tracing.InMemorySpanExporter();

const ok: ToolResponse = { content: [{ type: "text", text: "done" }] };

function request(name: string, args?: Record<string, unknown>) {
  return { params: { name, arguments: args }, method: "tools/call" };
}

describe("Telemetry Middleware", () => {
  beforeAll(() => {
    trace.setGlobalTracerProvider(
      new tracing.BasicTracerProvider({
        spanProcessors: [new tracing.SimpleSpanProcessor(exporter)],
      })
    );
  });

  afterAll(() => {
    trace.disable();
  });

  beforeEach(() => {
    exporter.reset();
  });

  describe("withTelemetry", () => {
    it("returns the handler result unchanged", async () => {
      const wrapped = withTelemetry(async () => ok);

      await expect(wrapped(request("ping", {}))).resolves.toBe(ok);
    });

    it("records a span per tool call with the machine attributes", async () => {
      const wrapped = withTelemetry(async () => ok);

      await wrapped(request("cordon_machine", { hostname: "host1", ip: "10.0.0.1", dryRun: true }));

      const [span] = exporter.getFinishedSpans();
      expect(span.name).toBe("tools/call cordon_machine");
      expect(span.status.code).toBe(SpanStatusCode.OK);
      expect(span.attributes).toMatchObject({
        "gen_ai.tool.name": "cordon_machine",
        "tool.argument_count": 3,
        "tool.argument_keys": "hostname,ip,dryRun",
        "mesos.machine.hostname": "host1",
        "mesos.machine.ip": "10.0.0.1",
        "mesos.dry_run": true,
        "response.content_items": 1,
        "response.text_size_bytes": 4,
        "response.success": true,
      });
    });

    it("marks tool error results as failed spans", async () => {
      const wrapped = withTelemetry(async () => ({
        content: [{ type: "text", text: "ERROR: nope" }],
        isError: true,
      }));

      await wrapped(request("uncordon_machine", { hostname: "host1" }));

      const [span] = exporter.getFinishedSpans();
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "ERROR: nope" });
      expect(span.attributes["response.success"]).toBe(false);
    });

    it("records and rethrows handler errors", async () => {
      class CodedError extends Error {
        code = "ERR_MESOS";
      }
      const wrapped = withTelemetry(async () => {
        throw new CodedError("Mesos went away");
      });

      await expect(wrapped(request("drain_machine", {}))).rejects.toThrow("Mesos went away");

      const [span] = exporter.getFinishedSpans();
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "Mesos went away" });
      expect(span.attributes).toMatchObject({
        "error.type": "tool_error",
        "error.message": "Mesos went away",
        "error.code": "ERR_MESOS",
      });
    });
  });

  describe("withSpan", () => {
    it("runs the function inside a named span", async () => {
      const result = await withSpan("mesos GET maintenance/status", { "http.request.method": "GET" }, async (span) => {
        span.setAttribute("http.response.status_code", 200);
        return 42;
      });

      expect(result).toBe(42);
      const [span] = exporter.getFinishedSpans();
      expect(span.name).toBe("mesos GET maintenance/status");
      expect(span.attributes).toEqual({
        "http.request.method": "GET",
        "http.response.status_code": 200,
      });
    });

    it("marks failures", async () => {
      await expect(
        withSpan("mesos POST machine/down", {}, async () => {
          throw new Error("refused");
        })
      ).rejects.toThrow("refused");

      const [span] = exporter.getFinishedSpans();
      expect(span.attributes["error.type"]).toBe("operation_error");
      expect(span.status.code).toBe(SpanStatusCode.ERROR);
    });
  });
});
