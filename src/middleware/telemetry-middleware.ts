import { trace, SpanStatusCode, Span } from "@opentelemetry/api";
import { getTelemetryConfig } from "../config/telemetry-config.js";
import { serverConfig } from "../config/server-config.js";
import type { ToolResponse } from "../models/maintenance-models.js";

/**
 * Tracing helpers for tool calls and Mesos requests. With no SDK registered
 * the API hands out no-op spans.
 */

const tracer = trace.getTracer(serverConfig.name, serverConfig.version);

export type ToolCallRequest = {
  params: { name: string; arguments?: Record<string, unknown> };
  method: string;
};

export type ToolCallHandler = (request: ToolCallRequest) => Promise<ToolResponse>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function recordFailure(span: Span, errorType: string, error: unknown, fallback: string): void {
  const message = errorMessage(error);
  span.setAttribute("error.type", errorType);
  if (message) {
    span.setAttribute("error.message", message);
  }
  if (error instanceof Error && "code" in error) {
    const code = error.code;
    if (typeof code === "string" || typeof code === "number") {
      span.setAttribute("error.code", code);
    }
  }
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: message || fallback,
  });
}

/**
 * Wrap a tool call handler with a span per invocation.
 */
export function withTelemetry(handler: ToolCallHandler): ToolCallHandler {
  return async (request) => {
    const { name: toolName, arguments: args } = request.params;

    return await tracer.startActiveSpan(
      `tools/call ${toolName}`,
      {
        attributes: {
          "mcp.method.name": "tools/call",
          "gen_ai.tool.name": toolName,
          "gen_ai.operation.name": "execute_tool",
        },
      },
      async (span: Span) => {
        const startTime = Date.now();

        try {
          if (args) {
            const argKeys = Object.keys(args);
            span.setAttribute("tool.argument_count", argKeys.length);
            span.setAttribute("tool.argument_keys", argKeys.join(","));

            if (typeof args.hostname === "string") {
              span.setAttribute("mesos.machine.hostname", args.hostname);
            }
            if (typeof args.ip === "string") {
              span.setAttribute("mesos.machine.ip", args.ip);
            }
            if (args.dryRun === true) {
              span.setAttribute("mesos.dry_run", true);
            }
          }

          const result = await handler(request);

          span.setAttribute("tool.duration_ms", Date.now() - startTime);

          // Metadata only; response text is never recorded.
          // OTEL_CAPTURE_RESPONSE_METADATA=false turns this off.
          if (getTelemetryConfig().captureResponseMetadata) {
            span.setAttribute("response.content_items", result.content.length);
            const firstItem = result.content[0];
            if (firstItem) {
              span.setAttribute("response.content_type", firstItem.type);
              span.setAttribute("response.text_size_bytes", firstItem.text.length);
            }
            span.setAttribute("response.success", !result.isError);
          }

          if (result.isError) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: result.content[0]?.text });
          } else {
            span.setStatus({ code: SpanStatusCode.OK });
          }

          return result;
        } catch (error: unknown) {
          span.setAttribute("tool.duration_ms", Date.now() - startTime);
          recordFailure(span, "tool_error", error, "Tool execution failed");
          throw error;
        } finally {
          span.end();
        }
      }
    );
  };
}

/**
 * Run `fn` inside a span named `name`.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return await tracer.startActiveSpan(name, { attributes }, async (span: Span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      recordFailure(span, "operation_error", error, "Operation failed");
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Record an event on the current active span.
 */
export function recordSpanEvent(name: string, attributes?: Record<string, string | number | boolean>) {
  trace.getActiveSpan()?.addEvent(name, attributes);
}
