import { z } from "zod";
import {
  MachineStatusRequest,
  MaintenanceSchedule,
  MaintenanceScheduleSchema,
  MaintenanceStatus,
  MaintenanceStatusSchema,
} from "../models/maintenance-models.js";
import { TransportError } from "../models/maintenance-errors.js";
import { withSpan } from "../middleware/telemetry-middleware.js";
import { parseMesosJson, stringifyMesosJson } from "./mesos-json.js";

export type HttpMethod = "GET" | "POST";

export interface MesosClientOptions {
  baseUrl: string;
  /** Milliseconds before a request is aborted. Unset waits indefinitely. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Thin JSON client for the Mesos master maintenance endpoints.
 * One attempt per request, no retries.
 */
export class MesosClient {
  readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MesosClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  url(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  /**
   * Send a request and return the decoded JSON body, or undefined when the
   * master answers with an empty body (as it does for every POST).
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = this.url(path);

    return await withSpan(
      `mesos ${method} ${path}`,
      { "http.request.method": method, "url.full": url },
      async (span) => {
        let response: Response;
        try {
          response = await this.fetchImpl(url, {
            method,
            headers:
              body === undefined
                ? { Accept: "application/json" }
                : { Accept: "application/json", "Content-Type": "application/json" },
            body: body === undefined ? undefined : stringifyMesosJson(body),
            signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
          });
        } catch (error: unknown) {
          const reason = error instanceof Error ? error.message : String(error);
          // AbortSignal.timeout rejects with a DOMException named TimeoutError
          const timedOut =
            typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError";
          throw new TransportError(
            timedOut
              ? `${method} ${url} timed out after ${this.timeoutMs}ms`
              : `${method} ${url} failed: ${reason}`,
            method,
            url,
            undefined,
            { cause: error }
          );
        }

        span.setAttribute("http.response.status_code", response.status);

        const text = await response.text();
        if (!response.ok) {
          const detail = text.trim() || response.statusText;
          throw new TransportError(
            `${method} ${url} returned ${response.status}${detail ? `: ${detail}` : ""}`,
            method,
            url,
            response.status
          );
        }

        if (!text.trim()) {
          return undefined;
        }
        try {
          return parseMesosJson(text);
        } catch (error: unknown) {
          throw new TransportError(
            `${method} ${url} returned a body that is not JSON`,
            method,
            url,
            response.status,
            { cause: error }
          );
        }
      }
    );
  }

  private async requestDocument<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    path: string
  ): Promise<T> {
    const body = await this.request("GET", path);
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
      const url = this.url(path);
      throw new TransportError(
        `GET ${url} returned an unexpected document: ${parsed.error.message}`,
        "GET",
        url
      );
    }
    return parsed.data;
  }

  async getSchedule(): Promise<MaintenanceSchedule> {
    return await this.requestDocument(MaintenanceScheduleSchema, "maintenance/schedule");
  }

  async postSchedule(schedule: MaintenanceSchedule): Promise<void> {
    await this.request("POST", "maintenance/schedule", schedule);
  }

  async getStatus(): Promise<MaintenanceStatus> {
    return await this.requestDocument(MaintenanceStatusSchema, "maintenance/status");
  }

  /** POST to machine/down or machine/up. */
  async setMachineStatus(request: MachineStatusRequest): Promise<void> {
    await this.request(request.method, request.path, request.body);
  }
}
