import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  getTelemetryConfig,
  getTelemetryConfigSummary,
  initializeTelemetry,
  shutdownTelemetry,
} from "../src/config/telemetry-config.js";

describe("Telemetry Configuration", () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };

    delete process.env.ENABLE_TELEMETRY;
    delete process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    delete process.env.OTEL_TRACES_SAMPLER;
    delete process.env.OTEL_TRACES_SAMPLER_ARG;
    delete process.env.OTEL_SERVICE_NAME;
    delete process.env.OTEL_SERVICE_VERSION;
    delete process.env.OTEL_RESOURCE_ATTRIBUTES;
    delete process.env.OTEL_CAPTURE_RESPONSE_METADATA;
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  describe("Feature Flag Behavior", () => {
    it("is disabled by default", () => {
      expect(getTelemetryConfig().enabled).toBe(false);
    });

    it("stays disabled with an endpoint but no flag", () => {
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4317";

      expect(getTelemetryConfig().enabled).toBe(false);
    });

    it("stays disabled when ENABLE_TELEMETRY=false", () => {
      process.env.ENABLE_TELEMETRY = "false";
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4317";

      expect(getTelemetryConfig().enabled).toBe(false);
    });

    it("stays disabled with the flag but no endpoint", () => {
      process.env.ENABLE_TELEMETRY = "true";

      expect(getTelemetryConfig().enabled).toBe(false);
    });

    it("is enabled with ENABLE_TELEMETRY=true and an endpoint", () => {
      process.env.ENABLE_TELEMETRY = "true";
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4317";

      const config = getTelemetryConfig();
      expect(config.enabled).toBe(true);
      expect(config.endpoint).toBe("http://localhost:4317");
    });

    it("accepts ENABLE_TELEMETRY=1", () => {
      expect(
        getTelemetryConfig({
          ENABLE_TELEMETRY: "1",
          OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4317",
        }).enabled
      ).toBe(true);
    });
  });

  describe("Service identity", () => {
    it("defaults to the package name and version", () => {
      const config = getTelemetryConfig();
      expect(config.serviceName).toBe("dcos-maintenance");
      expect(config.serviceVersion).toBe("0.1.0");
    });

    it("honours OTEL_SERVICE_NAME", () => {
      process.env.OTEL_SERVICE_NAME = "maintenance-prod";

      expect(getTelemetryConfig().serviceName).toBe("maintenance-prod");
    });

    it("falls back on an empty service name", () => {
      process.env.OTEL_SERVICE_NAME = "";

      expect(getTelemetryConfig().serviceName).toBe("dcos-maintenance");
    });
  });

  describe("Sampling Configuration", () => {
    it("is undefined when not configured", () => {
      expect(getTelemetryConfig().sampler).toBeUndefined();
    });

    it("parses always_on", () => {
      process.env.OTEL_TRACES_SAMPLER = "always_on";

      expect(getTelemetryConfig().sampler).toEqual({ type: "always_on" });
    });

    it("parses traceidratio with its argument", () => {
      process.env.OTEL_TRACES_SAMPLER = "traceidratio";
      process.env.OTEL_TRACES_SAMPLER_ARG = "0.05";

      expect(getTelemetryConfig().sampler).toEqual({ type: "traceidratio", arg: 0.05 });
    });

    it("ignores an out of range ratio", () => {
      process.env.OTEL_TRACES_SAMPLER = "traceidratio";
      process.env.OTEL_TRACES_SAMPLER_ARG = "1.5";

      expect(getTelemetryConfig().sampler).toEqual({ type: "traceidratio" });
    });

    it("ignores unknown sampler types", () => {
      process.env.OTEL_TRACES_SAMPLER = "sometimes";

      expect(getTelemetryConfig().sampler).toBeUndefined();
    });
  });

  describe("Resource Attributes Configuration", () => {
    it("parses several attributes and trims them", () => {
      process.env.OTEL_RESOURCE_ATTRIBUTES = " environment = production , team = platform ";

      expect(getTelemetryConfig().resourceAttributes).toEqual({
        environment: "production",
        team: "platform",
      });
    });

    it("skips malformed pairs", () => {
      process.env.OTEL_RESOURCE_ATTRIBUTES = "environment=production,invalid,,=x";

      expect(getTelemetryConfig().resourceAttributes).toEqual({ environment: "production" });
    });
  });

  describe("Response metadata capture", () => {
    it("is on by default", () => {
      expect(getTelemetryConfig().captureResponseMetadata).toBe(true);
    });

    it("can be turned off", () => {
      process.env.OTEL_CAPTURE_RESPONSE_METADATA = "false";

      expect(getTelemetryConfig().captureResponseMetadata).toBe(false);
    });
  });

  describe("getTelemetryConfigSummary", () => {
    it("reports disabled telemetry", () => {
      expect(getTelemetryConfigSummary()).toBe("Telemetry: Disabled");
    });

    it("summarises an enabled configuration", () => {
      process.env.ENABLE_TELEMETRY = "true";
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4317";
      process.env.OTEL_TRACES_SAMPLER = "traceidratio";
      process.env.OTEL_TRACES_SAMPLER_ARG = "0.05";
      process.env.OTEL_RESOURCE_ATTRIBUTES = "environment=production,team=platform";

      expect(getTelemetryConfigSummary()).toBe(
        "Telemetry: Enabled, Endpoint: http://localhost:4317, Service: dcos-maintenance@0.1.0, Sampler: traceidratio(0.05), Resource Attributes: 2"
      );
    });
  });

  describe("initializeTelemetry", () => {
    it("returns null when telemetry is disabled", () => {
      expect(initializeTelemetry()).toBeNull();
    });

    it("explains a missing endpoint", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      process.env.ENABLE_TELEMETRY = "true";

      expect(initializeTelemetry()).toBeNull();
      expect(error).toHaveBeenCalledWith(
        "OpenTelemetry: ENABLE_TELEMETRY=true but OTEL_EXPORTER_OTLP_ENDPOINT not set"
      );
    });

    it("shutting down without an SDK is a no-op", async () => {
      await expect(shutdownTelemetry(null)).resolves.toBeUndefined();
    });
  });
});
