import { NodeSDK, resources } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import {
  SEMRESATTRS_SERVICE_NAME,
  SEMRESATTRS_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { serverConfig } from "./server-config.js";

const SAMPLER_TYPES = ["always_on", "always_off", "traceidratio"] as const;

type SamplerType = (typeof SAMPLER_TYPES)[number];

/**
 * OpenTelemetry settings. Tracing is opt-in and configured through the
 * standard OTEL_* environment variables.
 */
export interface TelemetryConfig {
  enabled: boolean;
  endpoint?: string;
  serviceName: string;
  serviceVersion: string;
  resourceAttributes: Record<string, string>;
  sampler?: {
    type: SamplerType;
    arg?: number;
  };
  captureResponseMetadata: boolean;
}

function isSamplerType(value: string): value is SamplerType {
  return SAMPLER_TYPES.some((type) => type === value);
}

function parseSamplerConfig(env: NodeJS.ProcessEnv): TelemetryConfig["sampler"] | undefined {
  const samplerType = env.OTEL_TRACES_SAMPLER;
  const samplerArg = env.OTEL_TRACES_SAMPLER_ARG;

  if (!samplerType || !isSamplerType(samplerType)) {
    return undefined;
  }

  const config: NonNullable<TelemetryConfig["sampler"]> = { type: samplerType };

  if (samplerArg && samplerType === "traceidratio") {
    const arg = parseFloat(samplerArg);
    if (!isNaN(arg) && arg >= 0 && arg <= 1) {
      config.arg = arg;
    }
  }

  return config;
}

/**
 * Parse resource attributes.
 * Format: "key1=value1,key2=value2"
 */
function parseResourceAttributes(env: NodeJS.ProcessEnv): Record<string, string> {
  const attrs: Record<string, string> = {};
  const envAttrs = env.OTEL_RESOURCE_ATTRIBUTES;

  if (envAttrs) {
    for (const pair of envAttrs.split(",")) {
      const [key, value] = pair.split("=").map((s) => s.trim());
      if (key && value) {
        attrs[key] = value;
      }
    }
  }

  return attrs;
}

export function getTelemetryConfig(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  const enableFlag = env.ENABLE_TELEMETRY;
  const isExplicitlyEnabled = enableFlag === "true" || enableFlag === "1";
  const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;

  const captureResponseEnv = env.OTEL_CAPTURE_RESPONSE_METADATA;

  return {
    // both the flag and an exporter endpoint are required
    enabled: isExplicitlyEnabled && !!endpoint,
    endpoint,
    serviceName: env.OTEL_SERVICE_NAME || serverConfig.name,
    serviceVersion: env.OTEL_SERVICE_VERSION || serverConfig.version,
    resourceAttributes: parseResourceAttributes(env),
    sampler: parseSamplerConfig(env),
    captureResponseMetadata: captureResponseEnv !== "false" && captureResponseEnv !== "0",
  };
}

/**
 * Start the OpenTelemetry SDK when telemetry is enabled.
 * Must run before the first Mesos request so fetch is instrumented.
 */
export function initializeTelemetry(): NodeSDK | null {
  const config = getTelemetryConfig();

  if (!config.enabled) {
    const enableFlag = process.env.ENABLE_TELEMETRY;
    if ((enableFlag === "true" || enableFlag === "1") && !config.endpoint) {
      console.error("OpenTelemetry: ENABLE_TELEMETRY=true but OTEL_EXPORTER_OTLP_ENDPOINT not set");
    }
    return null;
  }

  console.error(
    `Initializing OpenTelemetry: endpoint=${config.endpoint}, service=${config.serviceName}`
  );

  const traceExporter = new OTLPTraceExporter({
    url: config.endpoint,
  });

  const resource = resources.defaultResource().merge(
    resources.resourceFromAttributes({
      [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
      [SEMRESATTRS_SERVICE_VERSION]: config.serviceVersion,
      ...config.resourceAttributes,
    })
  );

  const sdk = new NodeSDK({
    resource,
    traceExporter,
    instrumentations: [
      getNodeAutoInstrumentations({
        "@opentelemetry/instrumentation-fs": {
          enabled: false,
        },
      }),
    ],
  });

  try {
    sdk.start();
    console.error("OpenTelemetry SDK initialized successfully");
    return sdk;
  } catch (error) {
    console.error("Failed to initialize OpenTelemetry SDK:", error);
    return null;
  }
}

/**
 * Flush pending spans. A short-lived CLI run would otherwise exit before the
 * batch exporter sends anything.
 */
export async function shutdownTelemetry(sdk: NodeSDK | null): Promise<void> {
  if (!sdk) {
    return;
  }
  try {
    await sdk.shutdown();
  } catch (error) {
    console.error("Error shutting down OpenTelemetry SDK:", error);
  }
}

export function getTelemetryConfigSummary(env: NodeJS.ProcessEnv = process.env): string {
  const config = getTelemetryConfig(env);

  if (!config.enabled) {
    return "Telemetry: Disabled";
  }

  const parts = [
    `Telemetry: Enabled`,
    `Endpoint: ${config.endpoint}`,
    `Service: ${config.serviceName}@${config.serviceVersion}`,
  ];

  if (config.sampler) {
    parts.push(
      `Sampler: ${config.sampler.type}${config.sampler.arg !== undefined ? `(${config.sampler.arg})` : ""}`
    );
  }

  const attrCount = Object.keys(config.resourceAttributes).length;
  if (attrCount > 0) {
    parts.push(`Resource Attributes: ${attrCount}`);
  }

  return parts.join(", ");
}
