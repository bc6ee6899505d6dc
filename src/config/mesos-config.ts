/**
 * Mesos master connection settings, read from the environment.
 * Command-line flags take precedence over everything here.
 */
export interface MesosConfig {
  mesosUrl: string;
  /** Per-request timeout in milliseconds; undefined waits indefinitely. */
  timeoutMs?: number;
  defaultDurationSeconds: number;
}

export const DEFAULT_MESOS_URL = "http://localhost:5050";
export const DEFAULT_MAINTENANCE_DURATION_SECONDS = 3600;

/**
 * Parse a timeout in milliseconds. Zero, negative and unparseable values
 * disable the timeout.
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    return undefined;
  }
  return Math.floor(timeout);
}

function parseDuration(value: string | undefined): number {
  if (!value) {
    return DEFAULT_MAINTENANCE_DURATION_SECONDS;
  }
  const duration = Number(value);
  if (!Number.isFinite(duration) || duration < 0) {
    console.error(
      `Invalid MAINTENANCE_DEFAULT_DURATION_SECONDS "${value}", using ${DEFAULT_MAINTENANCE_DURATION_SECONDS}`
    );
    return DEFAULT_MAINTENANCE_DURATION_SECONDS;
  }
  return duration;
}

export function getMesosConfig(env: NodeJS.ProcessEnv = process.env): MesosConfig {
  return {
    mesosUrl: env.MESOS_URL || DEFAULT_MESOS_URL,
    timeoutMs: parseTimeout(env.MESOS_REQUEST_TIMEOUT_MS),
    defaultDurationSeconds: parseDuration(env.MAINTENANCE_DEFAULT_DURATION_SECONDS),
  };
}
