#!/usr/bin/env node
import { initializeTelemetry, shutdownTelemetry } from "./config/telemetry-config.js";
import { runCli } from "./cli.js";

const sdk = initializeTelemetry();

try {
  // transport errors are left to reject here and surface with their stack
  process.exitCode = await runCli(process.argv.slice(2));
} finally {
  await shutdownTelemetry(sdk);
}
