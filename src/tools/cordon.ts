/**
 * Tool: cordon_machine
 * Schedule a machine for maintenance without taking it down. Adds a new
 * maintenance window holding only this machine, starting now.
 */

import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MesosClient } from "../utils/mesos-client.js";
import { stringifyMesosJson } from "../utils/mesos-json.js";
import { cordon, describeMachine, isDraining, machineId } from "../utils/schedule-editor.js";
import { OperationResult } from "../models/maintenance-models.js";
import { ScheduleConflictError } from "../models/maintenance-errors.js";
import { OperationOptions, nowSeconds } from "../models/operation-options.js";
import { DEFAULT_MAINTENANCE_DURATION_SECONDS } from "../config/mesos-config.js";
import { dryRunParameter, hostnameParameter, ipParameter } from "../models/common-parameters.js";

export const cordonSchema = {
  name: "cordon_machine",
  description:
    "Cordon a Mesos agent: add it to the maintenance schedule in a new window starting now. Fails if the machine is already scheduled or draining.",
  inputSchema: {
    type: "object",
    properties: {
      hostname: hostnameParameter,
      ip: ipParameter,
      duration: {
        type: "number",
        description: `Number of seconds to keep the machine in maintenance, starting from now (default: ${DEFAULT_MAINTENANCE_DURATION_SECONDS})`,
        minimum: 0,
      },
      dryRun: dryRunParameter,
    },
    required: ["hostname"],
  },
} satisfies Tool;

export const CordonArgsSchema = z.object({
  hostname: z.string().min(1),
  ip: z.string().min(1).optional(),
  duration: z.number().finite().nonnegative().optional(),
  dryRun: z.boolean().optional(),
});

export type CordonParams = z.infer<typeof CordonArgsSchema>;

export async function cordonMachine(
  client: MesosClient,
  params: CordonParams,
  options: OperationOptions = {}
): Promise<OperationResult> {
  const machine = machineId(params.hostname, params.ip);
  const duration =
    params.duration ?? options.defaultDurationSeconds ?? DEFAULT_MAINTENANCE_DURATION_SECONDS;

  // A draining machine is necessarily scheduled already, and Mesos refuses to
  // schedule a machine twice.
  const status = await client.getStatus();
  if (isDraining(status, machine)) {
    return {
      ok: false,
      error: new ScheduleConflictError(
        "Machine is already in draining mode, cannot add to maintenance schedule more than once"
      ),
      warnings: [],
    };
  }

  const schedule = await client.getSchedule();
  const result = cordon(schedule, machine, duration, (options.now ?? nowSeconds)());
  if (!result.ok) {
    return { ok: false, error: result.error, warnings: [] };
  }

  if (params.dryRun) {
    return {
      ok: true,
      message: `Dry run: would post maintenance schedule\n${stringifyMesosJson(result.schedule, 2)}`,
      warnings: [],
    };
  }

  await client.postSchedule(result.schedule);

  return {
    ok: true,
    message: `Cordoned machine ${describeMachine(machine)}: scheduled for maintenance for ${duration} seconds starting now`,
    warnings: [],
  };
}
