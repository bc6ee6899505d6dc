/**
 * Tool: uncordon_machine
 * Remove a machine from every maintenance window. Windows left without any
 * machine are dropped from the schedule.
 */

import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MesosClient } from "../utils/mesos-client.js";
import { stringifyMesosJson } from "../utils/mesos-json.js";
import { describeMachine, isDraining, machineId, uncordon } from "../utils/schedule-editor.js";
import { OperationResult } from "../models/maintenance-models.js";
import { recordSpanEvent } from "../middleware/telemetry-middleware.js";
import { dryRunParameter, hostnameParameter, ipParameter } from "../models/common-parameters.js";

export const uncordonSchema = {
  name: "uncordon_machine",
  description:
    "Uncordon a Mesos agent: remove it from all maintenance windows. Fails if the machine is not scheduled.",
  inputSchema: {
    type: "object",
    properties: {
      hostname: hostnameParameter,
      ip: ipParameter,
      dryRun: dryRunParameter,
    },
    required: ["hostname"],
  },
} satisfies Tool;

export const UncordonArgsSchema = z.object({
  hostname: z.string().min(1),
  ip: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
});

export type UncordonParams = z.infer<typeof UncordonArgsSchema>;

export async function uncordonMachine(
  client: MesosClient,
  params: UncordonParams
): Promise<OperationResult> {
  const machine = machineId(params.hostname, params.ip);
  const warnings: string[] = [];

  // Not draining does not stop the removal, it is only worth telling the user.
  const status = await client.getStatus();
  if (!isDraining(status, machine)) {
    warnings.push(
      "Machine was not in draining mode, attempting to remove from maintenance schedule anyway..."
    );
    recordSpanEvent("machine.not_draining");
  }

  const schedule = await client.getSchedule();
  const result = uncordon(schedule, machine);
  if (!result.ok) {
    return { ok: false, error: result.error, warnings };
  }

  if (params.dryRun) {
    return {
      ok: true,
      message: `Dry run: would post maintenance schedule\n${stringifyMesosJson(result.schedule, 2)}`,
      warnings,
    };
  }

  await client.postSchedule(result.schedule);

  return {
    ok: true,
    message: `Uncordoned machine ${describeMachine(machine)}: removed from the maintenance schedule`,
    warnings,
  };
}
