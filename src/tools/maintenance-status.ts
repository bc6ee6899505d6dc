/**
 * Tool: maintenance_status
 * Read-only view of the maintenance schedule and the draining and down
 * machines, optionally narrowed to a single machine.
 */

import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MesosClient } from "../utils/mesos-client.js";
import { stringifyMesosJson } from "../utils/mesos-json.js";
import {
  isDown,
  isDraining,
  isScheduled,
  machineId,
  sameMachine,
} from "../utils/schedule-editor.js";
import { OperationResult } from "../models/maintenance-models.js";
import { hostnameParameter, ipParameter } from "../models/common-parameters.js";

export const maintenanceStatusSchema = {
  name: "maintenance_status",
  description:
    "Show the Mesos maintenance schedule and which machines are draining or down. With a hostname, report that machine only.",
  inputSchema: {
    type: "object",
    properties: {
      hostname: {
        ...hostnameParameter,
        description: "Hostname of the Mesos agent (optional - if not provided, reports the whole cluster)",
      },
      ip: {
        ...ipParameter,
        description: "IP of the Mesos agent, if different from the hostname (only with a hostname)",
      },
    },
    required: [],
  },
} satisfies Tool;

export const MaintenanceStatusArgsSchema = z
  .object({
    hostname: z.string().min(1).optional(),
    ip: z.string().min(1).optional(),
  })
  .refine((args) => !args.ip || Boolean(args.hostname), {
    message: "ip requires a hostname",
    path: ["ip"],
  });

export type MaintenanceStatusParams = z.infer<typeof MaintenanceStatusArgsSchema>;

export async function maintenanceStatus(
  client: MesosClient,
  params: MaintenanceStatusParams = {}
): Promise<OperationResult> {
  const [schedule, status] = await Promise.all([client.getSchedule(), client.getStatus()]);

  if (!params.hostname) {
    const report = {
      windows: schedule.windows,
      drainingMachines: status.draining_machines.map((draining) => draining.id),
      downMachines: status.down_machines,
    };
    return { ok: true, message: stringifyMesosJson(report, 2), warnings: [] };
  }

  const machine = machineId(params.hostname, params.ip);
  const report = {
    machine,
    scheduled: isScheduled(schedule, machine),
    draining: isDraining(status, machine),
    down: isDown(status, machine),
    windows: schedule.windows.filter((window) =>
      window.machine_ids.some((id) => sameMachine(id, machine))
    ),
  };

  return { ok: true, message: stringifyMesosJson(report, 2), warnings: [] };
}
