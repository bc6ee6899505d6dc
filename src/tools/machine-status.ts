/**
 * Tools: drain_machine, up_machine
 * Mark a machine down or up directly through the machine endpoints. Neither
 * reads nor writes the maintenance schedule.
 */

import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MesosClient } from "../utils/mesos-client.js";
import { stringifyMesosJson } from "../utils/mesos-json.js";
import { describeMachine, drain, machineId, up } from "../utils/schedule-editor.js";
import { MachineStatusRequest, OperationResult } from "../models/maintenance-models.js";
import { dryRunParameter, hostnameParameter, ipParameter } from "../models/common-parameters.js";

const machineInputSchema = {
  type: "object",
  properties: {
    hostname: hostnameParameter,
    ip: ipParameter,
    dryRun: dryRunParameter,
  },
  required: ["hostname"],
} satisfies Tool["inputSchema"];

export const drainSchema = {
  name: "drain_machine",
  description:
    "Drain a Mesos agent: mark the machine as down immediately, bypassing the maintenance schedule",
  inputSchema: machineInputSchema,
} satisfies Tool;

export const upSchema = {
  name: "up_machine",
  description: "Mark a Mesos agent as up again: the opposite of drain_machine",
  inputSchema: machineInputSchema,
} satisfies Tool;

export const MachineArgsSchema = z.object({
  hostname: z.string().min(1),
  ip: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
});

export type MachineParams = z.infer<typeof MachineArgsSchema>;

async function sendMachineStatus(
  client: MesosClient,
  request: MachineStatusRequest,
  dryRun: boolean | undefined,
  done: string
): Promise<OperationResult> {
  if (dryRun) {
    return {
      ok: true,
      message: `Dry run: would ${request.method} ${client.url(request.path)}\n${stringifyMesosJson(request.body, 2)}`,
      warnings: [],
    };
  }

  await client.setMachineStatus(request);
  return { ok: true, message: done, warnings: [] };
}

export async function drainMachine(
  client: MesosClient,
  params: MachineParams
): Promise<OperationResult> {
  const machine = machineId(params.hostname, params.ip);
  return await sendMachineStatus(
    client,
    drain(machine),
    params.dryRun,
    `Drained machine ${describeMachine(machine)}: marked as down`
  );
}

export async function upMachine(
  client: MesosClient,
  params: MachineParams
): Promise<OperationResult> {
  const machine = machineId(params.hostname, params.ip);
  return await sendMachineStatus(
    client,
    up(machine),
    params.dryRun,
    `Machine ${describeMachine(machine)} marked as up`
  );
}
