import { z } from "zod";
import type { ScheduleError } from "./maintenance-errors.js";

/**
 * Mesos time values are int64 nanoseconds, held as bigint.
 * See http://mesos.apache.org/documentation/latest/maintenance/
 */
export const NanosecondsSchema = z
  .object({
    nanoseconds: z.bigint(),
  })
  .passthrough();

export const MachineIdSchema = z
  .object({
    hostname: z.string().optional(),
    ip: z.string().optional(),
  })
  .passthrough();

export const UnavailabilitySchema = z
  .object({
    start: NanosecondsSchema,
    duration: NanosecondsSchema.optional(),
  })
  .passthrough();

export const MaintenanceWindowSchema = z
  .object({
    machine_ids: z.array(MachineIdSchema),
    unavailability: UnavailabilitySchema,
  })
  .passthrough();

// Mesos omits `windows` entirely when nothing is scheduled
export const MaintenanceScheduleSchema = z.object({
  windows: z.array(MaintenanceWindowSchema).default([]),
});

export const DrainingMachineSchema = z
  .object({
    id: MachineIdSchema,
  })
  .passthrough();

export const MaintenanceStatusSchema = z.object({
  draining_machines: z.array(DrainingMachineSchema).default([]),
  down_machines: z.array(MachineIdSchema).default([]),
});

export type Nanoseconds = z.infer<typeof NanosecondsSchema>;
export type MachineId = z.infer<typeof MachineIdSchema>;
export type Unavailability = z.infer<typeof UnavailabilitySchema>;
export type MaintenanceWindow = z.infer<typeof MaintenanceWindowSchema>;
export type MaintenanceSchedule = z.infer<typeof MaintenanceScheduleSchema>;
export type MaintenanceStatus = z.infer<typeof MaintenanceStatusSchema>;

/**
 * A request against the machine endpoints, which bypass the schedule.
 */
export interface MachineStatusRequest {
  method: "POST";
  path: "machine/down" | "machine/up";
  body: MachineId[];
}

export type ScheduleResult =
  | { ok: true; schedule: MaintenanceSchedule }
  | { ok: false; error: ScheduleError };

/**
 * Outcome of a CLI/tool operation. Schedule policy failures are values;
 * transport failures are thrown.
 */
export type OperationResult =
  | { ok: true; message: string; warnings: string[] }
  | { ok: false; error: ScheduleError; warnings: string[] };

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};
