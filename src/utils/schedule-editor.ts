/**
 * Pure transformations of the Mesos maintenance schedule.
 *
 * Nothing here talks to the network: callers fetch the current documents,
 * run them through these functions and post the result back. The schedule is
 * replaced wholesale, so there is no protection against another client
 * rewriting it between the read and the write (last write wins).
 */

import {
  MachineId,
  MachineStatusRequest,
  MaintenanceSchedule,
  MaintenanceStatus,
  MaintenanceWindow,
  Nanoseconds,
  ScheduleResult,
} from "../models/maintenance-models.js";
import {
  ScheduleConflictError,
  ScheduleNotFoundError,
} from "../models/maintenance-errors.js";

/**
 * Build a machine identifier. Mesos agents are usually registered with the
 * same value for both fields, so the hostname doubles as the IP unless an
 * override is given.
 */
export function machineId(hostname: string, ip?: string): MachineId {
  return { hostname, ip: ip || hostname };
}

export function sameMachine(a: MachineId, b: MachineId): boolean {
  return a.hostname === b.hostname && a.ip === b.ip;
}

export function describeMachine(machine: MachineId): string {
  if (!machine.hostname || !machine.ip || machine.hostname === machine.ip) {
    return `'${machine.hostname || machine.ip || ""}'`;
  }
  return `'${machine.hostname}' (${machine.ip})`;
}

export function nsTime(seconds: number): Nanoseconds {
  const whole = Math.trunc(seconds);
  return {
    nanoseconds: BigInt(whole) * 1_000_000_000n + BigInt(Math.round((seconds - whole) * 1e9)),
  };
}

export function isDraining(status: MaintenanceStatus, machine: MachineId): boolean {
  return status.draining_machines.some((draining) => sameMachine(draining.id, machine));
}

export function isDown(status: MaintenanceStatus, machine: MachineId): boolean {
  return status.down_machines.some((down) => sameMachine(down, machine));
}

export function isScheduled(schedule: MaintenanceSchedule, machine: MachineId): boolean {
  return schedule.windows.some((window) =>
    window.machine_ids.some((id) => sameMachine(id, machine))
  );
}

/**
 * Append a window holding only `machine`, starting at `now` (seconds since the
 * epoch) and lasting `duration` seconds.
 */
export function cordon(
  schedule: MaintenanceSchedule,
  machine: MachineId,
  duration: number,
  now: number
): ScheduleResult {
  if (!Number.isFinite(duration) || duration < 0) {
    throw new RangeError(`Maintenance duration must be a non-negative number of seconds, got ${duration}`);
  }

  if (isScheduled(schedule, machine)) {
    return {
      ok: false,
      error: new ScheduleConflictError(
        "Machine already scheduled in a maintenance window, cannot schedule again"
      ),
    };
  }

  const window: MaintenanceWindow = {
    machine_ids: [machine],
    unavailability: {
      start: nsTime(now),
      duration: nsTime(duration),
    },
  };

  return {
    ok: true,
    schedule: { ...schedule, windows: [...schedule.windows, window] },
  };
}

/**
 * Remove `machine` from every window, dropping windows that end up empty.
 */
export function uncordon(schedule: MaintenanceSchedule, machine: MachineId): ScheduleResult {
  if (schedule.windows.length === 0) {
    return {
      ok: false,
      error: new ScheduleNotFoundError("No scheduled maintenance windows, nothing to 'uncordon'"),
    };
  }

  let found = false;
  const windows: MaintenanceWindow[] = [];
  for (const window of schedule.windows) {
    const remaining = window.machine_ids.filter((id) => !sameMachine(id, machine));
    if (remaining.length !== window.machine_ids.length) {
      found = true;
    }
    if (remaining.length > 0) {
      windows.push({ ...window, machine_ids: remaining });
    }
  }

  if (!found) {
    return {
      ok: false,
      error: new ScheduleNotFoundError(
        "Hostname not found in existing maintenance windows, nothing to 'uncordon'"
      ),
    };
  }

  return { ok: true, schedule: { ...schedule, windows } };
}

export function drain(machine: MachineId): MachineStatusRequest {
  return { method: "POST", path: "machine/down", body: [machine] };
}

export function up(machine: MachineId): MachineStatusRequest {
  return { method: "POST", path: "machine/up", body: [machine] };
}
