import type { Command } from "../rapi/types";

export const CHARGER_STATES = ["Idle", "CurrentConfigured", "Charging", "Bidirectional"] as const;
export type ChargerState = (typeof CHARGER_STATES)[number];

/**
 * - `none`: every command is accepted from every state.
 * - `physical`: V2G only from `Charging`, export current only once V2G is on.
 */
export const GUARD_POLICIES = ["none", "physical"] as const;
export type GuardPolicy = (typeof GUARD_POLICIES)[number];

export const STATUS_MESSAGES = {
  currentSet: "Charging current set",
  chargingStarted: "Charging started",
  v2gEnabled: "V2G mode enabled",
  chargingStopped: "Charging stopped",
  idle: "Charger is idle",
} as const;

export interface Transition {
  from: ChargerState;
  to: ChargerState;
  command: Command;
  accepted: boolean;
  status: string;
}

/** Status the charger publishes when it accepts `command`. */
export function acceptedStatus(command: Command): string {
  switch (command.kind) {
    case "SetCurrent":
      return STATUS_MESSAGES.currentSet;
    case "StartCharge":
      return STATUS_MESSAGES.chargingStarted;
    case "EnableBidirectional":
      return STATUS_MESSAGES.v2gEnabled;
    case "Stop":
      return STATUS_MESSAGES.chargingStopped;
  }
}

function targetState(command: Command): ChargerState {
  switch (command.kind) {
    case "SetCurrent":
      return "CurrentConfigured";
    case "StartCharge":
      return "Charging";
    case "EnableBidirectional":
      return "Bidirectional";
    case "Stop":
      return "Idle";
  }
}

function isRejected(from: ChargerState, command: Command, guards: GuardPolicy): boolean {
  if (guards === "none") return false;
  if (command.kind === "EnableBidirectional") return from !== "Charging";
  if (command.kind === "SetCurrent" && command.amps < 0) return from !== "Bidirectional";
  return false;
}

/**
 * The charger's transition table. With the default policy it is total:
 * the new state depends on the command alone, last write wins.
 */
export function transition(
  from: ChargerState,
  command: Command,
  guards: GuardPolicy = "none",
): Transition {
  if (isRejected(from, command, guards)) {
    return {
      from,
      to: from,
      command,
      accepted: false,
      status: `Command rejected: ${command.kind} in ${from}`,
    };
  }

  return {
    from,
    to: targetState(command),
    command,
    accepted: true,
    status: acceptedStatus(command),
  };
}
