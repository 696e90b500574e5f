import type { Command } from "../rapi/types";

export type SessionStep =
  | { kind: "wait"; ms: number; reason?: string }
  | { kind: "send"; command: Command };

export const wait = (ms: number, reason?: string): SessionStep => ({ kind: "wait", ms, reason });
export const send = (command: Command): SessionStep => ({ kind: "send", command });

/**
 * A charging session: 32 A charge, then a switch to 20 A export, then stop.
 */
export const REFERENCE_SESSION: readonly SessionStep[] = [
  wait(2000, "settle"),
  send({ kind: "SetCurrent", amps: 32 }),
  send({ kind: "StartCharge" }),
  wait(5000, "charging"),
  send({ kind: "EnableBidirectional" }),
  send({ kind: "SetCurrent", amps: -20 }),
  wait(10000, "bidirectional flow"),
  send({ kind: "Stop" }),
];

/** Scales every wait, e.g. `0.1` runs the session ten times faster. */
export function scaleWaits(steps: readonly SessionStep[], factor: number): SessionStep[] {
  return steps.map((step) =>
    step.kind === "wait" ? { ...step, ms: Math.round(step.ms * factor) } : step,
  );
}
