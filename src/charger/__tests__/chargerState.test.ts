import { describe, it, expect } from "vitest";
import {
  acceptedStatus,
  CHARGER_STATES,
  type ChargerState,
  transition,
} from "../chargerState";
import type { Command } from "../../rapi/types";

const TABLE: Array<{ command: Command; to: ChargerState; status: string }> = [
  { command: { kind: "SetCurrent", amps: 16 }, to: "CurrentConfigured", status: "Charging current set" },
  { command: { kind: "SetCurrent", amps: -20 }, to: "CurrentConfigured", status: "Charging current set" },
  { command: { kind: "StartCharge" }, to: "Charging", status: "Charging started" },
  { command: { kind: "EnableBidirectional" }, to: "Bidirectional", status: "V2G mode enabled" },
  { command: { kind: "Stop" }, to: "Idle", status: "Charging stopped" },
];

describe("transition", () => {
  describe("default policy", () => {
    for (const from of CHARGER_STATES) {
      for (const { command, to, status } of TABLE) {
        it(`${command.kind} from ${from} -> ${to}`, () => {
          expect(transition(from, command)).toEqual({
            from,
            to,
            command,
            accepted: true,
            status,
          });
        });
      }
    }

    it("accepts V2G straight from Idle", () => {
      expect(transition("Idle", { kind: "EnableBidirectional" }).accepted).toBe(true);
    });
  });

  describe("physical guard policy", () => {
    it("rejects EnableBidirectional outside Charging", () => {
      expect(transition("Idle", { kind: "EnableBidirectional" }, "physical")).toEqual({
        from: "Idle",
        to: "Idle",
        command: { kind: "EnableBidirectional" },
        accepted: false,
        status: "Command rejected: EnableBidirectional in Idle",
      });
      expect(transition("CurrentConfigured", { kind: "EnableBidirectional" }, "physical").accepted).toBe(false);
    });

    it("accepts EnableBidirectional while Charging", () => {
      expect(transition("Charging", { kind: "EnableBidirectional" }, "physical").to).toBe("Bidirectional");
    });

    it("rejects export current unless bidirectional", () => {
      const result = transition("Charging", { kind: "SetCurrent", amps: -20 }, "physical");
      expect(result.accepted).toBe(false);
      expect(result.to).toBe("Charging");
      expect(result.status).toBe("Command rejected: SetCurrent in Charging");
    });

    it("accepts export current once bidirectional", () => {
      expect(transition("Bidirectional", { kind: "SetCurrent", amps: -20 }, "physical").to).toBe(
        "CurrentConfigured",
      );
    });

    it("never guards Stop, StartCharge or positive current", () => {
      for (const from of CHARGER_STATES) {
        expect(transition(from, { kind: "Stop" }, "physical").accepted).toBe(true);
        expect(transition(from, { kind: "StartCharge" }, "physical").accepted).toBe(true);
        expect(transition(from, { kind: "SetCurrent", amps: 10 }, "physical").accepted).toBe(true);
      }
    });
  });
});

describe("acceptedStatus", () => {
  it("maps every command to its status text", () => {
    for (const { command, status } of TABLE) {
      expect(acceptedStatus(command)).toBe(status);
    }
  });
});
