/**
 * Tests for the BMS advisory evaluation and its wire format.
 */

import { describe, it, expect } from "vitest";
import type { TelemetrySample } from "../../charger/batterySimulator";
import { BMS_ADVISORIES, evaluateBms, formatAdvisory } from "../bmsMonitor";

function sample(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    currentA: 16,
    voltageV: 229.6,
    powerW: 3673.6,
    energyWh: 0,
    soc: 0.5,
    temperatureC: 28,
    ...overrides,
  };
}

describe("evaluateBms", () => {
  it("reports stable within every limit", () => {
    expect(evaluateBms(sample()).code).toBe("00");
  });

  it("flags over-voltage", () => {
    expect(evaluateBms(sample({ voltageV: 250.1 })).code).toBe("01");
    expect(evaluateBms(sample({ voltageV: 250 })).code).toBe("00");
  });

  it("flags current in either direction", () => {
    expect(evaluateBms(sample({ currentA: 51 })).code).toBe("02");
    expect(evaluateBms(sample({ currentA: -51 })).code).toBe("02");
  });

  it("flags temperature", () => {
    expect(evaluateBms(sample({ temperatureC: 61 })).code).toBe("03");
  });

  it("asks for reverse direction once full", () => {
    expect(evaluateBms(sample({ soc: 0.99 })).code).toBe("11");
    expect(evaluateBms(sample({ soc: 0.98 })).code).toBe("00");
  });

  it("reports the first breached limit", () => {
    const all = sample({ voltageV: 260, currentA: 60, temperatureC: 70, soc: 1 });
    expect(evaluateBms(all).code).toBe("01");
    expect(evaluateBms({ ...all, voltageV: 230 }).code).toBe("02");
    expect(evaluateBms({ ...all, voltageV: 230, currentA: 10 }).code).toBe("03");
  });

  it("honours custom limits", () => {
    const limits = { maxVoltageV: 250, maxCurrentA: 10, maxTemperatureC: 60, fullSoc: 0.99 };
    expect(evaluateBms(sample(), limits).code).toBe("02");
  });
});

describe("formatAdvisory", () => {
  it("joins code and text", () => {
    expect(formatAdvisory(BMS_ADVISORIES["03"])).toBe("03 ERROR: Temperature Too High");
    expect(formatAdvisory(BMS_ADVISORIES["11"])).toBe("11 Reverse Direction");
  });

  it("marks only errors critical", () => {
    expect(Object.values(BMS_ADVISORIES).filter((a) => a.critical).map((a) => a.code)).toEqual([
      "01",
      "02",
      "03",
    ]);
  });
});
