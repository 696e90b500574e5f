import type { TelemetrySample } from "../charger/batterySimulator";

export type BmsCode = "00" | "01" | "02" | "03" | "11";

export interface BmsAdvisory {
  code: BmsCode;
  text: string;
  /** Errors are critical; "reverse direction" and "stable" are not. */
  critical: boolean;
}

export interface BmsLimits {
  maxVoltageV: number;
  maxCurrentA: number;
  maxTemperatureC: number;
  fullSoc: number;
}

export const DEFAULT_BMS_LIMITS: BmsLimits = {
  maxVoltageV: 250,
  maxCurrentA: 50,
  maxTemperatureC: 60,
  fullSoc: 0.99,
};

export const BMS_ADVISORIES: Record<BmsCode, BmsAdvisory> = {
  "00": { code: "00", text: "Stable, Continue", critical: false },
  "01": { code: "01", text: "ERROR: Over Voltage", critical: true },
  "02": { code: "02", text: "ERROR: Current Too High", critical: true },
  "03": { code: "03", text: "ERROR: Temperature Too High", critical: true },
  "11": { code: "11", text: "Reverse Direction", critical: false },
};

/** First limit breached wins: voltage, current, temperature, then full charge. */
export function evaluateBms(
  sample: TelemetrySample,
  limits: BmsLimits = DEFAULT_BMS_LIMITS,
): BmsAdvisory {
  if (sample.voltageV > limits.maxVoltageV) return BMS_ADVISORIES["01"];
  if (Math.abs(sample.currentA) > limits.maxCurrentA) return BMS_ADVISORIES["02"];
  if (sample.temperatureC > limits.maxTemperatureC) return BMS_ADVISORIES["03"];
  if (sample.soc >= limits.fullSoc) return BMS_ADVISORIES["11"];
  return BMS_ADVISORIES["00"];
}

/** Wire form published on `{base}/bms`, e.g. `02 ERROR: Current Too High`. */
export function formatAdvisory(advisory: BmsAdvisory): string {
  return `${advisory.code} ${advisory.text}`;
}
