export interface BatteryProfile {
  id: string;
  capacityKwh: number;
  initialSoc: number; // 0.0 to 1.0
  noLoadVoltageV: number;
  dropPerAmpV: number; // supply sag per ampere of load, either direction
  ambientTemperatureC: number;
  temperatureRisePerAmpC: number;
}

export const DEFAULT_BATTERY_PROFILE: BatteryProfile = {
  id: "v2g-40kwh",
  capacityKwh: 40,
  initialSoc: 0.5,
  noLoadVoltageV: 232,
  dropPerAmpV: 0.15,
  ambientTemperatureC: 20,
  temperatureRisePerAmpC: 0.5,
};

export interface TelemetrySample {
  currentA: number; // signed, negative = export
  voltageV: number;
  powerW: number;
  energyWh: number; // cumulative, signed
  soc: number;
  temperatureC: number;
}

/**
 * Vehicle battery behind the charger. Positive current charges it, negative
 * current exports to the grid; a full battery draws nothing and an empty one
 * exports nothing.
 */
export class BatterySimulator {
  private profile: BatteryProfile;
  private soc: number;
  private energyWh = 0;

  constructor(profile: Partial<BatteryProfile> = {}) {
    this.profile = { ...DEFAULT_BATTERY_PROFILE, ...profile };
    this.soc = Math.max(0, Math.min(1, this.profile.initialSoc));
  }

  getProfile(): BatteryProfile {
    return this.profile;
  }

  getSoc(): number {
    return this.soc;
  }

  getEnergyWh(): number {
    return this.energyWh;
  }

  /**
   * Advance simulation by intervalSeconds at the requested current.
   */
  tick(requestedCurrentA: number, intervalSeconds: number): TelemetrySample {
    let currentA = requestedCurrentA;
    if ((currentA > 0 && this.soc >= 1) || (currentA < 0 && this.soc <= 0)) {
      currentA = 0;
    }

    const magnitude = Math.abs(currentA);
    const voltageV = this.profile.noLoadVoltageV - magnitude * this.profile.dropPerAmpV;
    const powerW = voltageV * currentA;

    const energyIncrementWh = (powerW * intervalSeconds) / 3600;
    this.energyWh += energyIncrementWh;

    const capacityWh = this.profile.capacityKwh * 1000;
    this.soc = Math.max(0, Math.min(1, this.soc + energyIncrementWh / capacityWh));

    return {
      currentA,
      voltageV,
      powerW,
      energyWh: this.energyWh,
      soc: this.soc,
      temperatureC:
        this.profile.ambientTemperatureC + magnitude * this.profile.temperatureRisePerAmpC,
    };
  }
}
