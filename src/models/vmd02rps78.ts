/**
 * VMD-02RPS78 – heat recovery ventilation unit controller.
 */

import type { RegisterClient } from "../client.js";
import {
  BypassMode,
  RequestedVentilationSpeed,
  VentilationSpeed,
  VmdErrorCode,
  bypassMode,
  bypassPosition,
  enumOf,
  heater,
  temperature,
} from "../constants.js";
import type { BypassPosition, Heater, PresetFanSpeeds, Temperature } from "../constants.js";
import { Device, NODE_REGISTERS } from "../device.js";
import type { DeviceOptions } from "../device.js";
import { InvalidArgumentError } from "../errors.js";
import { RS, RWS, W, Access, defineRegisters, float32, reg, u16 } from "../registers.js";
import type { Value } from "../registers.js";

/** Longest temporary speed override, in minutes. */
export const MAX_OVERRIDE_MINUTES = 18 * 60;

// ---------- Registers ----------

export const VMD_REGISTERS = defineRegisters({
  ...NODE_REGISTERS,

  // Live state
  currentVentilationSpeed: reg(41000, u16, RS, {
    adapter: enumOf(VentilationSpeed, "ventilation speed"),
  }),
  fanSpeedExhaust: reg(41001, u16, RS),
  fanSpeedSupply: reg(41002, u16, RS),
  errorCode: reg(41003, u16, RS, { adapter: enumOf(VmdErrorCode, "error code") }),
  overrideRemainingTime: reg(41004, u16, RS),
  temperatureIndoor: reg(41005, float32, RS, { adapter: temperature }),
  temperatureOutdoor: reg(41007, float32, RS, { adapter: temperature }),
  temperatureExhaust: reg(41009, float32, RS, { adapter: temperature }),
  temperatureSupply: reg(41011, float32, RS, { adapter: temperature }),
  preheater: reg(41013, u16, RS, { adapter: heater }),
  filterDirty: reg(41014, u16, RS),
  defrost: reg(41015, u16, RS),
  bypassPosition: reg(41016, u16, RS, { adapter: bypassPosition }),
  humidityIndoor: reg(41017, u16, RS),
  humidityOutdoor: reg(41018, u16, RS),
  flowInlet: reg(41019, float32, RS),
  flowOutlet: reg(41021, float32, RS),
  airQuality: reg(41023, u16, RS),
  airQualityBasis: reg(41024, u16, RS),
  co2Level: reg(41025, u16, RS),
  postHeater: reg(41026, u16, RS, { adapter: heater }),
  capabilities: reg(41027, u16, RS),

  // Filter and fans
  filterRemainingDays: reg(41040, u16, RS),
  filterDuration: reg(41041, u16, RS),
  filterRemainingPercent: reg(41042, u16, RS),
  fanRpmExhaust: reg(41043, u16, RS),
  fanRpmSupply: reg(41044, u16, RS),

  // Bypass
  bypassMode: reg(41050, u16, RS, { adapter: bypassMode }),
  bypassStatus: reg(41051, u16, RS),

  // Commands
  requestedVentilationSpeed: reg(41500, u16, RWS, {
    adapter: enumOf(RequestedVentilationSpeed, "requested ventilation speed"),
  }),
  overrideTimeSpeedLow: reg(41501, u16, W, { max: MAX_OVERRIDE_MINUTES }),
  overrideTimeSpeedMid: reg(41502, u16, W, { max: MAX_OVERRIDE_MINUTES }),
  overrideTimeSpeedHigh: reg(41503, u16, W, { max: MAX_OVERRIDE_MINUTES }),
  requestedBypassMode: reg(41550, u16, RWS, { adapter: bypassMode }),
  filterReset: reg(42000, u16, W | Access.HasStatus),

  // Preset fan speeds (%)
  fanSpeedAwaySupply: reg(42001, u16, RWS, { max: 40 }),
  fanSpeedAwayExhaust: reg(42002, u16, RWS, { max: 40 }),
  fanSpeedLowSupply: reg(42003, u16, RWS, { max: 80 }),
  fanSpeedLowExhaust: reg(42004, u16, RWS, { max: 80 }),
  fanSpeedMidSupply: reg(42005, u16, RWS, { max: 100 }),
  fanSpeedMidExhaust: reg(42006, u16, RWS, { max: 100 }),
  fanSpeedHighSupply: reg(42007, u16, RWS, { max: 100 }),
  fanSpeedHighExhaust: reg(42008, u16, RWS, { max: 100 }),

  // Setpoints (°C)
  frostProtectionPreheaterSetpoint: reg(42009, float32, RWS),
  preheaterSetpoint: reg(42011, float32, RWS),
  freeVentilationHeatingSetpoint: reg(42013, float32, RWS),
  freeVentilationCoolingOffset: reg(42015, float32, RWS),
});

export type VmdRegisters = typeof VMD_REGISTERS.specs;

// ---------- Value types ----------

const PRESETS = {
  away: ["fanSpeedAwaySupply", "fanSpeedAwayExhaust"],
  low: ["fanSpeedLowSupply", "fanSpeedLowExhaust"],
  mid: ["fanSpeedMidSupply", "fanSpeedMidExhaust"],
  high: ["fanSpeedHighSupply", "fanSpeedHighExhaust"],
} as const;

export type SpeedPreset = keyof typeof PRESETS;

export type Setpoint =
  | "frostProtectionPreheaterSetpoint"
  | "preheaterSetpoint"
  | "freeVentilationHeatingSetpoint"
  | "freeVentilationCoolingOffset";

export type TemperatureSensor = "indoor" | "outdoor" | "exhaust" | "supply";

const TEMPERATURES = {
  indoor: "temperatureIndoor",
  outdoor: "temperatureOutdoor",
  exhaust: "temperatureExhaust",
  supply: "temperatureSupply",
} as const;

export interface FilterRemaining {
  days: number;
  durationDays: number;
  /** Remaining share of the filter lifetime, 0-100. */
  percent: number;
}

// ---------- Model ----------

export class Vmd02rps78 extends Device<VmdRegisters> {
  constructor(address: number, client: RegisterClient, options: DeviceOptions = {}) {
    super(address, client, VMD_REGISTERS, options);
  }

  override get label(): string {
    return "VMD-02RPS78";
  }

  // ---------- Ventilation speed ----------

  async ventilationSpeed(): Promise<Value<VentilationSpeed>> {
    return this.get("currentVentilationSpeed");
  }

  async setVentilationSpeed(speed: RequestedVentilationSpeed): Promise<boolean> {
    return this.set("requestedVentilationSpeed", speed);
  }

  /** Run at `speed` for `minutes`, then fall back to the scheduled speed. */
  async setVentilationSpeedOverrideTime(
    speed: RequestedVentilationSpeed,
    minutes: number
  ): Promise<boolean> {
    switch (speed) {
      case RequestedVentilationSpeed.Low:
        return this.set("overrideTimeSpeedLow", minutes);
      case RequestedVentilationSpeed.Mid:
        return this.set("overrideTimeSpeedMid", minutes);
      case RequestedVentilationSpeed.High:
        return this.set("overrideTimeSpeedHigh", minutes);
      default:
        throw new InvalidArgumentError(`Invalid temporary override speed ${speed}`);
    }
  }

  async overrideRemainingTime(): Promise<Value<number>> {
    return this.get("overrideRemainingTime");
  }

  // ---------- Fan presets ----------

  async presetFanSpeeds(preset: SpeedPreset): Promise<PresetFanSpeeds> {
    const [supplyProperty, exhaustProperty] = PRESETS[preset];
    const supply = await this.get(supplyProperty);
    const exhaust = await this.get(exhaustProperty);
    return { supply: supply.value, exhaust: exhaust.value };
  }

  /** Writes both fans, supply first, and reports whether both were confirmed. */
  async setPresetFanSpeeds(preset: SpeedPreset, speeds: PresetFanSpeeds): Promise<boolean> {
    const [supplyProperty, exhaustProperty] = PRESETS[preset];
    const supply = await this.set(supplyProperty, speeds.supply);
    const exhaust = await this.set(exhaustProperty, speeds.exhaust);
    return supply && exhaust;
  }

  // ---------- Bypass ----------

  async bypassMode(): Promise<Value<BypassMode>> {
    return this.get("bypassMode");
  }

  async setBypassMode(mode: BypassMode): Promise<boolean> {
    if (mode === BypassMode.Unknown) {
      throw new InvalidArgumentError(`Invalid bypass mode ${mode}`);
    }
    return this.set("requestedBypassMode", mode);
  }

  async bypassStatus(): Promise<Value<number>> {
    return this.get("bypassStatus");
  }

  async bypassPosition(): Promise<Value<BypassPosition>> {
    return this.get("bypassPosition");
  }

  // ---------- Climate ----------

  async temperature(sensor: TemperatureSensor): Promise<Value<Temperature>> {
    return this.get(TEMPERATURES[sensor]);
  }

  async preheater(): Promise<Value<Heater>> {
    return this.get("preheater");
  }

  async postheater(): Promise<Value<Heater>> {
    return this.get("postHeater");
  }

  async defrost(): Promise<Value<number>> {
    return this.get("defrost");
  }

  async setpoint(name: Setpoint): Promise<Value<number>> {
    return this.get(name);
  }

  async setSetpoint(name: Setpoint, celsius: number): Promise<boolean> {
    return this.set(name, celsius);
  }

  // ---------- Filter ----------

  /** Remaining filter lifetime, from the remaining days and the service interval. */
  async filterRemaining(): Promise<FilterRemaining> {
    const { value: days } = await this.get("filterRemainingDays");
    const { value: durationDays } = await this.get("filterDuration");
    const percent =
      durationDays > 0 ? Math.min(100, Math.max(0, Math.round((days * 100) / durationDays))) : 0;
    return { days, durationDays, percent };
  }

  async filterDirty(): Promise<Value<number>> {
    return this.get("filterDirty");
  }

  async filterReset(): Promise<boolean> {
    return this.set("filterReset", 0);
  }

  // ---------- Diagnostics ----------

  /** Bit set of `VmdCapability`. */
  async capabilities(): Promise<Value<number>> {
    return this.get("capabilities");
  }

  async errorCode(): Promise<Value<VmdErrorCode>> {
    return this.get("errorCode");
  }
}
