import { DecodeError } from "./errors.js";

type EnumTable = Readonly<Record<string, number>>;
type EnumValue<E extends EnumTable> = E[keyof E];

function isMember<E extends EnumTable>(table: E, value: number): value is EnumValue<E> {
  return Object.values(table).includes(value);
}

/** Name of an enum value, or undefined when the table has no such value. */
export function enumName(table: EnumTable, value: number): string | undefined {
  return Object.entries(table).find(([, v]) => v === value)?.[0];
}

/**
 * Result adapter that narrows a raw word to a member of `table`; unknown
 * values raise DecodeError.
 */
export function enumOf<E extends EnumTable>(table: E, label: string): (raw: number) => EnumValue<E> {
  return (raw: number) => {
    if (!isMember(table, raw)) {
      throw new DecodeError(`Unknown ${label} 0x${raw.toString(16)}`);
    }
    return raw;
  };
}

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_\s]/g, "");
}

/** Look up an enum member by name, ignoring case, dashes and underscores. */
export function parseEnum<E extends EnumTable>(table: E, name: string): EnumValue<E> | undefined {
  const wanted = normalizeName(name);
  for (const [key, value] of Object.entries(table)) {
    if (normalizeName(key) === wanted && isMember(table, value)) {
      return value;
    }
  }
  return undefined;
}

// ---------- Products ----------

export const ProductId = {
  BRDG_02R13: 0x0001c849,
  VMD_02RPS78: 0x0001c892,
  VMN_05LM02: 0x0001c83e,
  VMN_02LM11: 0x0001c852,
} as const;

export type ProductId = (typeof ProductId)[keyof typeof ProductId];

// ---------- Binding ----------

export const BindingMode = {
  OutgoingSingleProduct: 0x03,
  OutgoingSingleProductPlusSerial: 0x04,
  IncomingOnExistingNode: 0x14,
  Abort: 0xc8,
} as const;

export type BindingMode = (typeof BindingMode)[keyof typeof BindingMode];

export const BindingStatus = {
  NotAvailable: 0,
  OutgoingBindingInitialized: 1,
  OutgoingBindingCompleted: 2,
  IncomingBindingActive: 3,
  IncomingBindingCompleted: 4,
  LearningCompleted: 5,
  LearningNotReady: 10,
  OutgoingBindingFailedNoAnswer: 100,
  OutgoingBindingFailedIncompatibleDevice: 101,
  OutgoingBindingFailedNodeListFull: 102,
  OutgoingBindingFailedModbusAddressInvalid: 103,
  OutgoingBindingFailedInvalidSerialNumber: 104,
  OutgoingBindingFailedUnknownProduct: 105,
  IncomingBindingFailedNoAnswer: 200,
  IncomingBindingFailedInvalidAddress: 201,
} as const;

export type BindingStatus = (typeof BindingStatus)[keyof typeof BindingStatus];

/** Binding status value meaning no session is running. */
export const BINDING_IDLE = BindingStatus.NotAvailable;

// ---------- Node status ----------

export const RFCommStatus = {
  NoError: 0,
  /** No data received for 30 minutes. */
  Error: 1,
} as const;

export type RFCommStatus = (typeof RFCommStatus)[keyof typeof RFCommStatus];

export interface BatteryStatus {
  available: boolean;
  low: boolean;
}

export interface FaultStatus {
  available: boolean;
  fault: boolean;
}

export function batteryStatus(raw: number): BatteryStatus {
  const available = raw !== 0xffff;
  return { available, low: available && raw !== 0 };
}

export function faultStatus(raw: number): FaultStatus {
  const available = raw !== 0xffff;
  return { available, fault: available && raw !== 0 };
}

export interface RFStatsRecord {
  /** RF address of the peer. */
  deviceId: number;
  /** Average received signal strength margin (dB). */
  average: number;
  /** Standard deviation of the signal strength margin (0.1 dB). */
  stddev: number;
  minimum: number;
  maximum: number;
  /** Missed messages (%). */
  missed: number;
  received: number;
  /** Time since the last beacon, in minutes. */
  ageMinutes: number;
}

// ---------- Gateway ----------

export const ResetMode = {
  Soft: 12345,
  Factory: 56789,
} as const;

export type ResetMode = (typeof ResetMode)[keyof typeof ResetMode];

export const ModbusEvents = {
  NoEvents: 0,
  BridgeEvents: 1,
  NodeEvents: 2,
  DataEvents: 3,
} as const;

export type ModbusEvents = (typeof ModbusEvents)[keyof typeof ModbusEvents];

export const Baudrate = {
  Baud300: 0,
  Baud600: 1,
  Baud1200: 2,
  Baud2400: 3,
  Baud4800: 4,
  Baud9600: 5,
  Baud19200: 6,
  Baud38400: 7,
  Baud57600: 8,
  Baud115200: 9,
} as const;

export type Baudrate = (typeof Baudrate)[keyof typeof Baudrate];

export const Parity = {
  None: 0,
  Odd: 1,
  Even: 2,
} as const;

export type Parity = (typeof Parity)[keyof typeof Parity];

export const StopBits = {
  One: 0,
  Two: 1,
} as const;

export type StopBits = (typeof StopBits)[keyof typeof StopBits];

export interface SerialConfig {
  baudrate: Baudrate;
  parity: Parity;
  stopBits: StopBits;
}

// ---------- Ventilation unit ----------

export const VentilationSpeed = {
  Off: 0,
  Low: 1,
  Mid: 2,
  High: 3,
  OverrideLow: 11,
  OverrideMid: 12,
  OverrideHigh: 13,
  Away: 21,
  Boost: 23,
  Auto: 24,
} as const;

export type VentilationSpeed = (typeof VentilationSpeed)[keyof typeof VentilationSpeed];

export const RequestedVentilationSpeed = {
  Off: 0,
  Away: 1,
  Low: 2,
  Mid: 3,
  High: 4,
  Auto: 5,
  Boost: 7,
} as const;

export type RequestedVentilationSpeed =
  (typeof RequestedVentilationSpeed)[keyof typeof RequestedVentilationSpeed];

export const BypassMode = {
  Close: 0,
  Open: 100,
  Unknown: 239,
  Auto: 255,
} as const;

export type BypassMode = (typeof BypassMode)[keyof typeof BypassMode];

export const VmdErrorCode = {
  NoError: 0,
  NonSpecificFault: 1,
  EmergencyStop: 2,
  Fan1Error: 3,
  X22SensorError: 4,
  X23SensorError: 5,
  X21SensorError: 6,
  X20SensorError: 7,
  Fan2Error: 8,
  BindingModeActive: 254,
  IdentificationActive: 255,
} as const;

export type VmdErrorCode = (typeof VmdErrorCode)[keyof typeof VmdErrorCode];

export const VmdCapability = {
  PreHeaterAvailable: 0x0001,
  PostHeaterAvailable: 0x0002,
  NightModeCapable: 0x0008,
  Speed10Capable: 0x0010,
  Speed9Capable: 0x0020,
  Speed8Capable: 0x0040,
  Speed7Capable: 0x0080,
  Speed6Capable: 0x0100,
  Speed5Capable: 0x0200,
  Speed4Capable: 0x0400,
  AutoModeCapable: 0x0800,
  BoostModeCapable: 0x1000,
  TimerCapable: 0x2000,
  OffCapable: 0x8000,
} as const;

export type VmdCapability = (typeof VmdCapability)[keyof typeof VmdCapability];

/** Names of the capability bits set in `raw`. */
export function capabilityNames(raw: number): string[] {
  return Object.entries(VmdCapability)
    .filter(([, bit]) => (raw & bit) !== 0)
    .map(([name]) => name);
}

export const SensorStatus = {
  Unavailable: "unavailable",
  Ok: "ok",
  Error: "error",
} as const;

export type SensorStatus = (typeof SensorStatus)[keyof typeof SensorStatus];

export interface Temperature {
  celsius: number;
  status: SensorStatus;
}

export function temperature(raw: number): Temperature {
  if (Number.isNaN(raw)) {
    return { celsius: raw, status: SensorStatus.Unavailable };
  }
  return { celsius: raw, status: raw < -273 ? SensorStatus.Error : SensorStatus.Ok };
}

export const HEATER_UNAVAILABLE = 0xef;

export interface Heater {
  level: number;
  available: boolean;
}

export function heater(raw: number): Heater {
  return { level: raw, available: raw !== HEATER_UNAVAILABLE };
}

export interface BypassPosition {
  position: number;
  error: boolean;
}

export function bypassPosition(raw: number): BypassPosition {
  return { position: raw, error: raw > 120 };
}

/** Unknown bypass codes read as `BypassMode.Unknown`. */
export function bypassMode(raw: number): BypassMode {
  return isMember(BypassMode, raw) ? raw : BypassMode.Unknown;
}

export interface PresetFanSpeeds {
  supply: number;
  exhaust: number;
}
