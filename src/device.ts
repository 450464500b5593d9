/**
 * Device – typed, named access to one device's registers.
 *
 * Product models extend this with their own register table and with
 * convenience accessors; the get/set/fetch engine is shared.
 */

import { readBatch } from "./batch.js";
import type { RegisterClient } from "./client.js";
import {
  ProductId,
  RFCommStatus,
  batteryStatus,
  enumOf,
  faultStatus,
} from "./constants.js";
import type { RFStatsRecord } from "./constants.js";
import {
  DecodeError,
  PropertyNotSupportedError,
  isDeviceFailure,
} from "./errors.js";
import type { Logger, LoggingOptions } from "./logger.js";
import { resolveLogger } from "./logger.js";
import {
  R,
  RW,
  date,
  defineRegisters,
  float32,
  reg,
  requireTime,
  string,
  u16,
  u32,
} from "./registers.js";
import type {
  RawOf,
  RegisterLookup,
  RegisterSpec,
  RegisterTable,
  SpecMap,
  Value,
  ValueOf,
} from "./registers.js";

// ---------- Registers shared by every node ----------

export const NODE_REGISTERS = {
  rfAddress: reg(40000, u32, R),
  productId: reg(40002, u32, R, { adapter: enumOf(ProductId, "product id") }),
  softwareVersion: reg(40004, u16, R),
  oemNumber: reg(40005, u16, R),
  rfCapabilities: reg(40006, u16, R),
  manufactureDate: reg(40007, date, R, { adapter: requireTime }),
  softwareBuildDate: reg(40009, date, R, { adapter: requireTime }),
  productName: reg(40011, string(10), R),
  receivedProductId: reg(40021, u32, R),
  rfLastSeen: reg(40100, u16, R),
  rfCommStatus: reg(40101, u16, R, { adapter: enumOf(RFCommStatus, "RF comm status") }),
  batteryStatus: reg(40102, u16, R, { adapter: batteryStatus }),
  faultStatus: reg(40103, u16, R, { adapter: faultStatus }),
};

// RF statistics are paged through an index register and stay out of fetch().
const RF_STATS = defineRegisters({
  index: reg(40120, u16, RW),
  length: reg(40121, u16, R),
  device: reg(40122, u32, R),
  average: reg(40124, u16, R),
  stddev: reg(40125, float32, R),
  minimum: reg(40127, u16, R),
  maximum: reg(40128, u16, R),
  missed: reg(40129, u16, R),
  received: reg(40130, u16, R),
  age: reg(40131, u16, R),
});

const RF_STATS_RECORD_START = 40122;
const RF_STATS_RECORD_LENGTH = 10;
const RF_STATS_CLEAR = 255;

function take<T>(spec: RegisterSpec<T, unknown>, words: readonly number[], start: number): T {
  const offset = spec.address - start;
  return spec.decode(words.slice(offset, offset + spec.codec.length));
}

// ---------- Options ----------

export type DeviceOptions = LoggingOptions;

export interface FetchOptions {
  /** Include every declared property, `null` where no value was read. Default: true */
  allProperties?: boolean;
  /** Read each register with its status word. Default: true */
  withStatus?: boolean;
}

/** Property values from `fetch()`. `null` marks a property that could not be read. */
export type DeviceData = Record<string, Value<unknown> | null>;

// ---------- Device ----------

/** Any device model, addressed by property name only. */
export interface AnyDevice {
  readonly address: number;
  readonly client: RegisterClient;
  readonly registers: RegisterLookup;
  readonly label: string;
  get(property: string): Promise<Value<unknown>>;
  set(property: string, value: unknown): Promise<boolean>;
  fetch(options?: FetchOptions): Promise<DeviceData>;
  rfStats(): Promise<RFStatsRecord[]>;
  clearRfStats(): Promise<boolean>;
}

export class Device<S extends SpecMap = SpecMap> implements AnyDevice {
  /** Modbus address of the device on the gateway. */
  public readonly address: number;
  public readonly client: RegisterClient;
  public readonly registers: RegisterTable<S>;

  protected readonly log: Logger;

  constructor(
    address: number,
    client: RegisterClient,
    registers: RegisterTable<S>,
    options: DeviceOptions = {}
  ) {
    this.address = address;
    this.client = client;
    this.registers = registers;
    this.log = resolveLogger(options);
  }

  /** Model label used in log lines and `toString()`. */
  get label(): string {
    return "node";
  }

  toString(): string {
    return `${this.label}@${this.address}`;
  }

  private lookup(property: string) {
    const register = this.registers.get(property);
    if (register === undefined) {
      throw new PropertyNotSupportedError(property);
    }
    return register;
  }

  /** Read one property, with its freshness when the register has a status word. */
  get<K extends Extract<keyof S, string>>(property: K): Promise<Value<ValueOf<S[K]>>>;
  get(property: string): Promise<Value<unknown>>;
  async get(property: string): Promise<Value<unknown>> {
    return this.client.getRegister(this.lookup(property), this.address);
  }

  /** Write one property. Resolves true when the device confirms the write. */
  set<K extends Extract<keyof S, string>>(property: K, value: RawOf<S[K]>): Promise<boolean>;
  set(property: string, value: unknown): Promise<boolean>;
  async set(property: string, value: unknown): Promise<boolean> {
    return this.client.setRegister(this.lookup(property), value, this.address);
  }

  /**
   * Read every readable property.
   *
   * Without status the registers are read in contiguous runs. With status
   * each register is read on its own. Either way a property that fails
   * to read is skipped; only connection errors reject.
   */
  async fetch(options: FetchOptions = {}): Promise<DeviceData> {
    const allProperties = options.allProperties ?? true;
    const withStatus = options.withStatus ?? true;
    const readable = this.registers.readable;
    const data: DeviceData = {};

    if (!withStatus) {
      if (readable.length > 0) {
        const values = await readBatch(this.client, readable, this.address, this.log);
        for (const [property, value] of values) {
          data[property] = value;
        }
      }
    } else {
      for (const register of readable) {
        try {
          data[register.property] = await this.client.getRegister(register, this.address);
        } catch (err) {
          if (!(err instanceof DecodeError) && !isDeviceFailure(err)) throw err;
          this.log.info(`Failed to fetch register ${register.property} of ${this}: ${String(err)}`);
        }
      }
    }

    if (allProperties) {
      for (const property of this.registers.properties) {
        if (!(property in data)) {
          data[property] = null;
        }
      }
    }
    return data;
  }

  // ---------- RF statistics ----------

  /** Read the node's RF statistics, one record per peer. */
  async rfStats(): Promise<RFStatsRecord[]> {
    const [count] = await this.client.readWords(RF_STATS.specs.length.address, 1, this.address);
    const specs = RF_STATS.specs;
    const records: RFStatsRecord[] = [];

    for (let i = 0; i < count; i++) {
      const ok = await this.client.setRegister(RF_STATS.register("index"), i, this.address);
      if (!ok) {
        this.log.warn(`Failed to write ${i} to RF stats index register of ${this}`);
        continue;
      }
      const words = await this.client.readWords(
        RF_STATS_RECORD_START,
        RF_STATS_RECORD_LENGTH,
        this.address
      );
      records.push({
        deviceId: take(specs.device, words, RF_STATS_RECORD_START),
        average: take(specs.average, words, RF_STATS_RECORD_START),
        stddev: take(specs.stddev, words, RF_STATS_RECORD_START),
        minimum: take(specs.minimum, words, RF_STATS_RECORD_START),
        maximum: take(specs.maximum, words, RF_STATS_RECORD_START),
        missed: take(specs.missed, words, RF_STATS_RECORD_START),
        received: take(specs.received, words, RF_STATS_RECORD_START),
        ageMinutes: take(specs.age, words, RF_STATS_RECORD_START),
      });
    }
    return records;
  }

  /** Clear the node's RF statistics. */
  async clearRfStats(): Promise<boolean> {
    return this.client.setRegister(RF_STATS.register("index"), RF_STATS_CLEAR, this.address);
  }
}
