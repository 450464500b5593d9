/**
 * Typed register definitions.
 *
 * A register is a fixed address and word length on a device, a codec that
 * converts between 16-bit words and a host value, and an optional adapter
 * that turns the host value into a richer domain value.
 */

import { TextDecoder } from "node:util";
import { DecodeError, InvalidArgumentError } from "./errors.js";

// ---------- Access flags ----------

export const Access = {
  Read: 0x01,
  Write: 0x02,
  /** The device keeps a status word for this register at `address + 10000`. */
  HasStatus: 0x04,
} as const;

export const R = Access.Read;
export const W = Access.Write;
export const RW = Access.Read | Access.Write;
export const RS = Access.Read | Access.HasStatus;
export const RWS = Access.Read | Access.Write | Access.HasStatus;

/** Offset between a register and its status word. */
export const STATUS_REGISTER_OFFSET = 10000;

// ---------- Codecs ----------

export interface Codec<T> {
  readonly name: string;
  /** Number of 16-bit words. */
  readonly length: number;
  decode(words: readonly number[]): T;
  /** Validates the host type at run time; the value may come from a CLI. */
  encode(value: unknown): number[];
}

function toInteger(value: unknown, min: number, max: number, codec: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidArgumentError(
      `Unsupported value ${String(value)} (${typeof value}) for ${codec} register`
    );
  }
  const int = Math.trunc(value);
  if (int < min || int > max) {
    throw new InvalidArgumentError(`Value ${int} out of range ${min}-${max} for ${codec} register`);
  }
  return int;
}

function checkLength(words: readonly number[], length: number, codec: string): void {
  if (words.length !== length) {
    throw new DecodeError(`${codec} register needs ${length} words, got ${words.length}`);
  }
}

export const u16: Codec<number> = {
  name: "u16",
  length: 1,
  decode(words) {
    checkLength(words, 1, "u16");
    return words[0] & 0xffff;
  },
  encode(value) {
    return [toInteger(value, 0, 0xffff, "u16")];
  },
};

export const i16: Codec<number> = {
  name: "i16",
  length: 1,
  decode(words) {
    checkLength(words, 1, "i16");
    const w = words[0] & 0xffff;
    return w >= 0x8000 ? w - 0x10000 : w;
  },
  encode(value) {
    return [toInteger(value, -0x8000, 0x7fff, "i16") & 0xffff];
  },
};

// 32-bit values travel low word first.

export const u32: Codec<number> = {
  name: "u32",
  length: 2,
  decode(words) {
    checkLength(words, 2, "u32");
    return (words[0] & 0xffff) + (words[1] & 0xffff) * 0x10000;
  },
  encode(value) {
    const v = toInteger(value, 0, 0xffffffff, "u32");
    return [v % 0x10000, Math.floor(v / 0x10000)];
  },
};

export const float32: Codec<number> = {
  name: "float32",
  length: 2,
  decode(words) {
    checkLength(words, 2, "float32");
    const buf = Buffer.alloc(4);
    buf.writeUInt16BE(words[1] & 0xffff, 0);
    buf.writeUInt16BE(words[0] & 0xffff, 2);
    return buf.readFloatBE(0);
  },
  encode(value) {
    if (typeof value !== "number") {
      throw new InvalidArgumentError(`Unsupported type ${typeof value} for float32 register`);
    }
    const buf = Buffer.alloc(4);
    buf.writeFloatBE(value, 0);
    return [buf.readUInt16BE(2), buf.readUInt16BE(0)];
  },
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Fixed-length UTF-8 string, two bytes per word, NUL padded. */
export function string(length: number): Codec<string> {
  return {
    name: `string(${length})`,
    length,
    decode(words) {
      checkLength(words, length, "string");
      const bytes = Buffer.alloc(length * 2);
      words.forEach((w, i) => bytes.writeUInt16BE(w & 0xffff, i * 2));
      let end = bytes.length;
      while (end > 0 && bytes[end - 1] === 0) end--;
      try {
        return utf8.decode(bytes.subarray(0, end));
      } catch (err) {
        throw new DecodeError("String register holds invalid UTF-8", { cause: err });
      }
    },
    encode(value) {
      if (typeof value !== "string") {
        throw new InvalidArgumentError(`Unsupported type ${typeof value} for string register`);
      }
      const encoded = Buffer.from(value, "utf8");
      if (encoded.length > length * 2) {
        throw new InvalidArgumentError(
          `String of ${encoded.length} bytes does not fit in ${length} registers`
        );
      }
      const bytes = Buffer.alloc(length * 2);
      encoded.copy(bytes);
      const words: number[] = [];
      for (let i = 0; i < length; i++) {
        words.push(bytes.readUInt16BE(i * 2));
      }
      return words;
    },
  };
}

/** Sentinel for an unset date or timestamp. */
export const UNKNOWN_TIME = 0xffffffff;

/** Calendar date packed as day, month, 16-bit year. `null` when unset. */
export const date: Codec<Date | null> = {
  name: "date",
  length: 2,
  decode(words) {
    const raw = u32.decode(words);
    if (raw === UNKNOWN_TIME) return null;
    const day = raw >>> 24;
    const month = (raw >>> 16) & 0xff;
    const year = raw & 0xffff;
    // setUTCFullYear keeps years below 100 as given; Date.UTC would not.
    const value = new Date(0);
    value.setUTCFullYear(year, month - 1, day);
    if (month < 1 || value.getUTCMonth() !== month - 1 || value.getUTCDate() !== day) {
      throw new DecodeError(`Invalid date ${day}-${month}-${year}`);
    }
    return value;
  },
  encode(value) {
    if (value === null) return u32.encode(UNKNOWN_TIME);
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new InvalidArgumentError(`Unsupported value ${String(value)} for date register`);
    }
    const year = value.getUTCFullYear();
    if (year < 0 || year > 0xffff) {
      throw new InvalidArgumentError(`Year ${year} out of range 0-65535 for date register`);
    }
    const raw = ((value.getUTCDate() << 24) | ((value.getUTCMonth() + 1) << 16) | year) >>> 0;
    return u32.encode(raw);
  },
};

/** UNIX timestamp in seconds, UTC. `null` when unset. */
export const datetime: Codec<Date | null> = {
  name: "datetime",
  length: 2,
  decode(words) {
    const raw = u32.decode(words);
    return raw === UNKNOWN_TIME ? null : new Date(raw * 1000);
  },
  encode(value) {
    if (value === null) return u32.encode(UNKNOWN_TIME);
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new InvalidArgumentError(`Unsupported value ${String(value)} for datetime register`);
    }
    const seconds = Math.floor(value.getTime() / 1000);
    if (seconds < 0 || seconds >= UNKNOWN_TIME) {
      throw new InvalidArgumentError(`Timestamp ${value.toISOString()} out of range`);
    }
    return u32.encode(seconds);
  },
};

/** Adapter for date registers that must hold a value. */
export function requireTime(value: Date | null): Date {
  if (value === null) {
    throw new DecodeError("Unknown date");
  }
  return value;
}

// ---------- Register specs ----------

export interface RegisterOptions {
  /** Lowest value accepted on write. */
  min?: number;
  /** Highest value accepted on write. */
  max?: number;
}

/**
 * Register definition without its property name.
 *
 * `T` is the decoded value after the adapter, `Raw` the codec's host type
 * (what `set` accepts).
 */
export interface RegisterSpec<T, Raw> extends RegisterOptions {
  readonly address: number;
  readonly access: number;
  readonly codec: Codec<Raw>;
  decode(words: readonly number[]): T;
}

export function reg<Raw>(
  address: number,
  codec: Codec<Raw>,
  access: number,
  options?: RegisterOptions
): RegisterSpec<Raw, Raw>;
export function reg<Raw, T>(
  address: number,
  codec: Codec<Raw>,
  access: number,
  options: RegisterOptions & { adapter: (raw: Raw) => T }
): RegisterSpec<T, Raw>;
export function reg<Raw, T>(
  address: number,
  codec: Codec<Raw>,
  access: number,
  options: RegisterOptions & { adapter?: (raw: Raw) => T } = {}
): RegisterSpec<T | Raw, Raw> {
  const { adapter, min, max } = options;
  return {
    address,
    access,
    codec,
    min,
    max,
    decode: adapter
      ? (words: readonly number[]) => adapter(codec.decode(words))
      : (words: readonly number[]) => codec.decode(words),
  };
}

// ---------- Registers ----------

export type AnySpec = RegisterSpec<unknown, unknown>;

export class Register<T = unknown, Raw = unknown> {
  public readonly property: string;
  public readonly address: number;
  public readonly length: number;
  public readonly access: number;
  public readonly min: number | undefined;
  public readonly max: number | undefined;
  private readonly spec: RegisterSpec<T, Raw>;

  constructor(property: string, spec: RegisterSpec<T, Raw>) {
    this.property = property;
    this.address = spec.address;
    this.length = spec.codec.length;
    this.access = spec.access;
    this.min = spec.min;
    this.max = spec.max;
    this.spec = spec;
  }

  get readable(): boolean {
    return (this.access & Access.Read) !== 0;
  }

  get writable(): boolean {
    return (this.access & Access.Write) !== 0;
  }

  get hasStatus(): boolean {
    return (this.access & Access.HasStatus) !== 0;
  }

  get codecName(): string {
    return this.spec.codec.name;
  }

  /** Decode words into the register's value. */
  decode(words: readonly number[]): T {
    return this.spec.decode(words);
  }

  /** Encode a value for writing, enforcing the register's bounds. */
  encode(value: unknown): number[] {
    if (typeof value === "number" && Number.isFinite(value)) {
      if (this.min !== undefined && value < this.min) {
        throw new InvalidArgumentError(`${this.property}: ${value} is below minimum ${this.min}`);
      }
      if (this.max !== undefined && value > this.max) {
        throw new InvalidArgumentError(`${this.property}: ${value} is above maximum ${this.max}`);
      }
    }
    return this.spec.codec.encode(value);
  }

  toString(): string {
    return `${this.property}@${this.address}`;
  }
}

// ---------- Register tables ----------

export type SpecMap = Record<string, AnySpec>;

export type ValueOf<S> = S extends RegisterSpec<infer T, unknown> ? T : never;
export type RawOf<S> = S extends RegisterSpec<unknown, infer Raw> ? Raw : never;

/** Read-only view of a register table, whatever its property types. */
export interface RegisterLookup {
  readonly sorted: readonly Register[];
  readonly properties: string[];
  readonly readable: Register[];
  get(property: string): Register | undefined;
  has(property: string): boolean;
}

/** A device type's registers, sorted by address and keyed by property. */
export class RegisterTable<S extends SpecMap> implements RegisterLookup {
  public readonly specs: S;
  public readonly sorted: readonly Register[];
  private readonly lookup: ReadonlyMap<string, Register>;

  constructor(specs: S) {
    const lookup = new Map<string, Register>();
    const addresses = new Map<number, string>();
    for (const [property, spec] of Object.entries(specs)) {
      const existing = addresses.get(spec.address);
      if (existing !== undefined) {
        throw new InvalidArgumentError(
          `Register ${property} reuses address ${spec.address} of ${existing}`
        );
      }
      addresses.set(spec.address, property);
      lookup.set(property, new Register(property, spec));
    }
    this.specs = specs;
    this.lookup = lookup;
    this.sorted = [...lookup.values()].sort((a, b) => a.address - b.address);
  }

  get(property: string): Register | undefined {
    return this.lookup.get(property);
  }

  /** The register for a declared property. */
  register(property: Extract<keyof S, string>): Register {
    const register = this.lookup.get(property);
    if (register === undefined) {
      throw new InvalidArgumentError(`No register for ${property}`);
    }
    return register;
  }

  has(property: string): property is Extract<keyof S, string> {
    return this.lookup.has(property);
  }

  get properties(): string[] {
    return this.sorted.map((r) => r.property);
  }

  get readable(): Register[] {
    return this.sorted.filter((r) => r.readable);
  }
}

export function defineRegisters<S extends SpecMap>(specs: S): RegisterTable<S> {
  return new RegisterTable(specs);
}

// ---------- Values and freshness ----------

export const ValueSource = {
  Unknown: 0,
  Radio: 1,
  Wire: 2,
} as const;

export type ValueSource = (typeof ValueSource)[keyof typeof ValueSource];

export const StatusFlag = {
  Valid: 0x01,
  Error: 0x02,
  ReadPending: 0x04,
  WritePending: 0x08,
  NewValue: 0x40,
} as const;

export type StatusFlag = (typeof StatusFlag)[keyof typeof StatusFlag];

const STATUS_FLAG_MASK = 0x4f;

export interface Freshness {
  /** Age of the cached value in seconds. */
  ageSeconds: number;
  source: ValueSource;
  /** Bit set of `StatusFlag`. */
  flags: number;
}

export interface Value<T> {
  value: T;
  /** Present only for registers with a status word, read one at a time. */
  freshness?: Freshness;
}

function toValueSource(source: number): ValueSource {
  switch (source) {
    case ValueSource.Radio:
      return ValueSource.Radio;
    case ValueSource.Wire:
      return ValueSource.Wire;
    default:
      return ValueSource.Unknown;
  }
}

/**
 * Decode a status word.
 *
 * Bits 0-6 hold the age, bit 7 switches the age unit from seconds to
 * hours, bits 8-11 and 14 hold the flags and bits 12-13 the source.
 */
export function decodeStatusWord(word: number): Freshness {
  const age = word & 0x7f;
  const hours = (word >> 7) & 0x01;
  return {
    ageSeconds: hours ? age * 3600 : age,
    flags: (word >> 8) & STATUS_FLAG_MASK,
    source: toValueSource((word >> 12) & 0x03),
  };
}

export function hasFlag(freshness: Freshness | undefined, flag: StatusFlag): boolean {
  return freshness !== undefined && (freshness.flags & flag) !== 0;
}
