/**
 * Text conversions for the command line: register values in, results out.
 */

import { enumName } from "./constants.js";
import type { BoundNodeInfo } from "./directory.js";
import { InvalidArgumentError } from "./errors.js";
import type { Register, Value } from "./registers.js";
import { StatusFlag, ValueSource, hasFlag } from "./registers.js";

/** Parse a decimal or 0x-prefixed hexadecimal integer. */
export function parseInteger(text: string): number {
  const trimmed = text.trim();
  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    return parseInt(trimmed.slice(2), 16);
  }
  if (/^-?\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  throw new InvalidArgumentError(`Not an integer: ${text}`);
}

/** Convert command line text to the host type of `register`'s codec. */
export function parseRegisterValue(register: Register, text: string): unknown {
  const codec = register.codecName;
  if (codec === "float32") {
    const value = Number(text);
    if (text.trim() === "" || Number.isNaN(value)) {
      throw new InvalidArgumentError(`Not a number: ${text}`);
    }
    return value;
  }
  if (codec === "date" || codec === "datetime") {
    const value = text === "now" ? new Date() : new Date(text);
    if (Number.isNaN(value.getTime())) {
      throw new InvalidArgumentError(`Not a date: ${text}`);
    }
    return value;
  }
  if (codec.startsWith("string")) {
    return text;
  }
  return parseInteger(text);
}

function describeFreshness(value: Value<unknown>): string {
  const freshness = value.freshness;
  if (freshness === undefined) return "";
  const source = enumName(ValueSource, freshness.source) ?? "Unknown";
  const flags = Object.entries(StatusFlag)
    .filter(([, flag]) => hasFlag(freshness, flag))
    .map(([name]) => name);
  return ` (age ${freshness.ageSeconds}s, source ${source}, flags [${flags.join(", ")}])`;
}

function render(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/** One line for a read value, with its freshness when known. */
export function formatValue(value: Value<unknown>): string {
  return `${render(value.value)}${describeFreshness(value)}`;
}

/** `property: value` lines; absent values print as `-`. */
export function formatData(data: Record<string, Value<unknown> | null>): string[] {
  return Object.entries(data).map(
    ([property, value]) => `${property}: ${value === null ? "-" : formatValue(value)}`
  );
}

export function formatNode(node: BoundNodeInfo): string {
  const rf = `0x${node.rfAddress.toString(16).padStart(8, "0")}`;
  return `${String(node.address).padStart(3)}  ${node.product.padEnd(12)}  RF ${rf}`;
}
