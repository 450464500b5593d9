import type { RegisterClient } from "./client.js";
import { DecodeError, InvalidArgumentError, isDeviceFailure } from "./errors.js";
import type { Logger } from "./logger.js";
import { nullLogger } from "./logger.js";
import { MAX_READ_QUANTITY } from "./modbus.js";
import type { Register, Value } from "./registers.js";

/** Registers read with one bulk request. */
export interface RegisterRun {
  start: number;
  length: number;
  registers: Register[];
}

/** Decoded values by property. Properties that failed are left out. */
export type BatchResult = Map<string, Value<unknown>>;

/**
 * Sort registers by address and group them into maximal runs of
 * back-to-back addresses, capped at the largest single read.
 */
export function planRuns(registers: readonly Register[]): RegisterRun[] {
  const sorted = [...registers].sort((a, b) => a.address - b.address);
  const runs: RegisterRun[] = [];
  let current: RegisterRun | undefined;

  for (const register of sorted) {
    if (
      current !== undefined &&
      current.start + current.length === register.address &&
      current.length + register.length <= MAX_READ_QUANTITY
    ) {
      current.registers.push(register);
      current.length += register.length;
      continue;
    }
    current = { start: register.address, length: register.length, registers: [register] };
    runs.push(current);
  }
  return runs;
}

/**
 * Read many registers of one device with as few requests as possible.
 *
 * A failed run or an undecodable value only drops the properties
 * involved; connection errors still propagate. Values carry no freshness.
 */
export async function readBatch(
  client: RegisterClient,
  registers: readonly Register[],
  deviceAddress: number,
  log: Logger = nullLogger
): Promise<BatchResult> {
  if (registers.length === 0) {
    throw new InvalidArgumentError("Expected at least one register");
  }
  for (const register of registers) {
    if (!register.readable) {
      throw new InvalidArgumentError(`Register ${register} is not readable`);
    }
  }

  const result: BatchResult = new Map();
  for (const run of planRuns(registers)) {
    log.debug(`Reading ${run.length} registers starting from ${run.start}`);

    let words: number[];
    try {
      words = await client.readWords(run.start, run.length, deviceAddress);
    } catch (err) {
      if (!isDeviceFailure(err)) throw err;
      log.info(
        `Failed to fetch registers ${run.start}-${run.start + run.length - 1}: ${String(err)}`
      );
      continue;
    }

    for (const register of run.registers) {
      const offset = register.address - run.start;
      try {
        const value = register.decode(words.slice(offset, offset + register.length));
        result.set(register.property, { value });
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        log.info(`Failed to decode register ${register.property}: ${err.message}`);
      }
    }
  }
  return result;
}
