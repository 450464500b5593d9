/**
 * RegisterClient – the single path for register I/O against one channel.
 *
 * Every operation runs under one mutex, including the status-word read
 * that follows a register read, so requests never interleave on the
 * wire. Commands are spaced by a minimum interval because the gateway
 * drops requests that arrive too quickly.
 */

import { Mutex } from "async-mutex";
import { setTimeout as sleep } from "node:timers/promises";
import { performance } from "node:perf_hooks";
import { ChannelClosedError, ChannelIOError } from "./channel.js";
import type { ModbusChannel } from "./channel.js";
import {
  AcknowledgeError,
  BusyError,
  ConnectionError,
  ConnectionInterruptedError,
  FailureError,
  GatewayError,
  InvalidArgumentError,
  ReadError,
  WriteError,
  errorMessage,
} from "./errors.js";
import type { Logger, LoggingOptions } from "./logger.js";
import { resolveLogger } from "./logger.js";
import { ExceptionCode, ModbusExceptionError } from "./modbus.js";
import { STATUS_REGISTER_OFFSET, decodeStatusWord } from "./registers.js";
import type { Register, Value } from "./registers.js";

/** Default minimum time between two commands, in milliseconds. */
export const MIN_COMMAND_INTERVAL_MS = 10;

// ---------- Options ----------

export interface RegisterClientOptions extends LoggingOptions {
  /** Minimum time between two commands on the channel. Default: 10 ms */
  minCommandIntervalMs?: number;
}

type Operation = "read" | "write";

// ---------- Client ----------

export class RegisterClient {
  public readonly channel: ModbusChannel;
  public readonly minCommandIntervalMs: number;

  private readonly log: Logger;
  private readonly mutex = new Mutex();
  private lastCommandAt = Number.NEGATIVE_INFINITY;

  constructor(channel: ModbusChannel, options: RegisterClientOptions = {}) {
    this.channel = channel;
    this.minCommandIntervalMs = options.minCommandIntervalMs ?? MIN_COMMAND_INTERVAL_MS;
    this.log = resolveLogger(options);
  }

  get connected(): boolean {
    return this.channel.connected;
  }

  // ---------- Connection management ----------

  /** Open the channel now instead of on first use. */
  async connect(): Promise<void> {
    await this.mutex.runExclusive(() => this.ensureConnected());
  }

  /** Close the channel. The next operation reconnects. */
  async close(): Promise<void> {
    await this.mutex.runExclusive(() => this.channel.close());
  }

  private async ensureConnected(): Promise<void> {
    if (this.channel.connected) return;
    this.log.debug("Establishing modbus connection");
    try {
      await this.channel.connect();
    } catch (err) {
      this.log.error(`Failed to establish modbus connection: ${errorMessage(err)}`);
      await this.closeQuietly();
      throw new ConnectionError(`Failed to establish modbus connection: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!this.channel.connected) {
      await this.closeQuietly();
      throw new ConnectionError("Failed to establish modbus connection");
    }
  }

  private async closeQuietly(): Promise<void> {
    try {
      await this.channel.close();
    } catch (err) {
      this.log.debug(`Error while closing channel: ${errorMessage(err)}`);
    }
  }

  // ---------- Command plumbing ----------

  private async pace(): Promise<void> {
    const elapsed = performance.now() - this.lastCommandAt;
    if (elapsed < this.minCommandIntervalMs) {
      await sleep(Math.ceil(this.minCommandIntervalMs - elapsed));
    }
  }

  /** Run one paced channel command. Must be called with the mutex held. */
  private async command<T>(
    op: Operation,
    context: string,
    run: (channel: ModbusChannel) => Promise<T>
  ): Promise<T> {
    await this.pace();
    try {
      return await run(this.channel);
    } catch (err) {
      throw await this.mapFailure(err, op, context);
    } finally {
      this.lastCommandAt = performance.now();
    }
  }

  private async mapFailure(err: unknown, op: Operation, context: string): Promise<GatewayError> {
    if (err instanceof GatewayError) {
      return err;
    }

    if (err instanceof ModbusExceptionError) {
      const code = err.exceptionCode;
      switch (code) {
        case ExceptionCode.SERVER_DEVICE_BUSY:
          this.log.info(`Device busy while ${context}`);
          return new BusyError(`Device busy while ${context}`, { cause: err });
        case ExceptionCode.SERVER_DEVICE_FAILURE:
          this.log.info(`Device failure while ${context}`);
          return new FailureError(`Device failure while ${context}`, { cause: err });
        case ExceptionCode.ACKNOWLEDGE:
          this.log.info(`Got ACK while ${context}`);
          return new AcknowledgeError(`Got ACK while ${context}`, { cause: err });
        default: {
          const message = `Got ${err.message} while ${context}`;
          this.log.warn(message);
          return op === "read"
            ? new ReadError(message, code, { cause: err })
            : new WriteError(message, code, { cause: err });
        }
      }
    }

    if (err instanceof ChannelIOError || err instanceof ChannelClosedError) {
      const message = `Connection lost while ${context}: ${err.message}`;
      this.log.error(message);
      await this.closeQuietly();
      return new ConnectionInterruptedError(message, { cause: err });
    }

    if (err instanceof RangeError) {
      return new InvalidArgumentError(err.message, { cause: err });
    }

    const message = `Invalid response while ${context}: ${errorMessage(err)}`;
    this.log.warn(message);
    return op === "read"
      ? new ReadError(message, undefined, { cause: err })
      : new WriteError(message, undefined, { cause: err });
  }

  private async readLocked(address: number, count: number, deviceAddress: number): Promise<number[]> {
    const context = `reading register ${address} (length ${count}) from device ${deviceAddress}`;
    this.log.debug(context);
    const words = await this.command("read", context, (channel) =>
      channel.readHoldingRegisters(address, count, deviceAddress)
    );
    if (words.length !== count) {
      const message = `Requested ${count} registers but received ${words.length}`;
      this.log.warn(message);
      throw new ReadError(message);
    }
    return words;
  }

  // ---------- Public register API ----------

  /**
   * Read `count` raw words starting at `address`. No capability checks;
   * the batch reader uses this for contiguous runs.
   */
  async readWords(address: number, count: number, deviceAddress: number): Promise<number[]> {
    return this.mutex.runExclusive(async () => {
      await this.ensureConnected();
      return this.readLocked(address, count, deviceAddress);
    });
  }

  /**
   * Read and decode a register. Registers with a status word get a second
   * read at `address + 10000` under the same lock.
   */
  async getRegister<T>(register: Register<T, unknown>, deviceAddress: number): Promise<Value<T>> {
    if (!register.readable) {
      this.log.warn(`Attempt to read not readable register ${register}`);
      throw new InvalidArgumentError(`Register ${register} is not readable`);
    }

    return this.mutex.runExclusive(async () => {
      await this.ensureConnected();
      const words = await this.readLocked(register.address, register.length, deviceAddress);
      const value = register.decode(words);
      if (!register.hasStatus) {
        return { value };
      }
      const [status] = await this.readLocked(
        register.address + STATUS_REGISTER_OFFSET,
        1,
        deviceAddress
      );
      return { value, freshness: decodeStatusWord(status) };
    });
  }

  /**
   * Encode and write a register. One word goes out as FC 6, more as FC 16.
   * Resolves true when the device echoes the write back.
   */
  async setRegister(register: Register, value: unknown, deviceAddress: number): Promise<boolean> {
    if (!register.writable) {
      this.log.warn(`Attempt to write not writable register ${register}`);
      throw new InvalidArgumentError(`Register ${register} is not writable`);
    }
    const words = register.encode(value);

    return this.mutex.runExclusive(async () => {
      await this.ensureConnected();
      const context = `writing ${JSON.stringify(words)} to register ${register.address} of device ${deviceAddress}`;
      this.log.debug(context);

      if (words.length === 1) {
        const echo = await this.command("write", context, (channel) =>
          channel.writeRegister(register.address, words[0], deviceAddress)
        );
        return echo[0] === register.address && echo[1] === words[0];
      }
      const echo = await this.command("write", context, (channel) =>
        channel.writeRegisters(register.address, words, deviceAddress)
      );
      return echo[0] === register.address && echo[1] === words.length;
    });
  }
}
