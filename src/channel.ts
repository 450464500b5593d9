import type { Duplex } from "node:stream";
import * as modbus from "./modbus.js";
import type { Logger, LoggingOptions } from "./logger.js";
import { resolveLogger } from "./logger.js";

// ---------- Channel contract ----------

/**
 * Register-level request/response channel to the gateway.
 *
 * Implementations raise `ModbusExceptionError` for exception responses,
 * `ModbusFrameError` for malformed ones, `ChannelIOError` for transport
 * failures and `ChannelClosedError` when used while disconnected.
 */
export interface ModbusChannel {
  readonly connected: boolean;
  connect(): Promise<void>;
  close(): Promise<void>;
  readHoldingRegisters(address: number, count: number, unitId: number): Promise<number[]>;
  /** FC 6. Resolves with the echoed `[address, value]`. */
  writeRegister(address: number, value: number, unitId: number): Promise<number[]>;
  /** FC 16. Resolves with the echoed `[address, quantity]`. */
  writeRegisters(address: number, values: readonly number[], unitId: number): Promise<number[]>;
}

// ---------- Errors ----------

export class ChannelIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChannelIOError";
  }
}

export class ChannelClosedError extends Error {
  constructor(message = "Connection already closed.") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

// ---------- Options ----------

export interface StreamChannelOptions extends LoggingOptions {
  /** Frame format on the wire. */
  framing?: modbus.Framing;
  /** Response timeout in milliseconds. Default: 3000 */
  timeout?: number;
}

interface PendingRequest {
  unitId: number;
  transactionId: number | undefined;
  resolve: (pdu: Buffer) => void;
  reject: (err: Error) => void;
}

// ---------- Stream channel ----------

/**
 * Channel over any byte stream (TCP socket, serial port).
 *
 * Subclasses only open the stream. Framing, the single in-flight request
 * and its timeout are handled here.
 */
export abstract class StreamChannel implements ModbusChannel {
  public readonly framing: modbus.Framing;
  public readonly timeout: number;

  protected readonly log: Logger;
  private stream: Duplex | null = null;
  private isConnected = false;
  private rxBuffer: Buffer = Buffer.alloc(0);
  private pending: PendingRequest | null = null;
  private transactionId = 0;

  constructor(options: StreamChannelOptions = {}, defaultFraming: modbus.Framing = "tcp") {
    this.framing = options.framing ?? defaultFraming;
    this.timeout = options.timeout ?? 3000;
    this.log = resolveLogger(options);
  }

  /** Human readable endpoint, used in log and error messages. */
  abstract get description(): string;

  /** Open the underlying stream. Rejects with `ChannelIOError`. */
  protected abstract openStream(): Promise<Duplex>;

  get connected(): boolean {
    return this.isConnected && this.stream !== null && !this.stream.destroyed;
  }

  // ---------- Connection management ----------

  async connect(): Promise<void> {
    if (this.connected) return;
    if (this.stream) {
      await this.close();
    }
    const stream = await this.openStream();
    this.stream = stream;
    this.rxBuffer = Buffer.alloc(0);
    this.isConnected = true;
    this.setupStreamListeners(stream);
    this.log.debug(`Connected to ${this.description}`);
  }

  private setupStreamListeners(stream: Duplex): void {
    stream.on("data", (data: Buffer) => {
      this.log.debug(`RAW RECD: ${data.toString("hex")}`);
      this.rxBuffer = Buffer.concat([this.rxBuffer, data]);
      this.drainFrames();
    });

    stream.on("close", () => {
      this.log.debug(`${this.description} closed`);
      this.isConnected = false;
      this.failPending(new ChannelIOError("Connection closed on read"));
    });

    stream.on("error", (err: Error) => {
      this.log.debug(`Stream error: ${err.message}`);
      this.failPending(new ChannelIOError(err.message, { cause: err }));
    });
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    this.isConnected = false;
    this.failPending(new ChannelClosedError("Channel closed while waiting for a response"));
    if (!stream) return;

    stream.removeAllListeners();
    stream.on("error", (err: Error) => {
      this.log.debug(`Error while closing: ${err.message}`);
    });

    await new Promise<void>((resolve) => {
      if (stream.destroyed) {
        resolve();
        return;
      }
      // If destroy doesn't trigger close fast enough, stop waiting
      const timer = setTimeout(resolve, 500);
      stream.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      stream.destroy();
    });
  }

  // ---------- Frame send/receive ----------

  private nextTransactionId(): number {
    this.transactionId = (this.transactionId + 1) & 0xffff;
    return this.transactionId;
  }

  private frameLength(buffer: Buffer): number | null {
    return this.framing === "tcp"
      ? modbus.mbapFrameLength(buffer)
      : modbus.rtuResponseLength(buffer);
  }

  private drainFrames(): void {
    for (;;) {
      let length: number | null;
      try {
        length = this.frameLength(this.rxBuffer);
      } catch (err) {
        this.rxBuffer = Buffer.alloc(0);
        this.failPending(err instanceof Error ? err : new modbus.ModbusFrameError(String(err)));
        return;
      }
      if (length === null || this.rxBuffer.length < length) return;

      const frame = this.rxBuffer.subarray(0, length);
      this.rxBuffer = this.rxBuffer.subarray(length);
      this.handleFrame(frame);
    }
  }

  private handleFrame(frame: Buffer): void {
    const pending = this.pending;
    if (!pending) {
      this.log.debug(`[DISCARDED] RECD: ${frame.toString("hex")}`);
      return;
    }

    let adu: modbus.Adu;
    try {
      adu = this.framing === "tcp" ? modbus.parseMbapFrame(frame) : modbus.parseRtuFrame(frame);
    } catch (err) {
      this.failPending(err instanceof Error ? err : new modbus.ModbusFrameError(String(err)));
      return;
    }

    if (adu.transactionId !== pending.transactionId || adu.unitId !== pending.unitId) {
      this.log.debug(
        `[MISMATCH] RECD unit ${adu.unitId} tid ${adu.transactionId ?? "-"}: ${frame.toString("hex")}`
      );
      return;
    }

    this.pending = null;
    pending.resolve(adu.pdu);
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.reject(err);
  }

  /** Send one request PDU and wait for the matching response PDU. */
  private async request(unitId: number, pdu: Buffer): Promise<Buffer> {
    const stream = this.stream;
    if (!stream || !this.connected) {
      throw new ChannelClosedError();
    }
    if (this.pending) {
      throw new ChannelIOError("A request is already in flight");
    }

    const transactionId = this.framing === "tcp" ? this.nextTransactionId() : undefined;
    const frame =
      transactionId === undefined
        ? modbus.buildRtuFrame(unitId, pdu)
        : modbus.buildMbapFrame(transactionId, unitId, pdu);

    this.rxBuffer = Buffer.alloc(0);
    this.log.debug(`SENT: ${frame.toString("hex")}`);

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failPending(
          new ChannelIOError(`Timeout waiting for response from ${this.description}`)
        );
      }, this.timeout);

      this.pending = {
        unitId,
        transactionId,
        resolve: (data: Buffer) => {
          clearTimeout(timer);
          resolve(data);
        },
        reject: (err: Error) => {
          clearTimeout(timer);
          reject(err);
        },
      };

      stream.write(frame, (err?: Error | null) => {
        if (err) {
          this.failPending(new ChannelIOError(err.message, { cause: err }));
        }
      });
    });
  }

  // ---------- Public Modbus API ----------

  async readHoldingRegisters(address: number, count: number, unitId: number): Promise<number[]> {
    const pdu = modbus.readHoldingRegistersPdu(address, count);
    return modbus.parseResponsePdu(await this.request(unitId, pdu), pdu);
  }

  async writeRegister(address: number, value: number, unitId: number): Promise<number[]> {
    const pdu = modbus.writeSingleRegisterPdu(address, value);
    return modbus.parseResponsePdu(await this.request(unitId, pdu), pdu);
  }

  async writeRegisters(
    address: number,
    values: readonly number[],
    unitId: number
  ): Promise<number[]> {
    const pdu = modbus.writeMultipleRegistersPdu(address, values);
    return modbus.parseResponsePdu(await this.request(unitId, pdu), pdu);
  }
}
