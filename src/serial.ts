import type { Duplex } from "node:stream";
import { SerialPort } from "serialport";
import { ChannelIOError, StreamChannel } from "./channel.js";
import type { StreamChannelOptions } from "./channel.js";

export type SerialParity = "none" | "even" | "odd";

export interface SerialChannelOptions extends StreamChannelOptions {
  /** Default: 19200 */
  baudRate?: number;
  /** Default: "even" */
  parity?: SerialParity;
  /** Default: 1 */
  stopBits?: 1 | 2;
}

/** Modbus RTU over a serial port (RS-485 adapter). */
export class SerialChannel extends StreamChannel {
  public readonly path: string;
  public readonly baudRate: number;
  public readonly parity: SerialParity;
  public readonly stopBits: 1 | 2;

  constructor(path: string, options: SerialChannelOptions = {}) {
    super(options, "rtu");
    this.path = path;
    this.baudRate = options.baudRate ?? 19200;
    this.parity = options.parity ?? "even";
    this.stopBits = options.stopBits ?? 1;
  }

  get description(): string {
    return this.path;
  }

  protected openStream(): Promise<Duplex> {
    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      dataBits: 8,
      parity: this.parity,
      stopBits: this.stopBits,
      autoOpen: false,
    });

    return new Promise<Duplex>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(
            new ChannelIOError(`Cannot open serial port ${this.path}: ${err.message}`, {
              cause: err,
            })
          );
          return;
        }
        resolve(port);
      });
    });
  }
}
