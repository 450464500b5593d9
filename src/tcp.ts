import net from "node:net";
import type { Duplex } from "node:stream";
import { ChannelIOError, StreamChannel } from "./channel.js";
import type { StreamChannelOptions } from "./channel.js";

export interface TcpChannelOptions extends StreamChannelOptions {
  /** TCP port of the gateway or its Ethernet adapter. Default: 502 */
  port?: number;
}

/**
 * Modbus over a TCP socket. Uses MBAP framing unless `framing: "rtu"` is
 * given for RTU-over-TCP converters.
 */
export class TcpChannel extends StreamChannel {
  public readonly host: string;
  public readonly port: number;

  constructor(host: string, options: TcpChannelOptions = {}) {
    super(options, "tcp");
    this.host = host;
    this.port = options.port ?? 502;
  }

  get description(): string {
    return `${this.host}:${this.port}`;
  }

  protected openStream(): Promise<Duplex> {
    return new Promise<Duplex>((resolve, reject) => {
      const socket = new net.Socket();
      socket.setTimeout(this.timeout);

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ChannelIOError(`Cannot open connection to ${this.description}: ${err.message}`, {
            cause: err,
          })
        );
      };

      const onTimeout = () => {
        onError(new Error("connect timed out"));
      };

      const onConnect = () => {
        cleanup();
        socket.setTimeout(0);
        socket.setNoDelay(true);
        resolve(socket);
      };

      const cleanup = () => {
        socket.removeListener("error", onError);
        socket.removeListener("timeout", onTimeout);
        socket.removeListener("connect", onConnect);
      };

      socket.once("error", onError);
      socket.once("timeout", onTimeout);
      socket.once("connect", onConnect);
      socket.connect(this.port, this.host);
    });
  }
}
