/**
 * Building a client from a plain transport description.
 */

import type { ModbusChannel } from "./channel.js";
import { RegisterClient } from "./client.js";
import type { RegisterClientOptions } from "./client.js";
import type { LoggingOptions } from "./logger.js";
import { SerialChannel } from "./serial.js";
import type { SerialChannelOptions } from "./serial.js";
import { TcpChannel } from "./tcp.js";
import type { TcpChannelOptions } from "./tcp.js";

/** Serial device the gateway's USB adapter usually shows up as. */
export const DEFAULT_SERIAL_PATH = "/dev/ttyACM0";

export interface TcpTransportConfig extends TcpChannelOptions {
  type: "tcp";
  host: string;
}

export interface SerialTransportConfig extends SerialChannelOptions {
  type: "serial";
  /** Default: /dev/ttyACM0 */
  path?: string;
}

export type TransportConfig = TcpTransportConfig | SerialTransportConfig;

/** Channel for a transport description. Logging options apply when the config has none. */
export function createChannel(
  transport: TransportConfig,
  logging: LoggingOptions = {}
): ModbusChannel {
  switch (transport.type) {
    case "tcp": {
      const { type: _type, host, ...options } = transport;
      return new TcpChannel(host, { ...logging, ...options });
    }
    case "serial": {
      const { type: _type, path, ...options } = transport;
      return new SerialChannel(path ?? DEFAULT_SERIAL_PATH, { ...logging, ...options });
    }
  }
}

/**
 * Client over the channel `transport` describes. The client's logging
 * options are shared with the channel.
 */
export function createClient(
  transport: TransportConfig,
  options: RegisterClientOptions = {}
): RegisterClient {
  const { verbose, logger } = options;
  return new RegisterClient(createChannel(transport, { verbose, logger }), options);
}
