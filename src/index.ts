/**
 * ventbridge – typed Modbus access to the BRDG-02R13 RF ventilation
 * gateway and the nodes bound to it.
 */

// Channels
export { ChannelClosedError, ChannelIOError, StreamChannel } from "./channel.js";
export type { ModbusChannel, StreamChannelOptions } from "./channel.js";
export { TcpChannel } from "./tcp.js";
export type { TcpChannelOptions } from "./tcp.js";
export { SerialChannel } from "./serial.js";
export type { SerialChannelOptions, SerialParity } from "./serial.js";

// Client and configuration
export { MIN_COMMAND_INTERVAL_MS, RegisterClient } from "./client.js";
export type { RegisterClientOptions } from "./client.js";
export { DEFAULT_SERIAL_PATH, createChannel, createClient } from "./config.js";
export type { SerialTransportConfig, TcpTransportConfig, TransportConfig } from "./config.js";
export { createConsoleLogger, nullLogger } from "./logger.js";
export type { Logger, LoggingOptions } from "./logger.js";

// Registers
export {
  Access,
  R,
  RS,
  RW,
  RWS,
  Register,
  RegisterTable,
  STATUS_REGISTER_OFFSET,
  StatusFlag,
  UNKNOWN_TIME,
  ValueSource,
  W,
  date,
  datetime,
  decodeStatusWord,
  defineRegisters,
  float32,
  hasFlag,
  i16,
  reg,
  requireTime,
  string,
  u16,
  u32,
} from "./registers.js";
export type {
  Codec,
  Freshness,
  RegisterLookup,
  RegisterOptions,
  RegisterSpec,
  SpecMap,
  Value,
} from "./registers.js";
export { planRuns, readBatch } from "./batch.js";
export type { BatchResult, RegisterRun } from "./batch.js";

// Devices
export { Device, NODE_REGISTERS } from "./device.js";
export type { AnyDevice, DeviceData, DeviceOptions, FetchOptions } from "./device.js";
export { DEFAULT_GATEWAY_ADDRESS, GATEWAY_REGISTERS, Gateway } from "./models/gateway.js";
export type { GatewayRegisters, RFLoad, RFSentMessages } from "./models/gateway.js";
export { MAX_OVERRIDE_MINUTES, VMD_REGISTERS, Vmd02rps78 } from "./models/vmd02rps78.js";
export type {
  FilterRemaining,
  Setpoint,
  SpeedPreset,
  TemperatureSensor,
  VmdRegisters,
} from "./models/vmd02rps78.js";
export { VMN_REGISTERS, Vmn05lm02 } from "./models/vmn05lm02.js";
export type { VmnRegisters } from "./models/vmn05lm02.js";
export { createDevice, productName } from "./models/factory.js";

// Binding and nodes
export {
  BindingController,
  MAX_NODE_ADDRESS,
  MIN_NODE_ADDRESS,
  bindingCommand,
} from "./binding.js";
export { NODE_SLOTS, NodeDirectory, slotProperty } from "./directory.js";
export type { BoundNodeInfo, NodeSlotProperty } from "./directory.js";

// Constants and errors
export * from "./constants.js";
export * from "./errors.js";
