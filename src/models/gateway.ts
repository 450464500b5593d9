/**
 * BRDG-02R13 – the RF to Modbus gateway.
 *
 * The gateway answers on its own Modbus address with the shared node
 * registers plus its clock, serial line, RF traffic, binding and node
 * table registers. Binding and node lookup live in `BindingController`
 * and `NodeDirectory`; the gateway delegates to them.
 */

import { BindingController, MAX_NODE_ADDRESS, MIN_NODE_ADDRESS } from "../binding.js";
import type { RegisterClient } from "../client.js";
import { Baudrate, ModbusEvents, Parity, StopBits, enumOf } from "../constants.js";
import type { BindingStatus, ProductId, ResetMode, SerialConfig } from "../constants.js";
import { Device, NODE_REGISTERS } from "../device.js";
import type { AnyDevice, DeviceOptions } from "../device.js";
import type { BoundNodeInfo, NodeSlotProperty } from "../directory.js";
import { NODE_SLOTS, NodeDirectory, slotProperty } from "../directory.js";
import {
  R,
  RW,
  W,
  datetime,
  defineRegisters,
  float32,
  reg,
  requireTime,
  string,
  u16,
  u32,
} from "../registers.js";
import type { RegisterSpec, Value } from "../registers.js";

/** Modbus address the gateway answers on out of the box. */
export const DEFAULT_GATEWAY_ADDRESS = 207;

const FIRST_SLOT_ADDRESS = 43902;

type NodeSlotRegisters = Record<NodeSlotProperty, RegisterSpec<number, number>>;

function nodeSlots(): NodeSlotRegisters {
  const slots: NodeSlotRegisters = {};
  for (let slot = 1; slot <= NODE_SLOTS; slot++) {
    slots[slotProperty(slot)] = reg(FIRST_SLOT_ADDRESS + slot - 1, u16, R);
  }
  return slots;
}

// ---------- Registers ----------

const GATEWAY_BASE_REGISTERS = {
  ...NODE_REGISTERS,
  customerProductId: reg(40023, u32, RW),

  // Clock
  utcTime: reg(41015, datetime, RW, { adapter: requireTime }),
  localTime: reg(41017, datetime, R),
  uptime: reg(41019, u32, R),
  daylightSavingType: reg(41021, u16, RW),
  timezoneOffset: reg(41022, u16, RW),

  // Identity and housekeeping
  oemCode: reg(41101, u16, RW),
  modbusEvents: reg(41103, u16, RW, { adapter: enumOf(ModbusEvents, "Modbus events mode") }),
  resetDevice: reg(41107, u16, W),
  customerSpecificNodeId: reg(41108, string(10), W),

  // Serial line
  serialParity: reg(41998, u16, RW, { adapter: enumOf(Parity, "parity") }),
  serialStopBits: reg(41999, u16, RW, { adapter: enumOf(StopBits, "stop bits") }),
  serialBaudrate: reg(42000, u16, RW, { adapter: enumOf(Baudrate, "baud rate") }),
  modbusDeviceId: reg(42001, u16, RW, { min: 1, max: MAX_NODE_ADDRESS }),

  // RF traffic
  messagesSendCurrentHour: reg(42100, u16, R),
  messagesSendLastHour: reg(42101, u16, R),
  rfLoadCurrentHour: reg(42102, float32, R),
  rfLoadLastHour: reg(42104, float32, R),

  // Binding
  bindingProductId: reg(43000, u32, RW),
  bindingProductSerial: reg(43002, u32, RW),
  bindingCommand: reg(43004, u16, W),
  createNode: reg(43005, u16, W, { min: MIN_NODE_ADDRESS, max: MAX_NODE_ADDRESS }),
  firstAddressToAssign: reg(43006, u16, RW),
  removeNode: reg(43399, u16, W),

  // Node table
  actualBindingStatus: reg(43900, u16, R),
  numberOfNodes: reg(43901, u16, R),
};

export const GATEWAY_REGISTERS = defineRegisters<
  typeof GATEWAY_BASE_REGISTERS & NodeSlotRegisters
>({ ...GATEWAY_BASE_REGISTERS, ...nodeSlots() });

export type GatewayRegisters = typeof GATEWAY_REGISTERS.specs;

// ---------- Value types ----------

export interface RFLoad {
  /** Share of air time used, in percent. */
  currentHour: number;
  lastHour: number;
}

export interface RFSentMessages {
  currentHour: number;
  lastHour: number;
}

// ---------- Gateway ----------

export class Gateway extends Device<GatewayRegisters> {
  public readonly binding: BindingController;
  public readonly directory: NodeDirectory;

  constructor(
    client: RegisterClient,
    address: number = DEFAULT_GATEWAY_ADDRESS,
    options: DeviceOptions = {}
  ) {
    super(address, client, GATEWAY_REGISTERS, options);
    this.binding = new BindingController(this, this.log);
    this.directory = new NodeDirectory(this, this.log);
  }

  override get label(): string {
    return "BRDG-02R13";
  }

  // ---------- RF traffic ----------

  async rfLoad(): Promise<RFLoad> {
    const current = await this.get("rfLoadCurrentHour");
    const last = await this.get("rfLoadLastHour");
    return { currentHour: current.value, lastHour: last.value };
  }

  async rfSentMessages(): Promise<RFSentMessages> {
    const current = await this.get("messagesSendCurrentHour");
    const last = await this.get("messagesSendLastHour");
    return { currentHour: current.value, lastHour: last.value };
  }

  // ---------- Serial line ----------

  async serialConfig(): Promise<SerialConfig> {
    const baudrate = await this.get("serialBaudrate");
    const parity = await this.get("serialParity");
    const stopBits = await this.get("serialStopBits");
    return { baudrate: baudrate.value, parity: parity.value, stopBits: stopBits.value };
  }

  /** Takes effect after a reset. Stops at the first write that is not confirmed. */
  async setSerialConfig(config: SerialConfig): Promise<boolean> {
    return (
      (await this.set("serialBaudrate", config.baudrate)) &&
      (await this.set("serialParity", config.parity)) &&
      (await this.set("serialStopBits", config.stopBits))
    );
  }

  // ---------- Housekeeping ----------

  async modbusEvents(): Promise<Value<ModbusEvents>> {
    return this.get("modbusEvents");
  }

  async setModbusEvents(value: ModbusEvents): Promise<boolean> {
    return this.set("modbusEvents", value);
  }

  /** Seconds since the last power on or reset. */
  async powerOnTime(): Promise<Value<number>> {
    return this.get("uptime");
  }

  async utcTime(): Promise<Value<Date>> {
    return this.get("utcTime");
  }

  async setUtcTime(time: Date = new Date()): Promise<boolean> {
    return this.set("utcTime", time);
  }

  async reset(mode: ResetMode): Promise<boolean> {
    return this.set("resetDevice", mode);
  }

  async oemCode(): Promise<Value<number>> {
    return this.get("oemCode");
  }

  /** Must match the product's OEM code before binding it. */
  async setOemCode(code: number): Promise<boolean> {
    return this.set("oemCode", code);
  }

  // ---------- Binding and nodes ----------

  async bindController(address: number, productId: ProductId, serial?: number): Promise<boolean> {
    return this.binding.bindController(address, productId, serial);
  }

  async bindAccessory(
    controllerAddress: number,
    address: number,
    productId: ProductId
  ): Promise<boolean> {
    return this.binding.bindAccessory(controllerAddress, address, productId);
  }

  async unbind(address: number): Promise<boolean> {
    return this.binding.unbind(address);
  }

  async bindStatus(): Promise<BindingStatus> {
    return this.binding.bindStatus();
  }

  async nodes(): Promise<BoundNodeInfo[]> {
    return this.directory.nodes();
  }

  async node(address: number): Promise<AnyDevice> {
    return this.directory.node(address);
  }
}
