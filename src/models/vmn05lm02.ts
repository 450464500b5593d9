/**
 * VMN-05LM02 – battery powered remote control. The VMN-02LM11 wall
 * remote exposes the same registers.
 */

import type { RegisterClient } from "../client.js";
import { RequestedVentilationSpeed, enumOf } from "../constants.js";
import { Device, NODE_REGISTERS } from "../device.js";
import type { DeviceOptions } from "../device.js";
import { RS, defineRegisters, reg, u16 } from "../registers.js";
import type { Value } from "../registers.js";

export const VMN_REGISTERS = defineRegisters({
  ...NODE_REGISTERS,
  requestedVentilationSpeed: reg(41000, u16, RS, {
    adapter: enumOf(RequestedVentilationSpeed, "requested ventilation speed"),
  }),
});

export type VmnRegisters = typeof VMN_REGISTERS.specs;

export class Vmn05lm02 extends Device<VmnRegisters> {
  constructor(address: number, client: RegisterClient, options: DeviceOptions = {}) {
    super(address, client, VMN_REGISTERS, options);
  }

  override get label(): string {
    return "VMN-05LM02";
  }

  /** Speed last requested with the remote's buttons. */
  async requestedVentilationSpeed(): Promise<Value<RequestedVentilationSpeed>> {
    return this.get("requestedVentilationSpeed");
  }
}
