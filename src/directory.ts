/**
 * NodeDirectory – the nodes bound to a gateway.
 *
 * The gateway keeps a fixed table of node addresses. Every scan reads the
 * table afresh; nothing is cached between calls.
 */

import { readBatch } from "./batch.js";
import type { ProductId } from "./constants.js";
import type { AnyDevice, Device } from "./device.js";
import { NODE_REGISTERS } from "./device.js";
import { DecodeError, NotFoundError, errorMessage, isDeviceFailure } from "./errors.js";
import type { Logger } from "./logger.js";
import { nullLogger } from "./logger.js";
import { createDevice, productName } from "./models/factory.js";
import type { GatewayRegisters } from "./models/gateway.js";
import { Register } from "./registers.js";

/** Size of the gateway's bound node table. */
export const NODE_SLOTS = 32;

export type NodeSlotProperty = `addressNode${number}`;

/** Property name of node table slot `slot` (1-based). */
export function slotProperty(slot: number): NodeSlotProperty {
  return `addressNode${slot}`;
}

export interface BoundNodeInfo {
  /** Modbus address of the node on the gateway. */
  address: number;
  productId: ProductId;
  /** Model name, e.g. VMD-02RPS78. */
  product: string;
  rfAddress: number;
}

const PRODUCT_ID = new Register("productId", NODE_REGISTERS.productId);
const RF_ADDRESS = new Register("rfAddress", NODE_REGISTERS.rfAddress);

export class NodeDirectory {
  private readonly gateway: Device<GatewayRegisters>;
  private readonly log: Logger;

  constructor(gateway: Device<GatewayRegisters>, log: Logger = nullLogger) {
    this.gateway = gateway;
    this.log = log;
  }

  /** Node addresses from the occupied slots of the node table, in slot order. */
  private async slotAddresses(): Promise<number[]> {
    const slots: Register[] = [];
    for (let slot = 1; slot <= NODE_SLOTS; slot++) {
      slots.push(this.gateway.registers.register(slotProperty(slot)));
    }

    const values = await readBatch(this.gateway.client, slots, this.gateway.address, this.log);
    const addresses: number[] = [];
    for (const slot of slots) {
      const address = values.get(slot.property)?.value;
      if (typeof address === "number" && address !== 0) {
        addresses.push(address);
      }
    }
    return addresses;
  }

  /** Read one register of a node; undefined when the node cannot tell. */
  private async tryRead<T>(register: Register<T, unknown>, address: number): Promise<T | undefined> {
    try {
      const { value } = await this.gateway.client.getRegister(register, address);
      return value;
    } catch (err) {
      if (err instanceof DecodeError) {
        this.log.warn(`Skipping node ${address}: ${err.message}`);
        return undefined;
      }
      if (!isDeviceFailure(err)) throw err;
      this.log.info(`Skipping node ${address}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  /** Scan the node table and identify every bound node. */
  async nodes(): Promise<BoundNodeInfo[]> {
    const nodes: BoundNodeInfo[] = [];
    for (const address of await this.slotAddresses()) {
      const productId = await this.tryRead(PRODUCT_ID, address);
      if (productId === undefined) continue;
      const rfAddress = await this.tryRead(RF_ADDRESS, address);
      if (rfAddress === undefined) continue;

      nodes.push({ address, productId, product: productName(productId), rfAddress });
    }
    return nodes;
  }

  /**
   * The device at `address`: the gateway itself, or the model of the
   * bound node with that address.
   */
  async node(address: number): Promise<AnyDevice> {
    if (address === this.gateway.address) {
      return this.gateway;
    }
    for (const info of await this.nodes()) {
      if (info.address === address) {
        return createDevice(info.productId, address, this.gateway.client, { logger: this.log });
      }
    }
    throw new NotFoundError(`Node ${address} not found`);
  }
}
