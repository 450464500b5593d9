/**
 * BindingController – pairs RF products with the gateway.
 *
 * Binding is a fixed write sequence: abort any stale session, check that
 * the gateway reports no session, configure the product, allocate the
 * node and start the session. The gateway firmware runs the session on
 * its own; poll `bindStatus()` to follow it.
 */

import { BINDING_IDLE, BindingMode, BindingStatus, enumOf } from "./constants.js";
import type { ProductId } from "./constants.js";
import type { Device } from "./device.js";
import {
  BindingError,
  DecodeError,
  InvalidArgumentError,
  errorMessage,
  isDeviceFailure,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { nullLogger } from "./logger.js";
import type { GatewayRegisters } from "./models/gateway.js";

/** Lowest and highest Modbus address a bound node can take. */
export const MIN_NODE_ADDRESS = 2;
export const MAX_NODE_ADDRESS = 247;

const toBindingStatus = enumOf(BindingStatus, "binding status");

/** Command word for the binding command register. */
export function bindingCommand(address: number, mode: BindingMode): number {
  return ((address & 0xff) << 8) | mode;
}

export class BindingController {
  private readonly gateway: Device<GatewayRegisters>;
  private readonly log: Logger;

  constructor(gateway: Device<GatewayRegisters>, log: Logger = nullLogger) {
    this.gateway = gateway;
    this.log = log;
  }

  private checkAddress(address: number): void {
    if (
      !Number.isInteger(address) ||
      address < MIN_NODE_ADDRESS ||
      address > MAX_NODE_ADDRESS
    ) {
      throw new InvalidArgumentError(
        `Modbus device id ${address} out of range ${MIN_NODE_ADDRESS}-${MAX_NODE_ADDRESS}`
      );
    }
  }

  private checkNodeAddress(address: number): void {
    this.checkAddress(address);
    if (address === this.gateway.address) {
      throw new InvalidArgumentError(`Modbus device id ${address} already in use`);
    }
  }

  /**
   * One write of the binding sequence. An unconfirmed write or a device
   * exception fails the call with `message`; connection errors pass through.
   */
  private async step(message: string, write: () => Promise<boolean>): Promise<void> {
    let ok: boolean;
    try {
      ok = await write();
    } catch (err) {
      if (!isDeviceFailure(err)) throw err;
      throw new BindingError(message, { cause: err });
    }
    if (!ok) {
      throw new BindingError(message);
    }
  }

  /** Abort any running session and require the gateway to report none. */
  private async resetSession(): Promise<void> {
    await this.step("Failed to reset binding status", () =>
      this.gateway.set("bindingCommand", BindingMode.Abort)
    );

    let status: number;
    try {
      ({ value: status } = await this.gateway.get("actualBindingStatus"));
    } catch (err) {
      if (!isDeviceFailure(err) && !(err instanceof DecodeError)) throw err;
      throw new BindingError("Failed to determine current binding status", { cause: err });
    }
    if (status !== BINDING_IDLE) {
      throw new BindingError(`Bridge not ready for binding: ${status}`);
    }
  }

  /** Configure the product to bind and allocate its node. */
  private async prepareNode(address: number, productId: ProductId): Promise<void> {
    await this.step("Failed to configure binding product ID", () =>
      this.gateway.set("bindingProductId", productId)
    );
    await this.step(`Failed to create node for device id ${address}`, () =>
      this.gateway.set("createNode", address)
    );
  }

  /** Write the command word that starts the session. */
  private async start(command: number): Promise<boolean> {
    try {
      return await this.gateway.set("bindingCommand", command);
    } catch (err) {
      if (!isDeviceFailure(err)) throw err;
      throw new BindingError("Failed to start binding", { cause: err });
    }
  }

  /**
   * Bind a new controller under Modbus address `address`. With `serial`
   * only the product with that serial number is accepted.
   *
   * Resolves with the confirmation of the final command write.
   */
  async bindController(address: number, productId: ProductId, serial?: number): Promise<boolean> {
    this.checkNodeAddress(address);

    await this.resetSession();
    await this.prepareNode(address, productId);

    let mode: BindingMode = BindingMode.OutgoingSingleProduct;
    if (serial !== undefined) {
      const productSerial = serial;
      mode = BindingMode.OutgoingSingleProductPlusSerial;
      await this.step("Failed to configure binding product serial", () =>
        this.gateway.set("bindingProductSerial", productSerial)
      );
    }

    this.log.debug(`Starting binding of product ${productId} at ${address} on ${this.gateway}`);
    return this.start(bindingCommand(address, mode));
  }

  /** Bind an accessory to the controller at `controllerAddress`. */
  async bindAccessory(
    controllerAddress: number,
    address: number,
    productId: ProductId
  ): Promise<boolean> {
    this.checkAddress(controllerAddress);
    this.checkNodeAddress(address);

    await this.resetSession();
    await this.prepareNode(address, productId);

    this.log.debug(
      `Starting accessory binding of product ${productId} at ${address} to ${controllerAddress}`
    );
    return this.start(bindingCommand(address, BindingMode.IncomingOnExistingNode));
  }

  /** Remove the bound node at `address`. */
  async unbind(address: number): Promise<boolean> {
    return this.gateway.set("removeNode", address);
  }

  /** Current binding status; `NotAvailable` when it cannot be read. */
  async bindStatus(): Promise<BindingStatus> {
    try {
      const { value } = await this.gateway.get("actualBindingStatus");
      return toBindingStatus(value);
    } catch (err) {
      if (!isDeviceFailure(err) && !(err instanceof DecodeError)) throw err;
      this.log.info(`Binding status not available: ${errorMessage(err)}`);
      return BindingStatus.NotAvailable;
    }
  }
}
