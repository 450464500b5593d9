import type { RegisterClient } from "../client.js";
import { ProductId } from "../constants.js";
import type { AnyDevice, DeviceOptions } from "../device.js";
import { NotImplementedError } from "../errors.js";
import { Vmd02rps78 } from "./vmd02rps78.js";
import { Vmn05lm02 } from "./vmn05lm02.js";

type NodeModel = new (
  address: number,
  client: RegisterClient,
  options?: DeviceOptions
) => AnyDevice;

const PRODUCT_NAMES: Record<ProductId, string> = {
  [ProductId.BRDG_02R13]: "BRDG-02R13",
  [ProductId.VMD_02RPS78]: "VMD-02RPS78",
  [ProductId.VMN_05LM02]: "VMN-05LM02",
  [ProductId.VMN_02LM11]: "VMN-02LM11",
};

// The gateway is not a bound node; it is reached through its own address.
const NODE_MODELS: Partial<Record<ProductId, NodeModel>> = {
  [ProductId.VMD_02RPS78]: Vmd02rps78,
  [ProductId.VMN_05LM02]: Vmn05lm02,
  [ProductId.VMN_02LM11]: Vmn05lm02,
};

export function productName(productId: ProductId): string {
  return PRODUCT_NAMES[productId];
}

/** Device model for a bound node of product `productId`. */
export function createDevice(
  productId: ProductId,
  address: number,
  client: RegisterClient,
  options: DeviceOptions = {}
): AnyDevice {
  const Model = NODE_MODELS[productId];
  if (Model === undefined) {
    throw new NotImplementedError(
      `No device model for product ${productName(productId)} (0x${productId.toString(16)})`
    );
  }
  return new Model(address, client, options);
}
