#!/usr/bin/env node

/**
 * ventbridge CLI – read, write and bind through the ventilation gateway.
 */

import { Command, InvalidArgumentError as InvalidOptionError, Option } from "commander";
import { BindingStatus, ProductId, enumName, parseEnum } from "./constants.js";
import { DEFAULT_SERIAL_PATH, createClient } from "./config.js";
import type { TransportConfig } from "./config.js";
import type { AnyDevice } from "./device.js";
import { PropertyNotSupportedError, errorMessage } from "./errors.js";
import { formatData, formatNode, formatValue, parseInteger, parseRegisterValue } from "./format.js";
import { DEFAULT_GATEWAY_ADDRESS, Gateway } from "./models/gateway.js";

interface ConnectionOptions {
  host?: string;
  port: number;
  serial: string;
  timeout: number;
  gateway: number;
  node?: number;
  verbose: boolean;
}

function integerOption(value: string): number {
  try {
    return parseInteger(value);
  } catch (err) {
    throw new InvalidOptionError(errorMessage(err));
  }
}

function productOption(value: string): ProductId {
  const product =
    parseEnum(ProductId, value) ?? parseEnum(ProductId, enumName(ProductId, Number(value)) ?? "");
  if (product === undefined) {
    throw new InvalidOptionError(`Unknown product: ${value}`);
  }
  return product;
}

const program = new Command();

program
  .name("ventbridge")
  .description("CLI for the BRDG-02R13 RF ventilation gateway and its bound nodes")
  .version("0.3.0")
  .addOption(new Option("-H, --host <host>", "Gateway host (Modbus TCP)").env("VENTBRIDGE_HOST"))
  .addOption(
    new Option("-p, --port <number>", "Modbus TCP port")
      .env("VENTBRIDGE_PORT")
      .argParser(integerOption)
      .default(502)
  )
  .addOption(
    new Option("-s, --serial <path>", "Serial port, used when no host is given")
      .env("VENTBRIDGE_SERIAL")
      .default(DEFAULT_SERIAL_PATH)
  )
  .option("-t, --timeout <ms>", "Response timeout in milliseconds", integerOption, 3000)
  .option(
    "-g, --gateway <address>",
    "Modbus address of the gateway",
    integerOption,
    DEFAULT_GATEWAY_ADDRESS
  )
  .option("-n, --node <address>", "Talk to the bound node at this address", integerOption)
  .option("-v, --verbose", "Enable verbose logging", false);

function transportConfig(opts: ConnectionOptions): TransportConfig {
  if (opts.host !== undefined) {
    return { type: "tcp", host: opts.host, port: opts.port, timeout: opts.timeout };
  }
  return { type: "serial", path: opts.serial, timeout: opts.timeout };
}

/**
 * Run `action` against the gateway and the selected device, print any
 * error and always close the connection.
 */
async function session(action: (target: AnyDevice, gateway: Gateway) => Promise<void>): Promise<void> {
  const opts = program.opts<ConnectionOptions>();
  const client = createClient(transportConfig(opts), { verbose: opts.verbose });
  const gateway = new Gateway(client, opts.gateway, { verbose: opts.verbose });
  try {
    const target: AnyDevice =
      opts.node === undefined ? gateway : await gateway.node(opts.node);
    await action(target, gateway);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    await client.close();
  }
}

function reportWrite(ok: boolean): void {
  if (ok) {
    console.log("OK");
  } else {
    console.error("Write not confirmed by the device");
    process.exitCode = 1;
  }
}

// ---------- get ----------

program
  .command("get")
  .description("Read one property")
  .argument("<property>", "Property name, e.g. productName")
  .action((property: string) =>
    session(async (target) => {
      console.log(formatValue(await target.get(property)));
    })
  );

// ---------- set ----------

program
  .command("set")
  .description("Write one property")
  .argument("<property>", "Property name")
  .argument("<value>", "Value; integers may be given as 0x hex, dates as ISO 8601 or 'now'")
  .action((property: string, text: string) =>
    session(async (target) => {
      const register = target.registers.get(property);
      if (register === undefined) {
        throw new PropertyNotSupportedError(property);
      }
      reportWrite(await target.set(property, parseRegisterValue(register, text)));
    })
  );

// ---------- fetch ----------

program
  .command("fetch")
  .description("Read every readable property")
  .option("--no-status", "Read in bulk without status words")
  .action((opts: { status: boolean }) =>
    session(async (target) => {
      const data = await target.fetch({ withStatus: opts.status });
      for (const line of formatData(data)) {
        console.log(line);
      }
    })
  );

// ---------- rf-stats ----------

program
  .command("rf-stats")
  .description("Show the RF statistics of the selected device")
  .option("--clear", "Clear the statistics instead", false)
  .action((opts: { clear: boolean }) =>
    session(async (target) => {
      if (opts.clear) {
        reportWrite(await target.clearRfStats());
        return;
      }
      const records = await target.rfStats();
      if (records.length === 0) {
        console.log("No RF statistics.");
      }
      for (const record of records) {
        console.log(JSON.stringify(record));
      }
    })
  );

// ---------- nodes ----------

program
  .command("nodes")
  .description("List the nodes bound to the gateway")
  .action(() =>
    session(async (_target, gateway) => {
      const nodes = await gateway.nodes();
      if (nodes.length === 0) {
        console.log("No bound nodes.");
      }
      for (const node of nodes) {
        console.log(formatNode(node));
      }
    })
  );

// ---------- binding ----------

program
  .command("bind-controller")
  .description("Bind a new controller to the gateway")
  .argument("<address>", "Modbus address for the new node", integerOption)
  .argument("<product>", "Product name (e.g. VMD-02RPS78) or id", productOption)
  .option(
    "--product-serial <number>",
    "Only bind the product with this serial number",
    integerOption
  )
  .action((address: number, product: ProductId, opts: { productSerial?: number }) =>
    session(async (_target, gateway) => {
      reportWrite(await gateway.bindController(address, product, opts.productSerial));
    })
  );

program
  .command("bind-accessory")
  .description("Bind an accessory to an already bound controller")
  .argument("<controller>", "Modbus address of the controller", integerOption)
  .argument("<address>", "Modbus address for the new node", integerOption)
  .argument("<product>", "Product name (e.g. VMN-05LM02) or id", productOption)
  .action((controller: number, address: number, product: ProductId) =>
    session(async (_target, gateway) => {
      reportWrite(await gateway.bindAccessory(controller, address, product));
    })
  );

program
  .command("unbind")
  .description("Remove a bound node")
  .argument("<address>", "Modbus address of the node", integerOption)
  .action((address: number) =>
    session(async (_target, gateway) => {
      reportWrite(await gateway.unbind(address));
    })
  );

program
  .command("bind-status")
  .description("Show the gateway's binding status")
  .action(() =>
    session(async (_target, gateway) => {
      const status = await gateway.bindStatus();
      console.log(`${enumName(BindingStatus, status) ?? "Unknown"} (${status})`);
    })
  );

await program.parseAsync();
