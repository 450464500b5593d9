import { describe, it, expect } from "vitest";
import { MIN_COMMAND_INTERVAL_MS } from "../src/client.js";
import { DEFAULT_SERIAL_PATH, createChannel, createClient } from "../src/config.js";
import { SerialChannel } from "../src/serial.js";
import { TcpChannel } from "../src/tcp.js";

describe("createChannel", () => {
  it("builds a TCP channel with MBAP framing", () => {
    const channel = createChannel({ type: "tcp", host: "192.0.2.10", port: 1502, timeout: 500 });
    expect(channel).toBeInstanceOf(TcpChannel);
    if (channel instanceof TcpChannel) {
      expect(channel.description).toBe("192.0.2.10:1502");
      expect(channel.timeout).toBe(500);
      expect(channel.framing).toBe("tcp");
    }
    expect(channel.connected).toBe(false);
  });

  it("defaults TCP to port 502", () => {
    const channel = createChannel({ type: "tcp", host: "192.0.2.10" });
    expect(channel).toBeInstanceOf(TcpChannel);
    if (channel instanceof TcpChannel) {
      expect(channel.port).toBe(502);
    }
  });

  it("builds a serial channel with the gateway's line settings", () => {
    const channel = createChannel({ type: "serial" });
    expect(channel).toBeInstanceOf(SerialChannel);
    if (channel instanceof SerialChannel) {
      expect(channel.path).toBe(DEFAULT_SERIAL_PATH);
      expect(channel.baudRate).toBe(19200);
      expect(channel.parity).toBe("even");
      expect(channel.stopBits).toBe(1);
      expect(channel.framing).toBe("rtu");
    }
  });

  it("allows RTU framing over TCP", () => {
    const channel = createChannel({ type: "tcp", host: "192.0.2.10", framing: "rtu" });
    expect(channel).toBeInstanceOf(TcpChannel);
    if (channel instanceof TcpChannel) {
      expect(channel.framing).toBe("rtu");
    }
  });
});

describe("createClient", () => {
  it("wraps the channel with the default pacing", () => {
    const client = createClient({ type: "serial", path: "/dev/ttyUSB1" });
    expect(client.channel).toBeInstanceOf(SerialChannel);
    expect(client.minCommandIntervalMs).toBe(MIN_COMMAND_INTERVAL_MS);
    expect(client.connected).toBe(false);
  });

  it("takes a custom interval", () => {
    const client = createClient({ type: "tcp", host: "192.0.2.10" }, { minCommandIntervalMs: 25 });
    expect(client.minCommandIntervalMs).toBe(25);
  });
});
