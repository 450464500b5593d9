import { describe, it, expect, beforeAll, afterAll } from "vitest";
import net from "node:net";
import { ChannelClosedError, ChannelIOError } from "../src/channel.js";
import { RegisterClient } from "../src/client.js";
import { ReadError } from "../src/errors.js";
import { ModbusExceptionError } from "../src/modbus.js";
import { R, Register, reg, u32 } from "../src/registers.js";
import { TcpChannel } from "../src/tcp.js";

const EXCEPTION_FROM = 60000;
const SILENT_ADDRESS = 59999;
const SPLIT_ADDRESS = 500;

/**
 * Mock gateway speaking Modbus TCP.
 *
 * Holding registers read as 100 + offset, writes are echoed, addresses
 * from 60000 answer with IllegalDataAddress and 59999 never answers.
 */
function createMockGateway(sockets: Set<net.Socket>): net.Server {
  return net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("data", (data: Buffer) => {
      const transactionId = data.readUInt16BE(0);
      const unitId = data[6];
      const functionCode = data[7];
      const address = data.readUInt16BE(8);
      const quantity = data.readUInt16BE(10);

      if (address === SILENT_ADDRESS) return;

      let pdu: Buffer;
      if (address >= EXCEPTION_FROM) {
        pdu = Buffer.from([functionCode | 0x80, 0x02]);
      } else if (functionCode === 0x03) {
        pdu = Buffer.alloc(2 + quantity * 2);
        pdu[0] = functionCode;
        pdu[1] = quantity * 2;
        for (let i = 0; i < quantity; i++) {
          pdu.writeUInt16BE(100 + i, 2 + i * 2);
        }
      } else if (functionCode === 0x06 || functionCode === 0x10) {
        pdu = Buffer.from(data.subarray(7, 12));
      } else {
        pdu = Buffer.from([functionCode | 0x80, 0x01]);
      }

      const frame = Buffer.alloc(7 + pdu.length);
      frame.writeUInt16BE(transactionId, 0);
      frame.writeUInt16BE(0, 2);
      frame.writeUInt16BE(pdu.length + 1, 4);
      frame[6] = unitId;
      pdu.copy(frame, 7);

      if (address === SPLIT_ADDRESS) {
        socket.write(frame.subarray(0, 5));
        setTimeout(() => socket.write(frame.subarray(5)), 20);
      } else {
        socket.write(frame);
      }
    });
  });
}

function listeningPort(server: net.Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Mock gateway is not listening on TCP");
  }
  return address.port;
}

describe("TcpChannel", () => {
  const sockets = new Set<net.Socket>();
  let server: net.Server;
  let port: number;

  beforeAll(
    () =>
      new Promise<void>((resolve) => {
        server = createMockGateway(sockets);
        server.listen(0, "127.0.0.1", () => {
          port = listeningPort(server);
          resolve();
        });
      })
  );

  afterAll(
    () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      })
  );

  async function withChannel(
    run: (channel: TcpChannel) => Promise<void>,
    timeout = 2000
  ): Promise<void> {
    const channel = new TcpChannel("127.0.0.1", { port, timeout });
    await channel.connect();
    try {
      await run(channel);
    } finally {
      await channel.close();
    }
  }

  it("connects and disconnects", async () => {
    const channel = new TcpChannel("127.0.0.1", { port });
    expect(channel.description).toBe(`127.0.0.1:${port}`);
    await channel.connect();
    expect(channel.connected).toBe(true);
    await channel.close();
    expect(channel.connected).toBe(false);
  });

  it("reads holding registers", async () => {
    await withChannel(async (channel) => {
      expect(await channel.readHoldingRegisters(40000, 4, 207)).toEqual([100, 101, 102, 103]);
    });
  });

  it("reassembles a response that arrives in pieces", async () => {
    await withChannel(async (channel) => {
      expect(await channel.readHoldingRegisters(SPLIT_ADDRESS, 2, 12)).toEqual([100, 101]);
    });
  });

  it("returns the echo of single and multiple writes", async () => {
    await withChannel(async (channel) => {
      expect(await channel.writeRegister(41101, 0x1234, 207)).toEqual([41101, 0x1234]);
      expect(await channel.writeRegisters(43000, [0xc892, 0x0001], 207)).toEqual([43000, 2]);
    });
  });

  it("raises exception responses", async () => {
    await withChannel(async (channel) => {
      const err = await channel.readHoldingRegisters(EXCEPTION_FROM, 1, 207).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ModbusExceptionError);
      if (err instanceof ModbusExceptionError) {
        expect(err.exceptionCode).toBe(2);
      }
    });
  });

  it("times out when the gateway stays silent", async () => {
    await withChannel(async (channel) => {
      await expect(channel.readHoldingRegisters(SILENT_ADDRESS, 1, 207)).rejects.toThrow(
        `Timeout waiting for response from 127.0.0.1:${port}`
      );
    }, 200);
  });

  it("refuses requests while closed", async () => {
    const channel = new TcpChannel("127.0.0.1", { port });
    await expect(channel.readHoldingRegisters(40000, 1, 207)).rejects.toBeInstanceOf(
      ChannelClosedError
    );
  });

  it("raises ChannelIOError when nothing listens", async () => {
    const idle = net.createServer();
    const idlePort = await new Promise<number>((resolve) => {
      idle.listen(0, "127.0.0.1", () => resolve(listeningPort(idle)));
    });
    await new Promise<void>((resolve) => idle.close(() => resolve()));

    const channel = new TcpChannel("127.0.0.1", { port: idlePort, timeout: 1000 });
    await expect(channel.connect()).rejects.toBeInstanceOf(ChannelIOError);
    expect(channel.connected).toBe(false);
  });

  it("carries register reads through the client", async () => {
    const client = new RegisterClient(new TcpChannel("127.0.0.1", { port }));
    const uptime = new Register("uptime", reg(41019, u32, R));
    try {
      // Words 100 and 101, low word first.
      expect(await client.getRegister(uptime, 207)).toEqual({ value: 101 * 0x10000 + 100 });
      await expect(
        client.getRegister(new Register("far", reg(EXCEPTION_FROM, u32, R)), 207)
      ).rejects.toBeInstanceOf(ReadError);
    } finally {
      await client.close();
    }
  });
});
