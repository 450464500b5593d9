import { describe, it, expect, beforeEach } from "vitest";
import { RegisterClient } from "../src/client.js";
import { ChannelIOError } from "../src/channel.js";
import {
  AcknowledgeError,
  BusyError,
  ConnectionError,
  ConnectionInterruptedError,
  FailureError,
  InvalidArgumentError,
  ReadError,
  WriteError,
} from "../src/errors.js";
import { ModbusExceptionError } from "../src/modbus.js";
import { R, RS, RW, Register, StatusFlag, ValueSource, W, reg, u16, u32 } from "../src/registers.js";
import { FakeChannel } from "./fakeChannel.js";

const NODE = 12;

const speed = new Register("speed", reg(41000, u16, RS));
const oemCode = new Register("oemCode", reg(41101, u16, RW));
const serial = new Register("serial", reg(43002, u32, RW));
const command = new Register("command", reg(43004, u16, W));
const uptime = new Register("uptime", reg(41019, u32, R));

describe("RegisterClient", () => {
  let channel: FakeChannel;
  let client: RegisterClient;

  beforeEach(() => {
    channel = new FakeChannel();
    client = new RegisterClient(channel, { minCommandIntervalMs: 0 });
  });

  describe("reads", () => {
    it("connects lazily and decodes the value", async () => {
      channel.setWords(NODE, 41019, [0x0010, 0x0001]);
      const result = await client.getRegister(uptime, NODE);
      expect(result).toEqual({ value: 0x10010 });
      expect(channel.connects).toBe(1);
      expect(channel.operations).toHaveLength(1);
    });

    it("reads the status word for registers that have one", async () => {
      channel.setWords(NODE, 41000, [2]);
      channel.setWords(NODE, 51000, [0x2185]);

      const result = await client.getRegister(speed, NODE);

      expect(result.value).toBe(2);
      expect(result.freshness).toEqual({
        ageSeconds: 5 * 3600,
        flags: StatusFlag.Valid,
        source: ValueSource.Wire,
      });
      expect(channel.ops("read").map((op) => [op.address, op.count])).toEqual([
        [41000, 1],
        [51000, 1],
      ]);
    });

    it("keeps the status read of one call next to its register read", async () => {
      channel.setWords(NODE, 41000, [1]);
      channel.setWords(20, 41000, [3]);

      const [a, b] = await Promise.all([
        client.getRegister(speed, NODE),
        client.getRegister(speed, 20),
      ]);

      expect(a.value).toBe(1);
      expect(b.value).toBe(3);
      expect(channel.operations.map((op) => [op.unitId, op.address])).toEqual([
        [NODE, 41000],
        [NODE, 51000],
        [20, 41000],
        [20, 51000],
      ]);
    });

    it("reads raw words", async () => {
      channel.setWords(NODE, 100, [1, 2, 3]);
      expect(await client.readWords(100, 3, NODE)).toEqual([1, 2, 3]);
    });
  });

  describe("writes", () => {
    it("writes one word with FC 6", async () => {
      expect(await client.setRegister(oemCode, 0x1234, NODE)).toBe(true);
      expect(channel.ops("write")).toHaveLength(1);
      expect(channel.words(NODE, 41101, 1)).toEqual([0x1234]);
    });

    it("writes two words with FC 16", async () => {
      expect(await client.setRegister(serial, 0x12345678, NODE)).toBe(true);
      const [op] = channel.ops("writeMultiple");
      expect(op.values).toEqual([0x5678, 0x1234]);
    });

    it("returns false when the echo does not match", async () => {
      channel.unconfirmed.add(41101);
      expect(await client.setRegister(oemCode, 7, NODE)).toBe(false);
    });

    it("rejects values the codec cannot encode before any I/O", async () => {
      await expect(client.setRegister(oemCode, "seven", NODE)).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(channel.connects).toBe(0);
      expect(channel.operations).toHaveLength(0);
    });
  });

  describe("capability checks", () => {
    it("refuses to read a write-only register", async () => {
      await expect(client.getRegister(command, NODE)).rejects.toThrow(
        "Register command@43004 is not readable"
      );
      expect(channel.operations).toHaveLength(0);
      expect(channel.connects).toBe(0);
    });

    it("refuses to write a read-only register", async () => {
      await expect(client.setRegister(uptime, 1, NODE)).rejects.toThrow(
        "Register uptime@41019 is not writable"
      );
      expect(channel.operations).toHaveLength(0);
    });
  });

  describe("failure mapping", () => {
    it.each([
      [6, BusyError],
      [4, FailureError],
      [5, AcknowledgeError],
    ])("maps exception code %i", async (code, ErrorClass) => {
      channel.failAt(41101, new ModbusExceptionError(code, 3));
      await expect(client.getRegister(oemCode, NODE)).rejects.toBeInstanceOf(ErrorClass);
    });

    it("maps other exception codes to ReadError with the code", async () => {
      channel.failAt(41101, new ModbusExceptionError(2, 3));
      const err = await client.getRegister(oemCode, NODE).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ReadError);
      if (err instanceof ReadError) {
        expect(err.exceptionCode).toBe(2);
        expect(err.message).toBe(
          "Got Modbus exception: IllegalDataAddress while reading register 41101 (length 1) from device 12"
        );
      }
    });

    it("maps exceptions on writes to WriteError", async () => {
      channel.failAt(41101, new ModbusExceptionError(3, 6));
      const err = await client.setRegister(oemCode, 1, NODE).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(WriteError);
      if (err instanceof WriteError) {
        expect(err.exceptionCode).toBe(3);
      }
    });

    it("closes the channel on I/O failure and reconnects on the next call", async () => {
      channel.failAt(41101, new ChannelIOError("socket hang up"), { times: 1 });

      await expect(client.getRegister(oemCode, NODE)).rejects.toBeInstanceOf(
        ConnectionInterruptedError
      );
      expect(channel.connected).toBe(false);
      expect(channel.closes).toBe(1);

      await client.getRegister(oemCode, NODE);
      expect(channel.connects).toBe(2);
    });

    it("reconnects once when the link dropped between calls", async () => {
      await client.getRegister(oemCode, NODE);
      channel.drop();
      await client.getRegister(oemCode, NODE);
      expect(channel.connects).toBe(2);
    });

    it("raises ConnectionError and closes when connecting fails", async () => {
      channel.connectError = new ChannelIOError("Cannot open connection to 192.0.2.1:502: ECONNREFUSED");

      const err = await client.getRegister(oemCode, NODE).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConnectionError);
      if (err instanceof ConnectionError) {
        expect(err.message).toBe(
          "Failed to establish modbus connection: Cannot open connection to 192.0.2.1:502: ECONNREFUSED"
        );
      }
      expect(channel.closes).toBe(1);
      expect(channel.operations).toHaveLength(0);
    });
  });

  describe("pacing", () => {
    it("spaces consecutive commands by the minimum interval", async () => {
      const paced = new RegisterClient(channel, { minCommandIntervalMs: 50 });
      await paced.getRegister(oemCode, NODE);
      await paced.getRegister(oemCode, NODE);

      const [first, second] = channel.operations;
      expect(second.at - first.at).toBeGreaterThanOrEqual(49);
    });

    it("paces the status read too", async () => {
      const paced = new RegisterClient(channel, { minCommandIntervalMs: 30 });
      await paced.getRegister(speed, NODE);

      const [value, status] = channel.operations;
      expect(status.at - value.at).toBeGreaterThanOrEqual(29);
    });
  });
});
