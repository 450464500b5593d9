import { describe, it, expect } from "vitest";
import {
  crc16,
  getCrc,
  addCrc,
  verifyCrc,
  readHoldingRegistersPdu,
  writeSingleRegisterPdu,
  writeMultipleRegistersPdu,
  buildRtuFrame,
  buildMbapFrame,
  rtuResponseLength,
  mbapFrameLength,
  parseRtuFrame,
  parseMbapFrame,
  parseResponsePdu,
  ModbusExceptionError,
  ModbusFrameError,
} from "../src/modbus.js";

describe("CRC-16/Modbus", () => {
  it("should calculate correct CRC for known data", () => {
    // slave=1, FC=3, addr=0, qty=10
    const data = Buffer.from([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a]);
    expect(crc16(data)).toBe(0xcdc5);
  });

  it("getCrc should return 2-byte LE buffer", () => {
    const data = Buffer.from([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a]);
    const crcBuf = getCrc(data);
    expect(crcBuf.length).toBe(2);
    expect(crcBuf[0]).toBe(0xc5);
    expect(crcBuf[1]).toBe(0xcd);
  });

  it("addCrc should append CRC to data", () => {
    const withCrc = addCrc(Buffer.from([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a]));
    expect(withCrc.length).toBe(8);
    expect(withCrc[6]).toBe(0xc5);
    expect(withCrc[7]).toBe(0xcd);
  });

  it("verifyCrc should validate correct CRC", () => {
    const frame = Buffer.from([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a, 0xc5, 0xcd]);
    expect(verifyCrc(frame)).toBe(true);
  });

  it("verifyCrc should reject incorrect CRC", () => {
    const frame = Buffer.from([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a, 0x00, 0x00]);
    expect(verifyCrc(frame)).toBe(false);
  });

  it("verifyCrc should reject frames < 4 bytes", () => {
    expect(verifyCrc(Buffer.from([0x01, 0x03]))).toBe(false);
  });
});

describe("Request PDU builders", () => {
  it("readHoldingRegistersPdu builds FC 3", () => {
    const pdu = readHoldingRegistersPdu(0x0003, 5);
    expect([...pdu]).toEqual([0x03, 0x00, 0x03, 0x00, 0x05]);
  });

  it("readHoldingRegistersPdu rejects quantities above 125", () => {
    expect(() => readHoldingRegistersPdu(0, 126)).toThrow(RangeError);
    expect(() => readHoldingRegistersPdu(0, 0)).toThrow(RangeError);
  });

  it("writeSingleRegisterPdu builds FC 6", () => {
    const pdu = writeSingleRegisterPdu(40000, 0x1234);
    expect([...pdu]).toEqual([0x06, 0x9c, 0x40, 0x12, 0x34]);
  });

  it("writeMultipleRegistersPdu builds FC 16", () => {
    const pdu = writeMultipleRegistersPdu(0x0010, [0x0001, 0x0002]);
    expect(pdu[0]).toBe(0x10);
    expect(pdu.readUInt16BE(1)).toBe(0x0010);
    expect(pdu.readUInt16BE(3)).toBe(2);
    expect(pdu[5]).toBe(4);
    expect(pdu.readUInt16BE(6)).toBe(1);
    expect(pdu.readUInt16BE(8)).toBe(2);
  });

  it("writeMultipleRegistersPdu rejects an empty write", () => {
    expect(() => writeMultipleRegistersPdu(0, [])).toThrow(RangeError);
  });
});

describe("Framing", () => {
  it("buildRtuFrame prefixes the unit id and appends the CRC", () => {
    const frame = buildRtuFrame(1, readHoldingRegistersPdu(0, 10));
    expect([...frame]).toEqual([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a, 0xc5, 0xcd]);
  });

  it("buildMbapFrame writes the MBAP header", () => {
    const frame = buildMbapFrame(1, 207, readHoldingRegistersPdu(43902, 32));
    expect([...frame]).toEqual([
      0x00, 0x01, 0x00, 0x00, 0x00, 0x06, 0xcf, 0x03, 0xab, 0x7e, 0x00, 0x20,
    ]);
  });

  it("parseRtuFrame splits unit id and PDU", () => {
    const adu = parseRtuFrame(buildRtuFrame(12, writeSingleRegisterPdu(1, 2)));
    expect(adu.unitId).toBe(12);
    expect([...adu.pdu]).toEqual([0x06, 0x00, 0x01, 0x00, 0x02]);
    expect(adu.transactionId).toBeUndefined();
  });

  it("parseRtuFrame rejects a corrupted frame", () => {
    const frame = buildRtuFrame(12, writeSingleRegisterPdu(1, 2));
    frame[3] ^= 0xff;
    expect(() => parseRtuFrame(frame)).toThrow(ModbusFrameError);
  });

  it("parseMbapFrame reads the transaction id", () => {
    const adu = parseMbapFrame(buildMbapFrame(0x1234, 5, readHoldingRegistersPdu(1, 1)));
    expect(adu.transactionId).toBe(0x1234);
    expect(adu.unitId).toBe(5);
    expect(adu.pdu.length).toBe(5);
  });

  it("parseMbapFrame rejects a length mismatch", () => {
    const frame = buildMbapFrame(1, 5, readHoldingRegistersPdu(1, 1));
    expect(() => parseMbapFrame(frame.subarray(0, frame.length - 1))).toThrow(ModbusFrameError);
  });
});

describe("Response length detection", () => {
  it("rtuResponseLength waits for the byte count of a read", () => {
    expect(rtuResponseLength(Buffer.from([0x01]))).toBeNull();
    expect(rtuResponseLength(Buffer.from([0x01, 0x03]))).toBeNull();
    expect(rtuResponseLength(Buffer.from([0x01, 0x03, 0x04]))).toBe(9);
  });

  it("rtuResponseLength knows exception and write responses", () => {
    expect(rtuResponseLength(Buffer.from([0x01, 0x83]))).toBe(5);
    expect(rtuResponseLength(Buffer.from([0x01, 0x06]))).toBe(8);
    expect(rtuResponseLength(Buffer.from([0x01, 0x10]))).toBe(8);
  });

  it("rtuResponseLength rejects unsupported function codes", () => {
    expect(() => rtuResponseLength(Buffer.from([0x01, 0x2b]))).toThrow(ModbusFrameError);
  });

  it("mbapFrameLength reads the length field", () => {
    expect(mbapFrameLength(Buffer.from([0x00, 0x01, 0x00, 0x00]))).toBeNull();
    expect(mbapFrameLength(Buffer.from([0x00, 0x01, 0x00, 0x00, 0x00, 0x05, 0x01]))).toBe(11);
  });

  it("mbapFrameLength rejects a foreign protocol id", () => {
    const header = Buffer.from([0x00, 0x01, 0x00, 0x01, 0x00, 0x05, 0x01]);
    expect(() => mbapFrameLength(header)).toThrow(ModbusFrameError);
  });
});

describe("parseResponsePdu", () => {
  const readTwo = readHoldingRegistersPdu(40000, 2);

  it("returns register values for FC 3", () => {
    const pdu = Buffer.from([0x03, 0x04, 0x00, 0x0a, 0x01, 0x02]);
    expect(parseResponsePdu(pdu, readTwo)).toEqual([10, 258]);
  });

  it("throws ModbusExceptionError on an exception response", () => {
    const pdu = Buffer.from([0x83, 0x06]);
    try {
      parseResponsePdu(pdu, readTwo);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ModbusExceptionError);
      if (err instanceof ModbusExceptionError) {
        expect(err.exceptionCode).toBe(6);
        expect(err.functionCode).toBe(3);
        expect(err.message).toBe("Modbus exception: ServerDeviceBusy");
      }
    }
  });

  it("rejects a function code mismatch", () => {
    const pdu = Buffer.from([0x06, 0x9c, 0x40, 0x00, 0x01]);
    expect(() => parseResponsePdu(pdu, readTwo)).toThrow("Function code mismatch: sent 0x3, got 0x6");
  });

  it("rejects a short read", () => {
    const pdu = Buffer.from([0x03, 0x02, 0x00, 0x01]);
    expect(() => parseResponsePdu(pdu, readTwo)).toThrow("Expected 4 data bytes, got 2");
  });

  it("returns the echo of a write", () => {
    const request = writeSingleRegisterPdu(40000, 1);
    const pdu = Buffer.from([0x06, 0x9c, 0x40, 0x00, 0x01]);
    expect(parseResponsePdu(pdu, request)).toEqual([40000, 1]);
  });
});
