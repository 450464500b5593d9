/**
 * Modbus frame construction and parsing.
 *
 * Covers the subset the gateway speaks:
 *   - CRC-16/Modbus calculation
 *   - Request PDUs for function codes 3, 6 and 16
 *   - RTU (address + PDU + CRC) and MBAP (Modbus TCP header + PDU) framing
 *   - Response PDU parser with exception detection
 */

// ---------- CRC-16/Modbus lookup table ----------

const CRC_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/** Calculate CRC-16/Modbus over the given bytes. */
export function crc16(data: Buffer): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xff];
  }
  return crc;
}

/** Return a 2-byte little-endian Buffer containing the CRC. */
export function getCrc(data: Buffer): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(crc16(data), 0);
  return buf;
}

/** Append CRC-16 to the given data and return the new buffer. */
export function addCrc(data: Buffer): Buffer {
  return Buffer.concat([data, getCrc(data)]);
}

/** Verify CRC on a Modbus RTU frame. Returns true if valid. */
export function verifyCrc(frame: Buffer): boolean {
  if (frame.length < 4) return false;
  const payload = frame.subarray(0, frame.length - 2);
  const expected = frame.subarray(frame.length - 2);
  const computed = getCrc(payload);
  return computed[0] === expected[0] && computed[1] === expected[1];
}

// ---------- Function and exception codes ----------

export const FunctionCode = {
  READ_HOLDING_REGISTERS: 0x03,
  WRITE_SINGLE_REGISTER: 0x06,
  WRITE_MULTIPLE_REGISTERS: 0x10,
} as const;

export const ExceptionCode = {
  ILLEGAL_FUNCTION: 0x01,
  ILLEGAL_DATA_ADDRESS: 0x02,
  ILLEGAL_DATA_VALUE: 0x03,
  SERVER_DEVICE_FAILURE: 0x04,
  ACKNOWLEDGE: 0x05,
  SERVER_DEVICE_BUSY: 0x06,
} as const;

export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
  1: "IllegalFunction",
  2: "IllegalDataAddress",
  3: "IllegalDataValue",
  4: "ServerDeviceFailure",
  5: "Acknowledge",
  6: "ServerDeviceBusy",
};

/** Maximum number of registers a single FC 3 request may ask for. */
export const MAX_READ_QUANTITY = 125;

/** Maximum number of registers a single FC 16 request may carry. */
export const MAX_WRITE_QUANTITY = 123;

/** The device answered with an exception response. */
export class ModbusExceptionError extends Error {
  public readonly exceptionCode: number;
  public readonly functionCode: number;

  constructor(exceptionCode: number, functionCode: number) {
    const name =
      MODBUS_EXCEPTION_NAMES[exceptionCode] ??
      `UnknownException(${exceptionCode})`;
    super(`Modbus exception: ${name}`);
    this.name = "ModbusExceptionError";
    this.exceptionCode = exceptionCode;
    this.functionCode = functionCode;
  }
}

/** A response could not be parsed or did not match its request. */
export class ModbusFrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModbusFrameError";
  }
}

// ---------- Request PDU builders ----------

/** FC 3 – Read Holding Registers */
export function readHoldingRegistersPdu(
  startAddr: number,
  quantity: number
): Buffer {
  if (quantity < 1 || quantity > MAX_READ_QUANTITY) {
    throw new RangeError(`Read quantity ${quantity} out of range 1-${MAX_READ_QUANTITY}`);
  }
  const pdu = Buffer.alloc(5);
  pdu[0] = FunctionCode.READ_HOLDING_REGISTERS;
  pdu.writeUInt16BE(startAddr, 1);
  pdu.writeUInt16BE(quantity, 3);
  return pdu;
}

/** FC 6 – Write Single Register */
export function writeSingleRegisterPdu(addr: number, value: number): Buffer {
  const pdu = Buffer.alloc(5);
  pdu[0] = FunctionCode.WRITE_SINGLE_REGISTER;
  pdu.writeUInt16BE(addr, 1);
  pdu.writeUInt16BE(value, 3);
  return pdu;
}

/** FC 16 – Write Multiple Registers */
export function writeMultipleRegistersPdu(
  startAddr: number,
  values: readonly number[]
): Buffer {
  const quantity = values.length;
  if (quantity < 1 || quantity > MAX_WRITE_QUANTITY) {
    throw new RangeError(`Write quantity ${quantity} out of range 1-${MAX_WRITE_QUANTITY}`);
  }
  const byteCount = quantity * 2;
  const pdu = Buffer.alloc(6 + byteCount);
  pdu[0] = FunctionCode.WRITE_MULTIPLE_REGISTERS;
  pdu.writeUInt16BE(startAddr, 1);
  pdu.writeUInt16BE(quantity, 3);
  pdu[5] = byteCount;
  for (let i = 0; i < quantity; i++) {
    pdu.writeUInt16BE(values[i], 6 + i * 2);
  }
  return pdu;
}

// ---------- ADU framing ----------

export type Framing = "tcp" | "rtu";

export interface Adu {
  unitId: number;
  pdu: Buffer;
  /** MBAP transaction identifier; absent for RTU frames. */
  transactionId?: number;
}

/** Wrap a PDU in an RTU frame: unit id, PDU, CRC. */
export function buildRtuFrame(unitId: number, pdu: Buffer): Buffer {
  return addCrc(Buffer.concat([Buffer.from([unitId]), pdu]));
}

/** Wrap a PDU in an MBAP header (protocol id 0). */
export function buildMbapFrame(
  transactionId: number,
  unitId: number,
  pdu: Buffer
): Buffer {
  const header = Buffer.alloc(7);
  header.writeUInt16BE(transactionId & 0xffff, 0);
  header.writeUInt16BE(0, 2);
  header.writeUInt16BE(pdu.length + 1, 4);
  header[6] = unitId;
  return Buffer.concat([header, pdu]);
}

/**
 * Length of the RTU response at the start of `buffer`, or null while not
 * enough bytes have arrived to know it.
 */
export function rtuResponseLength(buffer: Buffer): number | null {
  if (buffer.length < 2) return null;
  const fc = buffer[1];
  if (fc & 0x80) return 5;
  switch (fc) {
    case FunctionCode.READ_HOLDING_REGISTERS:
      return buffer.length < 3 ? null : 5 + buffer[2];
    case FunctionCode.WRITE_SINGLE_REGISTER:
    case FunctionCode.WRITE_MULTIPLE_REGISTERS:
      return 8;
    default:
      throw new ModbusFrameError(
        `Unsupported Modbus function code: 0x${fc.toString(16)}`
      );
  }
}

/**
 * Length of the MBAP frame at the start of `buffer`, or null while the
 * header is incomplete.
 */
export function mbapFrameLength(buffer: Buffer): number | null {
  if (buffer.length < 7) return null;
  if (buffer.readUInt16BE(2) !== 0) {
    throw new ModbusFrameError("MBAP header carries a non-zero protocol id");
  }
  return 6 + buffer.readUInt16BE(4);
}

export function parseRtuFrame(frame: Buffer): Adu {
  if (!verifyCrc(frame)) {
    throw new ModbusFrameError("Modbus response CRC verification failed");
  }
  return { unitId: frame[0], pdu: frame.subarray(1, frame.length - 2) };
}

export function parseMbapFrame(frame: Buffer): Adu {
  const length = mbapFrameLength(frame);
  if (length === null || length !== frame.length) {
    throw new ModbusFrameError("MBAP frame length does not match its header");
  }
  return {
    transactionId: frame.readUInt16BE(0),
    unitId: frame[6],
    pdu: frame.subarray(7),
  };
}

// ---------- Response PDU parsing ----------

/**
 * Parse a response PDU against the request that produced it.
 *
 * FC 3 yields the register values, FC 6 the echoed `[address, value]`
 * and FC 16 the echoed `[address, quantity]`.
 */
export function parseResponsePdu(pdu: Buffer, request: Buffer): number[] {
  const requestFc = request[0];
  if (pdu.length < 2) {
    throw new ModbusFrameError(`Modbus response too short (${pdu.length} bytes)`);
  }

  const responseFc = pdu[0];
  if (responseFc === (requestFc | 0x80)) {
    throw new ModbusExceptionError(pdu[1], requestFc);
  }
  if (responseFc !== requestFc) {
    throw new ModbusFrameError(
      `Function code mismatch: sent 0x${requestFc.toString(16)}, got 0x${responseFc.toString(16)}`
    );
  }

  switch (responseFc) {
    case FunctionCode.READ_HOLDING_REGISTERS: {
      const byteCount = pdu[1];
      const expected = request.readUInt16BE(3) * 2;
      if (byteCount !== expected || pdu.length !== 2 + byteCount) {
        throw new ModbusFrameError(
          `Expected ${expected} data bytes, got ${Math.min(byteCount, pdu.length - 2)}`
        );
      }
      const values: number[] = [];
      for (let i = 0; i < byteCount / 2; i++) {
        values.push(pdu.readUInt16BE(2 + i * 2));
      }
      return values;
    }
    case FunctionCode.WRITE_SINGLE_REGISTER:
    case FunctionCode.WRITE_MULTIPLE_REGISTERS: {
      if (pdu.length !== 5) {
        throw new ModbusFrameError(`Malformed write response (${pdu.length} bytes)`);
      }
      return [pdu.readUInt16BE(1), pdu.readUInt16BE(3)];
    }
    default:
      throw new ModbusFrameError(
        `Unsupported Modbus function code: 0x${responseFc.toString(16)}`
      );
  }
}
