/**
 * Modbus request PDU construction.
 *
 * A PDU is the function code followed by the request data, independent of
 * the framing (MBAP header, RTU address and CRC) a transport wraps it in.
 * Builders are provided for function codes 1-6, 15 and 16; all fields are
 * big-endian.
 */

import { InvalidRequestError } from "./errors.js";

// ---------- Function codes ----------

export enum FunctionCode {
  ReadCoils = 0x01,
  ReadDiscreteInputs = 0x02,
  ReadHoldingRegisters = 0x03,
  ReadInputRegisters = 0x04,
  WriteSingleCoil = 0x05,
  WriteSingleRegister = 0x06,
  WriteMultipleCoils = 0x0f,
  WriteMultipleRegisters = 0x10,
}

export const FUNCTION_CODE_NAMES: Record<number, string> = {
  [FunctionCode.ReadCoils]: "ReadCoils",
  [FunctionCode.ReadDiscreteInputs]: "ReadDiscreteInputs",
  [FunctionCode.ReadHoldingRegisters]: "ReadHoldingRegisters",
  [FunctionCode.ReadInputRegisters]: "ReadInputRegisters",
  [FunctionCode.WriteSingleCoil]: "WriteSingleCoil",
  [FunctionCode.WriteSingleRegister]: "WriteSingleRegister",
  [FunctionCode.WriteMultipleCoils]: "WriteMultipleCoils",
  [FunctionCode.WriteMultipleRegisters]: "WriteMultipleRegisters",
};

// ---------- Limits ----------

export const MAX_ADDRESS = 0xffff;
export const MAX_REGISTER_VALUE = 0xffff;
export const MAX_READ_BITS = 2000;
export const MAX_READ_REGISTERS = 125;
export const MAX_WRITE_COILS = 1968;
export const MAX_WRITE_REGISTERS = 123;

const COIL_ON = 0xffff;
const COIL_OFF = 0x0000;

// ---------- Options ----------

/**
 * How the byte count of a Write Multiple Coils request is computed.
 *
 * `exact` is `ceil(n / 8)`. `legacy` is `floor(n / 8) + 1`, which adds a
 * trailing zero byte whenever `n` is a multiple of 8; some deployed servers
 * were written against that output.
 */
export type ByteCountMode = "exact" | "legacy";

export interface EncodeOptions {
  /** Byte count formula for function code 15. Default: "exact" */
  byteCount?: ByteCountMode;
  /** Check addresses, quantities and values against the standard limits. Default: false */
  validate?: boolean;
}

// ---------- Request model ----------

interface ReadRequest<F extends FunctionCode> {
  functionCode: F;
  startingAddress: number;
  quantity: number;
}

export type Request =
  | ReadRequest<FunctionCode.ReadCoils>
  | ReadRequest<FunctionCode.ReadDiscreteInputs>
  | ReadRequest<FunctionCode.ReadHoldingRegisters>
  | ReadRequest<FunctionCode.ReadInputRegisters>
  | { functionCode: FunctionCode.WriteSingleCoil; address: number; value: boolean }
  | { functionCode: FunctionCode.WriteSingleRegister; address: number; value: number }
  | {
      functionCode: FunctionCode.WriteMultipleCoils;
      startingAddress: number;
      values: readonly boolean[];
    }
  | {
      functionCode: FunctionCode.WriteMultipleRegisters;
      startingAddress: number;
      values: readonly number[];
    };

// ---------- Validation ----------

function checkInteger(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidRequestError(
      `${name} must be an integer in ${min}..${max}, got ${value}`
    );
  }
}

function checkRange(startingAddress: number, quantity: number, maxQuantity: number): void {
  checkInteger("Starting address", startingAddress, 0, MAX_ADDRESS);
  checkInteger("Quantity", quantity, 1, maxQuantity);
  if (startingAddress + quantity > MAX_ADDRESS + 1) {
    throw new InvalidRequestError(
      `Address range ${startingAddress}+${quantity} exceeds ${MAX_ADDRESS}`
    );
  }
}

// ---------- Bit packing ----------

/** Number of bytes needed to carry `count` coil states. */
export function coilByteCount(count: number, mode: ByteCountMode = "exact"): number {
  return mode === "legacy" ? Math.floor(count / 8) + 1 : Math.ceil(count / 8);
}

/**
 * Pack booleans eight to a byte. The first value of each group of eight
 * lands in the least significant bit; unused bits stay 0.
 */
export function packBits(
  values: readonly boolean[],
  byteCount = coilByteCount(values.length)
): Buffer {
  const bytes = Buffer.alloc(byteCount);
  for (let i = 0; i < values.length; i++) {
    const bit = values[i] ? 1 : 0;
    bytes[Math.floor(i / 8)] |= bit << (i % 8);
  }
  return bytes;
}

/** Inverse of `packBits`: read `count` bit states, LSB first. */
export function unpackBits(bytes: Uint8Array, count: number): boolean[] {
  const values: boolean[] = [];
  for (let i = 0; i < count; i++) {
    values.push(((bytes[Math.floor(i / 8)] >> (i % 8)) & 1) === 1);
  }
  return values;
}

// ---------- Request PDU builders ----------

function buildRequest(functionCode: FunctionCode, data: Buffer): Buffer {
  const pdu = Buffer.alloc(1 + data.length);
  pdu[0] = functionCode;
  data.copy(pdu, 1);
  return pdu;
}

function buildAddressValue(
  functionCode: FunctionCode,
  address: number,
  value: number
): Buffer {
  const data = Buffer.alloc(4);
  data.writeUInt16BE(address, 0);
  data.writeUInt16BE(value, 2);
  return buildRequest(functionCode, data);
}

/** FC 1 – Read Coils */
export function readCoils(
  startingAddress: number,
  quantity: number,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) checkRange(startingAddress, quantity, MAX_READ_BITS);
  return buildAddressValue(FunctionCode.ReadCoils, startingAddress, quantity);
}

/** FC 2 – Read Discrete Inputs */
export function readDiscreteInputs(
  startingAddress: number,
  quantity: number,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) checkRange(startingAddress, quantity, MAX_READ_BITS);
  return buildAddressValue(FunctionCode.ReadDiscreteInputs, startingAddress, quantity);
}

/** FC 3 – Read Holding Registers */
export function readHoldingRegisters(
  startingAddress: number,
  quantity: number,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) checkRange(startingAddress, quantity, MAX_READ_REGISTERS);
  return buildAddressValue(FunctionCode.ReadHoldingRegisters, startingAddress, quantity);
}

/** FC 4 – Read Input Registers */
export function readInputRegisters(
  startingAddress: number,
  quantity: number,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) checkRange(startingAddress, quantity, MAX_READ_REGISTERS);
  return buildAddressValue(FunctionCode.ReadInputRegisters, startingAddress, quantity);
}

/** FC 5 – Write Single Coil. `true` is sent as 0xFFFF, `false` as 0x0000. */
export function writeSingleCoil(
  address: number,
  value: boolean,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) checkInteger("Address", address, 0, MAX_ADDRESS);
  return buildAddressValue(FunctionCode.WriteSingleCoil, address, value ? COIL_ON : COIL_OFF);
}

/** FC 6 – Write Single Register */
export function writeSingleRegister(
  address: number,
  value: number,
  options: EncodeOptions = {}
): Buffer {
  if (options.validate) {
    checkInteger("Address", address, 0, MAX_ADDRESS);
    checkInteger("Register value", value, 0, MAX_REGISTER_VALUE);
  }
  return buildAddressValue(FunctionCode.WriteSingleRegister, address, value);
}

/** FC 15 – Write Multiple Coils */
export function writeMultipleCoils(
  startingAddress: number,
  values: readonly boolean[],
  options: EncodeOptions = {}
): Buffer {
  const quantity = values.length;
  if (options.validate) checkRange(startingAddress, quantity, MAX_WRITE_COILS);

  const byteCount = coilByteCount(quantity, options.byteCount ?? "exact");
  const data = Buffer.alloc(5 + byteCount);
  data.writeUInt16BE(startingAddress, 0);
  data.writeUInt16BE(quantity, 2);
  data[4] = byteCount;
  packBits(values, byteCount).copy(data, 5);
  return buildRequest(FunctionCode.WriteMultipleCoils, data);
}

/** FC 16 – Write Multiple Registers */
export function writeMultipleRegisters(
  startingAddress: number,
  values: readonly number[],
  options: EncodeOptions = {}
): Buffer {
  const quantity = values.length;
  if (options.validate) {
    checkRange(startingAddress, quantity, MAX_WRITE_REGISTERS);
    values.forEach((value) =>
      checkInteger("Register value", value, 0, MAX_REGISTER_VALUE)
    );
  }

  const byteCount = quantity * 2;
  const data = Buffer.alloc(5 + byteCount);
  data.writeUInt16BE(startingAddress, 0);
  data.writeUInt16BE(quantity, 2);
  data[4] = byteCount;
  for (let i = 0; i < quantity; i++) {
    data.writeUInt16BE(values[i], 5 + i * 2);
  }
  return buildRequest(FunctionCode.WriteMultipleRegisters, data);
}

/** Encode any supported request through its function-code builder. */
export function encodeRequest(request: Request, options: EncodeOptions = {}): Buffer {
  switch (request.functionCode) {
    case FunctionCode.ReadCoils:
      return readCoils(request.startingAddress, request.quantity, options);
    case FunctionCode.ReadDiscreteInputs:
      return readDiscreteInputs(request.startingAddress, request.quantity, options);
    case FunctionCode.ReadHoldingRegisters:
      return readHoldingRegisters(request.startingAddress, request.quantity, options);
    case FunctionCode.ReadInputRegisters:
      return readInputRegisters(request.startingAddress, request.quantity, options);
    case FunctionCode.WriteSingleCoil:
      return writeSingleCoil(request.address, request.value, options);
    case FunctionCode.WriteSingleRegister:
      return writeSingleRegister(request.address, request.value, options);
    case FunctionCode.WriteMultipleCoils:
      return writeMultipleCoils(request.startingAddress, request.values, options);
    case FunctionCode.WriteMultipleRegisters:
      return writeMultipleRegisters(request.startingAddress, request.values, options);
  }
}
