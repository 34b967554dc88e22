/**
 * Response PDU classification and parsing.
 *
 * An exception response has the high bit of the function code set and
 * carries a one-byte exception code. Anything else is a normal response
 * whose payload is interpreted according to the request's function code.
 */

import {
  InvalidRequestError,
  MalformedResponseError,
  ModbusError,
  exceptionFromCode,
} from "./errors.js";
import { FunctionCode, unpackBits } from "./pdu.js";

const EXCEPTION_BIT = 0x80;

export interface NormalResponse {
  kind: "normal";
  functionCode: number;
  /** Payload after the function code, decoded by the caller per function code */
  data: Buffer;
}

export interface ExceptionResponse {
  kind: "exception";
  /** Function code of the failed request, high bit cleared */
  functionCode: number;
  exceptionCode: number;
  error: ModbusError;
}

export type ResponsePdu = NormalResponse | ExceptionResponse;

/**
 * Classify a response PDU.
 *
 * @throws MalformedResponseError when the PDU is shorter than 2 bytes
 */
export function decodeResponse(pdu: Buffer): ResponsePdu {
  if (pdu.length < 2) {
    throw new MalformedResponseError(
      `Response PDU must be at least 2 bytes, got ${pdu.length}`
    );
  }

  const functionCode = pdu[0];
  if ((functionCode & EXCEPTION_BIT) !== 0) {
    const exceptionCode = pdu[1];
    return {
      kind: "exception",
      functionCode: functionCode & 0x7f,
      exceptionCode,
      error: exceptionFromCode(exceptionCode),
    };
  }

  return { kind: "normal", functionCode, data: pdu.subarray(1) };
}

/**
 * Return the function code of a normal response, or throw the typed error
 * carried by an exception response.
 */
export function functionCodeOrThrow(pdu: Buffer): number {
  const response = decodeResponse(pdu);
  if (response.kind === "exception") {
    throw response.error;
  }
  return response.functionCode;
}

function requireLength(pdu: Buffer, length: number): void {
  if (pdu.length < length) {
    throw new MalformedResponseError(
      `Response PDU too short: expected ${length} bytes, got ${pdu.length}`
    );
  }
}

/**
 * Parse a response PDU against the request PDU that produced it.
 *
 * @returns Coil/discrete input states (0 or 1) for FC 1/2, register values
 *          for FC 3/4, the written value for FC 5/6, and the quantity
 *          written for FC 15/16
 */
export function parseResponsePdu(response: Buffer, request: Buffer): number[] {
  const functionCode = functionCodeOrThrow(response);
  if (functionCode !== request[0]) {
    throw new MalformedResponseError(
      `Response function code ${functionCode} does not match request function code ${request[0]}`
    );
  }

  switch (functionCode) {
    case FunctionCode.ReadCoils:
    case FunctionCode.ReadDiscreteInputs: {
      if (request.length < 5) {
        throw new InvalidRequestError(
          `Request PDU too short: expected 5 bytes, got ${request.length}`
        );
      }
      const byteCount = response[1];
      const quantity = request.readUInt16BE(3);
      if (byteCount < Math.ceil(quantity / 8)) {
        throw new MalformedResponseError(
          `Byte count ${byteCount} cannot hold ${quantity} bits`
        );
      }
      requireLength(response, 2 + byteCount);
      return unpackBits(response.subarray(2), quantity).map((bit) => (bit ? 1 : 0));
    }
    case FunctionCode.ReadHoldingRegisters:
    case FunctionCode.ReadInputRegisters: {
      const byteCount = response[1];
      requireLength(response, 2 + byteCount);
      const values: number[] = [];
      for (let i = 0; i < Math.floor(byteCount / 2); i++) {
        values.push(response.readUInt16BE(2 + i * 2));
      }
      return values;
    }
    case FunctionCode.WriteSingleCoil:
    case FunctionCode.WriteSingleRegister:
    case FunctionCode.WriteMultipleCoils:
    case FunctionCode.WriteMultipleRegisters: {
      // Echo of address followed by the value (FC 5/6) or quantity (FC 15/16)
      requireLength(response, 5);
      return [response.readUInt16BE(3)];
    }
    default:
      throw new MalformedResponseError(
        `Unsupported Modbus function code: 0x${functionCode.toString(16)}`
      );
  }
}
