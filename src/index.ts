/**
 * modbus-pdu – Modbus request PDU encoding, response PDU decoding and
 * request routing for Modbus servers.
 */

// Request PDUs
export {
  FunctionCode,
  FUNCTION_CODE_NAMES,
  MAX_ADDRESS,
  MAX_REGISTER_VALUE,
  MAX_READ_BITS,
  MAX_READ_REGISTERS,
  MAX_WRITE_COILS,
  MAX_WRITE_REGISTERS,
  coilByteCount,
  packBits,
  unpackBits,
  readCoils,
  readDiscreteInputs,
  readHoldingRegisters,
  readInputRegisters,
  writeSingleCoil,
  writeSingleRegister,
  writeMultipleCoils,
  writeMultipleRegisters,
  encodeRequest,
} from "./pdu.js";

export type { ByteCountMode, EncodeOptions, Request } from "./pdu.js";

// Response PDUs
export { decodeResponse, functionCodeOrThrow, parseResponsePdu } from "./response.js";

export type { ResponsePdu, NormalResponse, ExceptionResponse } from "./response.js";

// Errors
export {
  ExceptionCode,
  MODBUS_EXCEPTION_NAMES,
  exceptionName,
  exceptionFromCode,
  ModbusError,
  IllegalFunctionError,
  IllegalDataAddressError,
  IllegalDataValueError,
  ServerDeviceFailureError,
  AcknowledgeError,
  ServerDeviceBusyError,
  MemoryParityError,
  GatewayPathUnavailableError,
  GatewayTargetDeviceFailedToRespondError,
  UnknownModbusError,
  MalformedResponseError,
  InvalidRequestError,
} from "./errors.js";

// Routing
export {
  RouteMap,
  RouteMapSealedError,
  anyValue,
  oneOf,
  toConstraint,
  matchesConstraint,
} from "./route.js";

export type {
  Constraint,
  ConstraintInput,
  Rule,
  RouteMapOptions,
  RouteMapState,
  SlaveIdScope,
} from "./route.js";

// Formatting utilities
export { toHex, parseHex, describeResponse } from "./format.js";

export type { Logger } from "./logger.js";
export { nullLogger, createConsoleLogger } from "./logger.js";
