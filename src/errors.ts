/**
 * Errors raised by the PDU codec.
 *
 * Exception responses map onto one `ModbusError` subclass per standard
 * exception code; codes outside the standard set become
 * `UnknownModbusError` and keep their numeric value.
 */

// ---------- Modbus exception codes ----------

export enum ExceptionCode {
  IllegalFunction = 0x01,
  IllegalDataAddress = 0x02,
  IllegalDataValue = 0x03,
  ServerDeviceFailure = 0x04,
  Acknowledge = 0x05,
  ServerDeviceBusy = 0x06,
  MemoryParityError = 0x08,
  GatewayPathUnavailable = 0x0a,
  GatewayTargetDeviceFailedToRespond = 0x0b,
}

export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
  [ExceptionCode.IllegalFunction]: "IllegalFunction",
  [ExceptionCode.IllegalDataAddress]: "IllegalDataAddress",
  [ExceptionCode.IllegalDataValue]: "IllegalDataValue",
  [ExceptionCode.ServerDeviceFailure]: "ServerDeviceFailure",
  [ExceptionCode.Acknowledge]: "Acknowledge",
  [ExceptionCode.ServerDeviceBusy]: "ServerDeviceBusy",
  [ExceptionCode.MemoryParityError]: "MemoryParityError",
  [ExceptionCode.GatewayPathUnavailable]: "GatewayPathUnavailable",
  [ExceptionCode.GatewayTargetDeviceFailedToRespond]:
    "GatewayTargetDeviceFailedToRespond",
};

/** Name of an exception code, or `UnknownException(<code>)`. */
export function exceptionName(code: number): string {
  return MODBUS_EXCEPTION_NAMES[code] ?? `UnknownException(${code})`;
}

// ---------- Exception response errors ----------

export class ModbusError extends Error {
  public readonly exceptionCode: number;
  constructor(exceptionCode: number) {
    super(`Modbus exception: ${exceptionName(exceptionCode)}`);
    this.name = "ModbusError";
    this.exceptionCode = exceptionCode;
  }
}

export class IllegalFunctionError extends ModbusError {
  constructor() {
    super(ExceptionCode.IllegalFunction);
    this.name = "IllegalFunctionError";
  }
}

export class IllegalDataAddressError extends ModbusError {
  constructor() {
    super(ExceptionCode.IllegalDataAddress);
    this.name = "IllegalDataAddressError";
  }
}

export class IllegalDataValueError extends ModbusError {
  constructor() {
    super(ExceptionCode.IllegalDataValue);
    this.name = "IllegalDataValueError";
  }
}

export class ServerDeviceFailureError extends ModbusError {
  constructor() {
    super(ExceptionCode.ServerDeviceFailure);
    this.name = "ServerDeviceFailureError";
  }
}

export class AcknowledgeError extends ModbusError {
  constructor() {
    super(ExceptionCode.Acknowledge);
    this.name = "AcknowledgeError";
  }
}

export class ServerDeviceBusyError extends ModbusError {
  constructor() {
    super(ExceptionCode.ServerDeviceBusy);
    this.name = "ServerDeviceBusyError";
  }
}

export class MemoryParityError extends ModbusError {
  constructor() {
    super(ExceptionCode.MemoryParityError);
    this.name = "MemoryParityError";
  }
}

export class GatewayPathUnavailableError extends ModbusError {
  constructor() {
    super(ExceptionCode.GatewayPathUnavailable);
    this.name = "GatewayPathUnavailableError";
  }
}

export class GatewayTargetDeviceFailedToRespondError extends ModbusError {
  constructor() {
    super(ExceptionCode.GatewayTargetDeviceFailedToRespond);
    this.name = "GatewayTargetDeviceFailedToRespondError";
  }
}

export class UnknownModbusError extends ModbusError {
  constructor(exceptionCode: number) {
    super(exceptionCode);
    this.name = "UnknownModbusError";
  }
}

/** Build the typed error for an exception code taken from a response PDU. */
export function exceptionFromCode(code: number): ModbusError {
  switch (code) {
    case ExceptionCode.IllegalFunction:
      return new IllegalFunctionError();
    case ExceptionCode.IllegalDataAddress:
      return new IllegalDataAddressError();
    case ExceptionCode.IllegalDataValue:
      return new IllegalDataValueError();
    case ExceptionCode.ServerDeviceFailure:
      return new ServerDeviceFailureError();
    case ExceptionCode.Acknowledge:
      return new AcknowledgeError();
    case ExceptionCode.ServerDeviceBusy:
      return new ServerDeviceBusyError();
    case ExceptionCode.MemoryParityError:
      return new MemoryParityError();
    case ExceptionCode.GatewayPathUnavailable:
      return new GatewayPathUnavailableError();
    case ExceptionCode.GatewayTargetDeviceFailedToRespond:
      return new GatewayTargetDeviceFailedToRespondError();
    default:
      return new UnknownModbusError(code);
  }
}

// ---------- Codec errors ----------

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}
