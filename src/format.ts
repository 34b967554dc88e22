/**
 * Human-readable rendering of PDUs for the command line.
 */

import { exceptionName } from "./errors.js";
import { FUNCTION_CODE_NAMES } from "./pdu.js";
import { decodeResponse } from "./response.js";

/** Render bytes as space separated lowercase hex, e.g. "01 00 00 00 03". */
export function toHex(data: Buffer): string {
  return data.toString("hex").replace(/(..)(?!$)/g, "$1 ");
}

/**
 * Parse hex bytes given as one string or an array of strings
 * (e.g. ["83", "02"] or "8302"). Whitespace is ignored.
 */
export function parseHex(hexBytes: string | string[]): Buffer {
  const hexString = (Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes)
    .replace(/\s+/g, "");
  if (!/^([0-9a-fA-F]{2})*$/.test(hexString)) {
    throw new Error(`Invalid hex input: ${hexString}`);
  }
  return Buffer.from(hexString, "hex");
}

function functionCodeLabel(code: number): string {
  return `${code} (${FUNCTION_CODE_NAMES[code] ?? "Unknown"})`;
}

/** Describe a response PDU, one field per line. */
export function describeResponse(pdu: Buffer): string {
  const response = decodeResponse(pdu);
  const lines: string[] = [];

  if (response.kind === "exception") {
    lines.push("Exception response");
    lines.push(`Function code: ${functionCodeLabel(response.functionCode)}`);
    lines.push(
      `Exception code: ${response.exceptionCode} (${exceptionName(response.exceptionCode)})`
    );
  } else {
    lines.push("Normal response");
    lines.push(`Function code: ${functionCodeLabel(response.functionCode)}`);
    lines.push(`Data: ${toHex(response.data)}`);
  }

  return lines.join("\n");
}

// ---------- Argument parsing ----------

/** Parse a decimal or 0x-prefixed hex integer. */
export function parseNumber(value: string): number {
  const trimmed = value.trim();
  if (!/^(0x[0-9a-f]+|\d+)$/i.test(trimmed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return /^0x/i.test(trimmed)
    ? parseInt(trimmed.slice(2), 16)
    : parseInt(trimmed, 10);
}

const COIL_WORDS = new Map<string, boolean>([
  ["1", true],
  ["true", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["off", false],
]);

/** Parse a coil state: 1/0, true/false or on/off. */
export function parseCoil(value: string): boolean {
  const state = COIL_WORDS.get(value.trim().toLowerCase());
  if (state === undefined) {
    throw new Error(`Not a coil state: ${value}`);
  }
  return state;
}
