import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { createProgram } from "../src/program.js";

async function runCli(...args: string[]) {
  const printed: string[] = [];
  const errors: string[] = [];
  const program = createProgram({
    print: (line) => printed.push(line),
    writeErr: (str) => errors.push(str),
    exitOverride: true,
  });
  await program.parseAsync(args, { from: "user" });
  return { printed, errors };
}

describe("modbus-pdu CLI", () => {
  it("read-coils prints the request PDU", async () => {
    const { printed } = await runCli("read-coils", "-s", "0", "-q", "3");
    expect(printed).toEqual(["01 00 00 00 03"]);
  });

  it("read-holding accepts hex addresses", async () => {
    const { printed } = await runCli("read-holding", "-s", "0x64", "-q", "2");
    expect(printed).toEqual(["03 00 64 00 02"]);
  });

  it("write-coil takes its value through -V", async () => {
    const { printed } = await runCli("write-coil", "-a", "1", "-V", "1");
    expect(printed).toEqual(["05 00 01 ff ff"]);
  });

  it("write-holding takes its value through -V", async () => {
    const { printed } = await runCli("write-holding", "-a", "100", "-V", "0x1234");
    expect(printed).toEqual(["06 00 64 12 34"]);
  });

  it("write-coils packs coil states", async () => {
    const { printed } = await runCli(
      "write-coils", "-s", "0", "1", "0", "1", "1", "0", "0", "0", "0", "1"
    );
    expect(printed).toEqual(["0f 00 00 00 09 02 0d 01"]);
  });

  it("write-coils --legacy-byte-count adds a zero byte on multiples of 8", async () => {
    const { printed } = await runCli(
      "write-coils", "--legacy-byte-count", "-s", "0",
      "1", "0", "1", "1", "0", "0", "1", "0"
    );
    expect(printed).toEqual(["0f 00 00 00 08 02 4d 00"]);
  });

  it("write-multiple encodes registers", async () => {
    const { printed } = await runCli("write-multiple", "-s", "9", "1337", "15");
    expect(printed).toEqual(["10 00 09 00 02 04 05 39 00 0f"]);
  });

  it("decode describes an exception response", async () => {
    const { printed } = await runCli("decode", "83", "02");
    expect(printed).toEqual([
      [
        "Exception response",
        "Function code: 3 (ReadHoldingRegisters)",
        "Exception code: 2 (IllegalDataAddress)",
      ].join("\n"),
    ]);
  });

  it("--validate rejects quantities over the limit", async () => {
    await expect(
      runCli("read-input", "--validate", "-s", "0", "-q", "126")
    ).rejects.toThrow("Error: Quantity must be an integer in 1..125, got 126");
  });

  it("fails on an invalid coil state", async () => {
    await expect(runCli("write-coil", "-a", "1", "-V", "maybe")).rejects.toThrow(
      CommanderError
    );
  });

  it("prints the version only for --version", async () => {
    await expect(runCli("--version")).rejects.toMatchObject({
      code: "commander.version",
    });
  });
});
