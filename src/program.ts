/**
 * Commander program behind the modbus-pdu CLI.
 */

import { Command } from "commander";
import * as pdu from "./pdu.js";
import { describeResponse, parseCoil, parseHex, parseNumber, toHex } from "./format.js";
import { resolveLogger, type Logger } from "./logger.js";

interface CommonOptions {
  legacyByteCount: boolean;
  validate: boolean;
  verbose: boolean;
}

interface ReadOptions extends CommonOptions {
  start: number;
  quantity: number;
}

interface WriteSingleOptions extends CommonOptions {
  address: number;
  value: string;
}

interface WriteMultipleOptions extends CommonOptions {
  start: number;
}

export interface ProgramOptions {
  /** Where command results are printed. Default: console.log */
  print?: (line: string) => void;
  /** Where commander writes errors and usage. Default: process.stderr */
  writeErr?: (str: string) => void;
  /** Throw a CommanderError instead of exiting the process. Default: false */
  exitOverride?: boolean;
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--legacy-byte-count", "Use floor(n / 8) + 1 as the coil byte count", false)
    .option("--validate", "Check the request against the standard Modbus limits", false)
    .option("-v, --verbose", "Enable verbose logging", false);
}

function encodeOptions(opts: CommonOptions): pdu.EncodeOptions {
  return {
    byteCount: opts.legacyByteCount ? "legacy" : "exact",
    validate: opts.validate,
  };
}

function loggerFor(opts: { verbose: boolean }): Logger {
  return resolveLogger({ verbose: opts.verbose });
}

const readCommands: Array<{
  name: string;
  description: string;
  encode: (start: number, quantity: number, options: pdu.EncodeOptions) => Buffer;
}> = [
  { name: "read-coils", description: "Read coils (Modbus FC 1)", encode: pdu.readCoils },
  {
    name: "read-discrete-inputs",
    description: "Read discrete inputs (Modbus FC 2)",
    encode: pdu.readDiscreteInputs,
  },
  {
    name: "read-holding",
    description: "Read holding registers (Modbus FC 3)",
    encode: pdu.readHoldingRegisters,
  },
  {
    name: "read-input",
    description: "Read input registers (Modbus FC 4)",
    encode: pdu.readInputRegisters,
  },
];

export function createProgram(options: ProgramOptions = {}): Command {
  const print = options.print ?? ((line: string) => console.log(line));

  /** Run a command body, printing its result or failing the command with status 1. */
  const run = (command: Command, log: Logger, body: () => string): void => {
    let output: string;
    try {
      output = body();
    } catch (err) {
      command.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    log.debug(`Output: ${output}`);
    print(output);
  };

  const program = new Command();

  // Settings applied before the subcommands are added are inherited by them
  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.writeErr) {
    program.configureOutput({ writeErr: options.writeErr });
  }

  program
    .name("modbus-pdu")
    .description("Encode Modbus request PDUs and decode response PDUs")
    .version("1.0.0", "--version");

  // ---------- read commands ----------

  for (const { name, description, encode } of readCommands) {
    withCommonOptions(
      program
        .command(name)
        .description(description)
        .requiredOption("-s, --start <number>", "Start address (decimal or 0x hex)", parseNumber)
        .requiredOption("-q, --quantity <number>", "Number of items to read", parseNumber)
    ).action((opts: ReadOptions, command: Command) => {
      run(command, loggerFor(opts), () =>
        toHex(encode(opts.start, opts.quantity, encodeOptions(opts)))
      );
    });
  }

  // ---------- write-coil ----------

  withCommonOptions(
    program
      .command("write-coil")
      .description("Write a single coil (Modbus FC 5)")
      .requiredOption("-a, --address <number>", "Coil address (decimal or 0x hex)", parseNumber)
      .requiredOption("-V, --value <state>", "Coil state: 1/0, true/false or on/off")
  ).action((opts: WriteSingleOptions, command: Command) => {
    run(command, loggerFor(opts), () =>
      toHex(pdu.writeSingleCoil(opts.address, parseCoil(opts.value), encodeOptions(opts)))
    );
  });

  // ---------- write-holding ----------

  withCommonOptions(
    program
      .command("write-holding")
      .description("Write a single holding register (Modbus FC 6)")
      .requiredOption("-a, --address <number>", "Register address (decimal or 0x hex)", parseNumber)
      .requiredOption("-V, --value <number>", "Value to write")
  ).action((opts: WriteSingleOptions, command: Command) => {
    run(command, loggerFor(opts), () =>
      toHex(
        pdu.writeSingleRegister(opts.address, parseNumber(opts.value), encodeOptions(opts))
      )
    );
  });

  // ---------- write-coils ----------

  withCommonOptions(
    program
      .command("write-coils")
      .description("Write multiple coils (Modbus FC 15)")
      .requiredOption("-s, --start <number>", "Start address (decimal or 0x hex)", parseNumber)
      .argument("<values...>", "Coil states (space separated)")
  ).action((values: string[], opts: WriteMultipleOptions, command: Command) => {
    run(command, loggerFor(opts), () =>
      toHex(pdu.writeMultipleCoils(opts.start, values.map(parseCoil), encodeOptions(opts)))
    );
  });

  // ---------- write-multiple ----------

  withCommonOptions(
    program
      .command("write-multiple")
      .description("Write multiple holding registers (Modbus FC 16)")
      .requiredOption("-s, --start <number>", "Start address (decimal or 0x hex)", parseNumber)
      .argument("<values...>", "Values to write (space separated)")
  ).action((values: string[], opts: WriteMultipleOptions, command: Command) => {
    run(command, loggerFor(opts), () =>
      toHex(
        pdu.writeMultipleRegisters(opts.start, values.map(parseNumber), encodeOptions(opts))
      )
    );
  });

  // ---------- decode ----------

  program
    .command("decode")
    .description("Classify a response PDU as normal or exception")
    .argument("<hex...>", "Hex bytes of the PDU (e.g. 83 02)")
    .option("-v, --verbose", "Enable verbose logging", false)
    .action((hexBytes: string[], opts: { verbose: boolean }, command: Command) => {
      run(command, loggerFor(opts), () => describeResponse(parseHex(hexBytes)));
    });

  return program;
}
