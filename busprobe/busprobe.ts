#!/usr/bin/env node
import { program, type Command } from "commander";
import { SerialPort } from "serialport";
import { BusConnection } from "./connection.js";
import {
  describeBusStatus,
  formatHex,
  formatRegisters,
  getErrorMessage,
  matchesUsbFilter,
  parseNumber,
  parseRegisterAssignments,
  parseUnsigned,
  toHexDump,
} from "./lib.js";
import type { Registers } from "./protocol/index.js";
import { withConnection } from "./session.js";
import { SERIAL_BAUD_RATE } from "./transport.js";

// =============================================================================
// Constants
// =============================================================================

const DEMO_REGISTERS: Registers = {
  AX: 1,
  BX: 2,
  CX: 3,
  DX: 4,
  SS: 5,
  SP: 6,
  FLAGS: 7,
  IP: 8,
  CS: 9,
  DS: 10,
  ES: 11,
  BP: 12,
  SI: 13,
  DI: 14,
};

// =============================================================================
// Connection Handling
// =============================================================================

interface ConnectionFlags {
  port?: string;
  baud: number;
  timeout?: number;
  debug?: boolean;
}

function withConnectionOptions(command: Command): Command {
  return command
    .option("-p, --port <path>", "Serial port path (auto-detect if not specified)")
    .option("-b, --baud <rate>", "Serial baud rate", parseNumber, SERIAL_BAUD_RATE)
    .option("-t, --timeout <ms>", "Reply timeout in milliseconds", parseNumber)
    .option("-d, --debug", "Dump every request and reply");
}

function openBoard(flags: ConnectionFlags): () => Promise<BusConnection> {
  return () =>
    BusConnection.open({
      port: flags.port,
      baudRate: flags.baud,
      timeout: flags.timeout,
      debug: flags.debug ?? false,
    });
}

/**
 * Validate arguments before touching the port.
 */
function parseOrExit<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    console.error(getErrorMessage(err));
    process.exit(1);
  }
}

/**
 * Register a sub-command that takes no arguments and prints one line.
 */
function simpleCommand(name: string, description: string, run: (bus: BusConnection) => Promise<string>): void {
  withConnectionOptions(program.command(name).description(description)).action(async (flags: ConnectionFlags) => {
    await withConnection(openBoard(flags), async (bus) => console.log(await run(bus)));
  });
}

// =============================================================================
// CLI Commands
// =============================================================================

program.name("busprobe").description("8088 bus-interface board CLI").version("1.0.0");

program
  .command("ports")
  .description("List serial ports, marking known boards")
  .action(async () => {
    const ports = await SerialPort.list();
    if (ports.length === 0) {
      console.log("No serial ports found.");
      return;
    }
    for (const port of ports) {
      const mark = matchesUsbFilter(port.vendorId, port.productId) ? "*" : " ";
      console.log(`${mark} ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId}, PID: ${port.productId})`);
    }
  });

simpleCommand("version", "Show firmware name and version", async (bus) => {
  const { name, version } = await bus.getVersion();
  return `${name} v${version}`;
});

simpleCommand("reset", "Reset the CPU", async (bus) => {
  await bus.reset();
  return "Reset OK";
});

simpleCommand("cycle", "Advance the CPU by one clock cycle", async (bus) => {
  await bus.cycle();
  return "Cycle OK";
});

simpleCommand("finalize", "Finish program execution", async (bus) => {
  await bus.finalize();
  return "Finalize OK";
});

simpleCommand("begin-store", "Start the register store sequence", async (bus) => {
  await bus.beginStore();
  return "Begin store OK";
});

simpleCommand("store", "Read back all registers", async (bus) => formatRegisters(await bus.storeRegisters()));

simpleCommand("address", "Read the latched bus address", async (bus) => formatHex(await bus.readAddress(), 5));

simpleCommand("status", "Read the CPU status lines", async (bus) => {
  const status = await bus.readStatus();
  return `${formatHex(status, 2)} (${describeBusStatus(status)})`;
});

simpleCommand("command", "Read the 8288 command outputs", async (bus) => formatHex(await bus.read8288Command(), 2));

simpleCommand("control", "Read the 8288 control outputs", async (bus) => formatHex(await bus.read8288Control(), 2));

simpleCommand("data-bus", "Read the data bus", async (bus) => formatHex(await bus.readDataBus(), 2));

simpleCommand("queue", "Show the prefetch queue", async (bus) => {
  const bytes = await bus.queueBytes();
  return bytes.length === 0 ? "Queue empty" : `${bytes.length} byte(s): ${toHexDump(bytes)}`;
});

simpleCommand("state", "Show the firmware program state", async (bus) => formatHex(await bus.getProgramState(), 2));

simpleCommand("last-error", "Show the firmware's last error code", async (bus) => formatHex(await bus.lastError(), 2));

simpleCommand("cycle-status", "Show the current cycle status", async (bus) => formatHex(await bus.getCycleStatus(), 2));

withConnectionOptions(
  program
    .command("load")
    .description("Load registers (unspecified registers are 0)")
    .argument("[registers...]", "Assignments such as AX=0x1234 CS=0xF000")
).action(async (assignments: string[], flags: ConnectionFlags) => {
  const registers = parseOrExit(() => parseRegisterAssignments(assignments));

  await withConnection(openBoard(flags), async (bus) => {
    await bus.loadRegisters(registers);
    console.log("Load OK");
    console.log(formatRegisters(registers));
  });
});

withConnectionOptions(
  program.command("write-data").description("Drive a byte onto the data bus").argument("<value>", "Byte value")
).action(async (value: string, flags: ConnectionFlags) => {
  const byte = parseOrExit(() => parseUnsigned(value, 8));
  await withConnection(openBoard(flags), async (bus) => {
    await bus.writeDataBus(byte);
    console.log("Write OK");
  });
});

withConnectionOptions(
  program.command("read-pin").description("Read a CPU pin").argument("<pin>", "Pin number")
).action(async (pin: string, flags: ConnectionFlags) => {
  const pinNumber = parseOrExit(() => parseUnsigned(pin, 8));
  await withConnection(openBoard(flags), async (bus) => {
    console.log(formatHex(await bus.readPin(pinNumber), 2));
  });
});

withConnectionOptions(
  program
    .command("write-pin")
    .description("Drive a CPU pin")
    .argument("<pin>", "Pin number")
    .argument("<value>", "Pin value")
).action(async (pin: string, value: string, flags: ConnectionFlags) => {
  const [pinNumber, pinValue] = parseOrExit(() => [parseUnsigned(pin, 8), parseUnsigned(value, 8)]);
  await withConnection(openBoard(flags), async (bus) => {
    await bus.writePin(pinNumber, pinValue);
    console.log("Write OK");
  });
});

withConnectionOptions(
  program.command("demo").description("Run the reference sequence: version, reset, load, cycle, read back")
).action(async (flags: ConnectionFlags) => {
  await withConnection(openBoard(flags), async (bus) => {
    console.log("busprobe - Demo");
    console.log("===============");

    const { name, version } = await bus.getVersion();
    console.log(`Version:         ${name} v${version}`);

    await bus.reset();
    console.log("Reset:           OK");

    await bus.loadRegisters(DEMO_REGISTERS);
    console.log("Load:            OK");

    await bus.cycle();
    console.log("Cycle:           OK");

    console.log(`Address:         ${formatHex(await bus.readAddress(), 5)}`);

    const status = await bus.readStatus();
    console.log(`Status:          ${formatHex(status, 2)} (${describeBusStatus(status)})`);
    console.log(`8288 command:    ${formatHex(await bus.read8288Command(), 2)}`);
    console.log(`8288 control:    ${formatHex(await bus.read8288Control(), 2)}`);

    console.log("Registers:");
    console.log(formatRegisters(await bus.storeRegisters()));
  });
});

await program.parseAsync();
