/**
 * Bus-interface board connection and protocol engine.
 */

import { toHexDump } from "./lib.js";
import {
  COMMANDS,
  ConnectionClosedError,
  DeviceRejectedError,
  OutOfSyncError,
  ProtocolUsageError,
  TransportTimeoutError,
  decodeRegisters,
  decodeReply,
  encodeRegisters,
  encodeRequest,
  parseAddress,
  parseVersion,
  type CommandName,
  type Registers,
  type VersionInfo,
} from "./protocol/index.js";
import { SERIAL_BAUD_RATE, SerialTransport, findDevice, openPort, type Transport } from "./transport.js";

const DEFAULT_TIMEOUT_MS = 1000;
const RESYNC_SETTLE_MS = 110;

export type SyncState = "synced" | "resyncing";

export interface ConnectionOptions {
  /** Reply read timeout in milliseconds */
  timeout: number;
  /** Quiet period before flushing input after losing sync */
  settleDelay: number;
  /** Log every request and reply */
  debug: boolean;
  log: (message: string) => void;
}

export interface OpenOptions extends ConnectionOptions {
  /** Serial port path, auto-detected when omitted */
  port?: string;
  baudRate: number;
}

/**
 * Owns one transport and runs exactly one command exchange on it at a time.
 */
export class BusConnection {
  private readonly options: ConnectionOptions;
  private lock: Promise<unknown> = Promise.resolve();
  private closed = false;
  private state: SyncState = "synced";

  constructor(
    private transport: Transport,
    options: Partial<ConnectionOptions> = {}
  ) {
    const { timeout = DEFAULT_TIMEOUT_MS, settleDelay = RESYNC_SETTLE_MS, debug = false, log = console.error } = options;
    this.options = { timeout, settleDelay, debug, log };
  }

  /**
   * Find the board, open its serial port and wrap it.
   */
  static async open(options: Partial<OpenOptions> = {}): Promise<BusConnection> {
    const { port: manualPort, baudRate = SERIAL_BAUD_RATE, ...connectionOptions } = options;
    const portPath = await findDevice(manualPort);
    const port = await openPort(portPath, baudRate);
    return new BusConnection(new SerialTransport(port), connectionOptions);
  }

  get syncState(): SyncState {
    return this.state;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the transport once the exchanges already queued have finished.
   * Every later operation is rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.serialize(() => this.transport.close());
  }

  // ===========================================================================
  // Exchange
  // ===========================================================================

  /**
   * Send a command and return the reply payload without its status byte.
   * The reply length defaults to the command table entry.
   */
  async execute(command: CommandName, payload?: Uint8Array, replyLength?: number): Promise<Buffer> {
    const request = encodeRequest(command, payload);
    const expected = replyLength ?? COMMANDS[command].replyLength;
    if (expected === null || !Number.isInteger(expected) || expected < 1) {
      throw new ProtocolUsageError(`${command}: reply length must be given`, command);
    }
    if (this.closed) {
      throw new ConnectionClosedError(command);
    }
    return this.serialize(() => this.exchange(command, request, expected));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.lock.then(task);
    this.lock = result.catch(() => undefined);
    return result;
  }

  private async exchange(command: CommandName, request: Buffer, expected: number): Promise<Buffer> {
    const { debug, log, timeout } = this.options;

    if (debug) log(`[DEBUG] ${command} -> ${toHexDump(request)}`);
    await this.transport.write(request);

    const reply = await this.transport.readExactly(expected, timeout);
    if (debug) log(`[DEBUG] ${command} <- ${toHexDump(reply)}`);

    const result = decodeReply(reply, expected);
    switch (result.kind) {
      case "ok":
        return result.payload;
      case "short":
        throw new TransportTimeoutError(command, expected, result.received);
      case "rejected":
        if (debug) log(`[DEBUG] ${command} rejected by device`);
        throw new DeviceRejectedError(command);
      case "out-of-sync":
        await this.resync(command);
        throw new OutOfSyncError(command, result.statusByte);
    }
  }

  /**
   * Wait for the line to go quiet, then drop whatever arrived meanwhile.
   */
  private async resync(command: CommandName): Promise<void> {
    const { debug, log, settleDelay } = this.options;
    this.state = "resyncing";
    if (debug) log(`[DEBUG] ${command} out of sync, flushing after ${settleDelay} ms`);
    try {
      await new Promise((resolve) => setTimeout(resolve, settleDelay));
      await this.transport.flushInput();
    } finally {
      this.state = "synced";
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Firmware name and version number.
   */
  async getVersion(): Promise<VersionInfo> {
    return parseVersion(await this.execute("Version"));
  }

  async reset(): Promise<void> {
    await this.execute("Reset");
  }

  /**
   * Load all 14 registers.
   */
  async loadRegisters(registers: Registers): Promise<void> {
    await this.execute("Load", encodeRegisters(registers));
  }

  /**
   * Advance the CPU by one clock cycle.
   */
  async cycle(): Promise<void> {
    await this.execute("Cycle");
  }

  /**
   * Latched bus address.
   */
  async readAddress(): Promise<number> {
    return parseAddress(await this.execute("ReadAddress"));
  }

  /**
   * CPU status lines.
   */
  async readStatus(): Promise<number> {
    return this.readByte("ReadStatus");
  }

  /**
   * 8288 bus controller command outputs.
   */
  async read8288Command(): Promise<number> {
    return this.readByte("Read8288Command");
  }

  /**
   * 8288 bus controller control outputs.
   */
  async read8288Control(): Promise<number> {
    return this.readByte("Read8288Control");
  }

  async readDataBus(): Promise<number> {
    return this.readByte("ReadDataBus");
  }

  async writeDataBus(value: number): Promise<void> {
    await this.execute("WriteDataBus", Buffer.from([checkByte("WriteDataBus", "value", value)]));
  }

  async finalize(): Promise<void> {
    await this.execute("Finalize");
  }

  async beginStore(): Promise<void> {
    await this.execute("BeginStore");
  }

  /**
   * Read back all 14 registers.
   */
  async storeRegisters(): Promise<Registers> {
    return decodeRegisters(await this.execute("Store"));
  }

  /**
   * Number of bytes in the CPU prefetch queue.
   */
  async queueLength(): Promise<number> {
    return this.readByte("QueueLen");
  }

  /**
   * Contents of the prefetch queue. Asks for the queue length first so the
   * size of the reply is known before reading it; both exchanges run under
   * one hold of the lock so nothing can change the queue in between.
   */
  async queueBytes(): Promise<Buffer> {
    if (this.closed) {
      throw new ConnectionClosedError("QueueLen");
    }
    return this.serialize(async () => {
      const [length] = await this.exchange("QueueLen", encodeRequest("QueueLen"), COMMANDS.QueueLen.replyLength);
      return this.exchange("QueueBytes", encodeRequest("QueueBytes"), length + 1);
    });
  }

  async writePin(pin: number, value: number): Promise<void> {
    const payload = Buffer.from([checkByte("WritePin", "pin", pin), checkByte("WritePin", "value", value)]);
    await this.execute("WritePin", payload);
  }

  async readPin(pin: number): Promise<number> {
    return this.readByte("ReadPin", Buffer.from([checkByte("ReadPin", "pin", pin)]));
  }

  async getProgramState(): Promise<number> {
    return this.readByte("GetProgramState");
  }

  async lastError(): Promise<number> {
    return this.readByte("LastError");
  }

  async getCycleStatus(): Promise<number> {
    return this.readByte("GetCycleStatus");
  }

  private async readByte(command: CommandName, payload?: Uint8Array): Promise<number> {
    const reply = await this.execute(command, payload);
    return reply[0];
  }
}

function checkByte(command: CommandName, field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ProtocolUsageError(`${command}: ${field} out of range (0-255): ${value}`, command);
  }
  return value;
}
