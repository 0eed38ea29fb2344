/**
 * Byte transport between host and board.
 */

import type { Duplex } from "node:stream";
import { SerialPort } from "serialport";
import { matchesUsbFilter } from "./lib.js";

export const SERIAL_BAUD_RATE = 1000000;

/**
 * Raw byte channel consumed by the protocol engine.
 */
export interface Transport {
  write(data: Uint8Array): Promise<void>;
  /** Resolves with up to `length` bytes; fewer means the timeout elapsed first. */
  readExactly(length: number, timeoutMs: number): Promise<Buffer>;
  /** Discard everything received but not yet read. */
  flushInput(): Promise<void>;
  close(): Promise<void>;
}

type ErrorCallback = (err: Error | null) => void;

/** The parts of a serialport stream the transport relies on */
export interface SerialStream extends Duplex {
  readonly isOpen: boolean;
  flush(callback?: ErrorCallback): void;
  close(callback?: ErrorCallback): void;
}

/**
 * Transport over an open serial port. Every byte the port emits is buffered
 * until a read consumes it.
 */
export class SerialTransport implements Transport {
  private buffer = Buffer.alloc(0);
  private onBuffered: (() => void) | null = null;
  private onFailed: ((err: Error) => void) | null = null;
  private portError: Error | null = null;

  constructor(private port: SerialStream) {
    this.port.on("data", this.onData);
    this.port.on("error", this.onError);
  }

  private onData = (data: Buffer) => {
    this.buffer = Buffer.concat([this.buffer, data]);
    this.onBuffered?.();
  };

  /**
   * A port error ends the read in flight and every later read or write.
   */
  private onError = (err: Error) => {
    this.portError = err;
    this.onFailed?.(err);
  };

  /** Bytes received and not yet consumed */
  get pending(): number {
    return this.buffer.length;
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.portError) {
        reject(this.portError);
        return;
      }
      this.port.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  readExactly(length: number, timeoutMs: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      let timeoutId: NodeJS.Timeout;

      const cleanup = () => {
        clearTimeout(timeoutId);
        this.onBuffered = null;
        this.onFailed = null;
      };

      const finish = () => {
        cleanup();
        resolve(this.take(length));
      };

      if (this.portError) {
        reject(this.portError);
        return;
      }

      if (this.buffer.length >= length) {
        resolve(this.take(length));
        return;
      }

      this.onBuffered = () => {
        if (this.buffer.length >= length) finish();
      };
      this.onFailed = (err) => {
        cleanup();
        reject(err);
      };
      timeoutId = setTimeout(finish, timeoutMs);
    });
  }

  async flushInput(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.flush((err) => (err ? reject(err) : resolve()));
    });
    this.buffer = Buffer.alloc(0);
  }

  async close(): Promise<void> {
    this.port.removeListener("data", this.onData);
    this.port.removeListener("error", this.onError);
    if (!this.port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private take(length: number): Buffer {
    const out = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(out.length);
    return Buffer.from(out);
  }
}

/**
 * Find the board by scanning USB serial ports.
 * @param manualPort - Optional manual port path, auto-detects if not provided
 */
export async function findDevice(manualPort?: string): Promise<string> {
  if (manualPort) return manualPort;

  const ports = await SerialPort.list();

  for (const port of ports) {
    if (matchesUsbFilter(port.vendorId, port.productId)) {
      console.error(`Found board: ${port.path} (VID: ${port.vendorId}, PID: ${port.productId})`);
      return port.path;
    }
  }

  console.error("\nAvailable ports:");
  for (const port of ports) {
    console.error(`  ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId}, PID: ${port.productId})`);
  }

  throw new Error("No bus-interface board found. Connect the board or specify --port.");
}

/**
 * Open a serial port connection.
 */
export async function openPort(portPath: string, baudRate = SERIAL_BAUD_RATE): Promise<SerialPort> {
  const port = new SerialPort({
    path: portPath,
    baudRate,
  });

  await new Promise<void>((resolve, reject) => {
    const onOpen = () => {
      port.removeListener("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      port.removeListener("open", onOpen);
      reject(err);
    };
    port.once("open", onOpen);
    port.once("error", onError);
  });

  return port;
}
