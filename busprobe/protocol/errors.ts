/**
 * Errors raised by the protocol engine.
 */

import type { CommandName } from "./types.js";

export class BusError extends Error {
  constructor(
    message: string,
    readonly command?: CommandName
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Caller handed over a payload or argument the command cannot carry. Nothing was sent. */
export class ProtocolUsageError extends BusError {}

/** Reply was shorter than the command's fixed reply length when the read timed out. */
export class TransportTimeoutError extends BusError {
  constructor(
    command: CommandName,
    readonly expected: number,
    readonly received: number
  ) {
    super(`${command}: expected ${expected} reply bytes, received ${received}`, command);
  }
}

/** Device answered with the failure status byte. */
export class DeviceRejectedError extends BusError {
  constructor(command: CommandName) {
    super(`${command}: rejected by device`, command);
  }
}

/** Trailing status byte was neither success nor failure; the input has been flushed. */
export class OutOfSyncError extends BusError {
  constructor(
    command: CommandName,
    readonly statusByte: number
  ) {
    super(`${command}: out of sync (status byte 0x${statusByte.toString(16).padStart(2, "0")})`, command);
  }
}

export class ConnectionClosedError extends BusError {
  constructor(command?: CommandName) {
    super(command ? `${command}: connection is closed` : "Connection is closed", command);
  }
}
