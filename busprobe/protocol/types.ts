/**
 * Protocol types for bus-interface board communication.
 */

/** Commands understood by the board firmware, in opcode order */
export const COMMAND_NAMES = [
  "None",
  "Version",
  "Reset",
  "Load",
  "Cycle",
  "ReadAddress",
  "ReadStatus",
  "Read8288Command",
  "Read8288Control",
  "ReadDataBus",
  "WriteDataBus",
  "Finalize",
  "BeginStore",
  "Store",
  "QueueLen",
  "QueueBytes",
  "WritePin",
  "ReadPin",
  "GetProgramState",
  "LastError",
  "GetCycleStatus",
  "Invalid",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

/** Fixed wire shape of a single command */
export interface CommandSpec {
  opcode: number;
  /** Outbound payload bytes following the opcode */
  payloadLength: number;
  /** Reply bytes including the trailing status byte; null when it depends on earlier state */
  replyLength: number | null;
}

/** CPU registers in the order they travel on the wire */
export const REGISTER_NAMES = [
  "AX",
  "BX",
  "CX",
  "DX",
  "SS",
  "SP",
  "FLAGS",
  "IP",
  "CS",
  "DS",
  "ES",
  "BP",
  "SI",
  "DI",
] as const;

export type RegisterName = (typeof REGISTER_NAMES)[number];

/** Full register snapshot transferred by Load and Store */
export type Registers = Record<RegisterName, number>;

/** Reply to the Version command */
export interface VersionInfo {
  name: string;
  version: number;
}

/** Trailing status byte values */
export const STATUS_OK = 0x01;
export const STATUS_FAILED = 0x00;
