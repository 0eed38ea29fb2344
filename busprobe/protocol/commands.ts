/**
 * Command table: opcode, outbound payload length and reply length per command.
 */

import type { CommandName, CommandSpec } from "./types.js";

export const COMMANDS = {
  None: { opcode: 0x00, payloadLength: 0, replyLength: 1 },
  Version: { opcode: 0x01, payloadLength: 0, replyLength: 9 },
  Reset: { opcode: 0x02, payloadLength: 0, replyLength: 1 },
  Load: { opcode: 0x03, payloadLength: 28, replyLength: 1 },
  Cycle: { opcode: 0x04, payloadLength: 0, replyLength: 1 },
  ReadAddress: { opcode: 0x05, payloadLength: 0, replyLength: 4 },
  ReadStatus: { opcode: 0x06, payloadLength: 0, replyLength: 2 },
  Read8288Command: { opcode: 0x07, payloadLength: 0, replyLength: 2 },
  Read8288Control: { opcode: 0x08, payloadLength: 0, replyLength: 2 },
  ReadDataBus: { opcode: 0x09, payloadLength: 0, replyLength: 2 },
  WriteDataBus: { opcode: 0x0a, payloadLength: 1, replyLength: 1 },
  Finalize: { opcode: 0x0b, payloadLength: 0, replyLength: 1 },
  BeginStore: { opcode: 0x0c, payloadLength: 0, replyLength: 1 },
  Store: { opcode: 0x0d, payloadLength: 0, replyLength: 29 },
  QueueLen: { opcode: 0x0e, payloadLength: 0, replyLength: 2 },
  // Reply carries the current queue contents; see BusConnection.queueBytes
  QueueBytes: { opcode: 0x0f, payloadLength: 0, replyLength: null },
  WritePin: { opcode: 0x10, payloadLength: 2, replyLength: 1 },
  ReadPin: { opcode: 0x11, payloadLength: 1, replyLength: 2 },
  GetProgramState: { opcode: 0x12, payloadLength: 0, replyLength: 2 },
  LastError: { opcode: 0x13, payloadLength: 0, replyLength: 2 },
  GetCycleStatus: { opcode: 0x14, payloadLength: 0, replyLength: 2 },
  Invalid: { opcode: 0x15, payloadLength: 0, replyLength: 1 },
} as const satisfies Record<CommandName, CommandSpec>;

