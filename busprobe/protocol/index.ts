/**
 * Bus-interface board protocol module - command table, framing and errors.
 */

export { COMMAND_NAMES, REGISTER_NAMES, STATUS_OK, STATUS_FAILED } from "./types.js";
export type { CommandName, CommandSpec, RegisterName, Registers, VersionInfo } from "./types.js";
export { COMMANDS } from "./commands.js";
export {
  REGISTERS_SIZE,
  encodeRequest,
  decodeReply,
  encodeRegisters,
  decodeRegisters,
  parseVersion,
  parseAddress,
  type ReplyResult,
} from "./packet.js";
export {
  BusError,
  ProtocolUsageError,
  TransportTimeoutError,
  DeviceRejectedError,
  OutOfSyncError,
  ConnectionClosedError,
} from "./errors.js";
