/**
 * Open-use-close lifecycle shared by the CLI commands.
 */

import type { BusConnection } from "./connection.js";
import { getErrorMessage } from "./lib.js";

function report(err: unknown): void {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exitCode = 1;
}

/**
 * Open the board, run fn against it and always close the port afterwards.
 * Errors, including a failing close, are printed and turn into exit status 1.
 */
export async function withConnection(
  open: () => Promise<BusConnection>,
  fn: (bus: BusConnection) => Promise<void>
): Promise<void> {
  let bus: BusConnection | undefined;
  try {
    bus = await open();
    await fn(bus);
  } catch (err) {
    report(err);
  } finally {
    await bus?.close().catch(report);
  }
}
