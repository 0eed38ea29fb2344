import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { BusConnection } from "./connection.js";
import { withConnection } from "./session.js";
import type { Transport } from "./transport.js";

/**
 * Answers every read with a success status; close fails when told to.
 */
class StubTransport implements Transport {
  closed = false;

  constructor(private closeError?: Error) {}

  async write(): Promise<void> {}

  async readExactly(length: number): Promise<Buffer> {
    return Buffer.alloc(length, 0x01);
  }

  async flushInput(): Promise<void> {}

  async close(): Promise<void> {
    if (this.closeError) throw this.closeError;
    this.closed = true;
  }
}

describe("withConnection", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("runs the command and closes the connection", async () => {
    const transport = new StubTransport();
    const fn = vi.fn(async (bus: BusConnection) => bus.reset());

    await withConnection(async () => new BusConnection(transport), fn);

    expect(fn).toHaveBeenCalledOnce();
    expect(transport.closed).toBe(true);
    expect(console.error).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("reports a failing command and still closes", async () => {
    const transport = new StubTransport();

    await withConnection(
      async () => new BusConnection(transport),
      async () => {
        throw new Error("no reply");
      }
    );

    expect(console.error).toHaveBeenCalledWith("Error: no reply");
    expect(process.exitCode).toBe(1);
    expect(transport.closed).toBe(true);
  });

  it("reports a failing open without closing anything", async () => {
    const fn = vi.fn();

    await withConnection(async () => {
      throw new Error("No bus-interface board found. Connect the board or specify --port.");
    }, fn);

    expect(fn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith("Error: No bus-interface board found. Connect the board or specify --port.");
    expect(process.exitCode).toBe(1);
  });

  it("reports a failing close instead of rejecting", async () => {
    const transport = new StubTransport(new Error("port busy"));

    await expect(withConnection(async () => new BusConnection(transport), async () => {})).resolves.toBeUndefined();

    expect(console.error).toHaveBeenCalledWith("Error: port busy");
    expect(process.exitCode).toBe(1);
  });
});
