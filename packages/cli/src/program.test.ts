import { describe, it, expect, vi } from "vitest";
import { resolve } from "node:path";
import { createProgram } from "./program.js";

function handlers() {
  return {
    replica: vi.fn().mockResolvedValue(undefined),
    coordinator: vi.fn().mockResolvedValue(undefined),
  };
}

describe("createProgram", () => {
  it("registers the replica and coordinator commands", () => {
    const program = createProgram(handlers(), {});
    expect(program.name()).toBe("bidmesh");
    expect(program.commands.map((c) => c.name())).toEqual(["replica", "coordinator"]);
  });

  it("runs a replica with defaults", async () => {
    const h = handlers();
    await createProgram(h, {}).parseAsync(["replica"], { from: "user" });
    expect(h.replica).toHaveBeenCalledWith({ port: 8080, durationMs: 100_000, logPath: resolve("auction.log") });
  });

  it("takes replica flags over environment defaults", async () => {
    const h = handlers();
    const env = { BIDMESH_PORT: "9000", BIDMESH_AUCTION_DURATION: "30" };
    await createProgram(h, env).parseAsync(["replica", "--port", "8081"], { from: "user" });
    expect(h.replica).toHaveBeenCalledWith({ port: 8081, durationMs: 30_000, logPath: resolve("auction.log") });
  });

  it("runs the coordinator with defaults", async () => {
    const h = handlers();
    await createProgram(h, {}).parseAsync(["coordinator"], { from: "user" });
    expect(h.coordinator).toHaveBeenCalledWith({
      replicas: ["http://localhost:8080", "http://localhost:8081"],
      queryTimeoutMs: 2000,
      bidTimeoutMs: 10000,
      logPath: resolve("program.log"),
    });
  });

  it("reads the replica list from the environment", async () => {
    const h = handlers();
    await createProgram(h, { BIDMESH_REPLICAS: "http://r1:1,http://r2:2,http://r3:3" })
      .parseAsync(["coordinator", "--query-timeout", "500"], { from: "user" });
    expect(h.coordinator).toHaveBeenCalledWith(expect.objectContaining({
      replicas: ["http://r1:1", "http://r2:2", "http://r3:3"],
      queryTimeoutMs: 500,
    }));
  });

  it("rejects invalid configuration before starting anything", async () => {
    const h = handlers();
    await expect(createProgram(h, {}).parseAsync(["replica", "--duration", "0"], { from: "user" }))
      .rejects.toThrow('Invalid duration: "0" (must be a positive integer)');
    expect(h.replica).not.toHaveBeenCalled();
  });
});
