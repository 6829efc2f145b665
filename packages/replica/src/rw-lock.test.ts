import { describe, it, expect } from "vitest";
import { ReadWriteLock } from "./rw-lock.js";

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => {};
  const wait = new Promise<void>((resolve) => { open = resolve; });
  return { wait, open };
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("ReadWriteLock", () => {
  it("lets readers hold the lock together", async () => {
    const lock = new ReadWriteLock();
    const g = gate();
    const events: string[] = [];
    const r1 = lock.withRead(async () => { events.push("r1 in"); await g.wait; events.push("r1 out"); });
    const r2 = lock.withRead(() => { events.push("r2"); });
    await r2;
    expect(events).toEqual(["r1 in", "r2"]);
    expect(lock.getState().readers).toBe(1);
    g.open();
    await r1;
    expect(lock.getState()).toEqual({ readers: 0, writer: false, waiting: 0 });
  });

  it("keeps a writer out while a reader holds the lock", async () => {
    const lock = new ReadWriteLock();
    const g = gate();
    const events: string[] = [];
    const r = lock.withRead(async () => { events.push("r in"); await g.wait; events.push("r out"); });
    const w = lock.withWrite(() => { events.push("w"); });
    await tick();
    expect(events).toEqual(["r in"]);
    expect(lock.getState().waiting).toBe(1);
    g.open();
    await Promise.all([r, w]);
    expect(events).toEqual(["r in", "r out", "w"]);
  });

  it("queues readers behind a waiting writer", async () => {
    const lock = new ReadWriteLock();
    const g = gate();
    const events: string[] = [];
    const r1 = lock.withRead(async () => { events.push("r1 in"); await g.wait; events.push("r1 out"); });
    const w = lock.withWrite(() => { events.push("w"); });
    const r2 = lock.withRead(() => { events.push("r2"); });
    await tick();
    expect(events).toEqual(["r1 in"]);
    g.open();
    await Promise.all([r1, w, r2]);
    expect(events).toEqual(["r1 in", "r1 out", "w", "r2"]);
  });

  it("never interleaves two writers", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const writer = (id: string) => lock.withWrite(async () => {
      events.push(`${id} in`);
      await tick();
      events.push(`${id} out`);
    });
    await Promise.all([writer("a"), writer("b"), writer("c")]);
    expect(events).toEqual(["a in", "a out", "b in", "b out", "c in", "c out"]);
  });

  it("returns the callback's value", async () => {
    const lock = new ReadWriteLock();
    expect(await lock.withRead(() => 7)).toBe(7);
    expect(await lock.withWrite(async () => "done")).toBe("done");
  });

  it("releases the lock when the callback throws", async () => {
    const lock = new ReadWriteLock();
    await expect(lock.withWrite(() => { throw new Error("boom"); })).rejects.toThrow("boom");
    await expect(lock.withRead(async () => { throw new Error("read boom"); })).rejects.toThrow("read boom");
    expect(lock.getState()).toEqual({ readers: 0, writer: false, waiting: 0 });
    expect(await lock.withWrite(() => "still usable")).toBe("still usable");
  });
});
