import { describe, it, expect } from "vitest";
import { WorkerPool } from "../apply/pool.js";

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe("WorkerPool", () => {
  it("queues jobs beyond the bound and reports its load", async () => {
    const pool = new WorkerPool(1);
    const first = gate();
    const ran: string[] = [];

    pool.submit("a", async () => {
      await first.wait;
      ran.push("a");
    });
    pool.submit("b", async () => {
      ran.push("b");
    });

    expect(pool.stats).toEqual({ active: 1, queued: 1, max: 1 });
    first.open();
    await pool.onIdle();

    expect(ran).toEqual(["a", "b"]);
    expect(pool.stats).toEqual({ active: 0, queued: 0, max: 1 });
  });

  it("drops queued jobs on cancel and lets running ones finish", async () => {
    const pool = new WorkerPool(1);
    const first = gate();
    const ran: string[] = [];

    pool.submit("a", async () => {
      await first.wait;
      ran.push("a");
    });
    pool.submit("b", async () => {
      ran.push("b");
    });

    expect(pool.cancelPending()).toEqual(["b"]);
    first.open();
    await pool.onIdle();

    expect(ran).toEqual(["a"]);
  });

  it("rejects a non-positive bound", () => {
    expect(() => new WorkerPool(0)).toThrow("maxConcurrency must be a positive integer, got 0");
  });
});
