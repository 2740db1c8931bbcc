import { getEventListeners } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { WorkerPool } from "../src/lib/pool.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("pool", () => {
  it("spawns workers lazily", async () => {
    const pool = new WorkerPool({ max: 4 });
    expect(pool.size).toBe(0);

    const gate = deferred();
    await pool.add(() => gate.promise);
    expect(pool.size).toBe(1);

    gate.resolve();
    await pool.stop();
    expect(pool.size).toBe(0);
  });

  it("never runs more tasks at once than max", async () => {
    const pool = new WorkerPool({ max: 3 });
    let active = 0;
    let maxActive = 0;
    let ran = 0;

    const task = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(5);
      active -= 1;
      ran += 1;
    };

    const accepted = await Promise.all(
      Array.from({ length: 10 }, () => pool.add(task))
    );
    await pool.stop();

    expect(accepted.every(Boolean)).toBe(true);
    expect(ran).toBe(10);
    expect(maxActive).toBe(3);
  });

  it("makes add wait while every worker is busy", async () => {
    const pool = new WorkerPool({ max: 1 });
    const gate = deferred();
    expect(await pool.add(() => gate.promise)).toBe(true);

    let accepted: boolean | undefined;
    const pending = pool.add(() => {}).then((value) => {
      accepted = value;
    });

    await sleep(5);
    expect(accepted).toBeUndefined();

    gate.resolve();
    await pending;
    expect(accepted).toBe(true);
    await pool.stop();
  });

  it("reuses an idle worker instead of spawning", async () => {
    const pool = new WorkerPool({ max: 4 });
    await pool.add(() => {});
    await sleep(0);
    await pool.add(() => {});
    expect(pool.size).toBe(1);
    await pool.stop();
  });

  it("drops tasks added after stop", async () => {
    const pool = new WorkerPool({ max: 2 });
    await pool.stop();

    const task = vi.fn();
    expect(await pool.add(task)).toBe(false);
    expect(task).not.toHaveBeenCalled();
  });

  it("drops a waiting add when the pool stops", async () => {
    const pool = new WorkerPool({ max: 1 });
    const gate = deferred();
    await pool.add(() => gate.promise);

    const task = vi.fn();
    const pending = pool.add(task);
    const stopped = pool.stop();

    expect(await pending).toBe(false);
    gate.resolve();
    await stopped;
    expect(task).not.toHaveBeenCalled();
  });

  it("abandons a waiting add when the signal fires", async () => {
    const controller = new AbortController();
    const pool = new WorkerPool({ max: 1, signal: controller.signal });
    const gate = deferred();
    await pool.add(() => gate.promise);

    const task = vi.fn();
    const pending = pool.add(task);
    controller.abort();

    expect(await pending).toBe(false);
    gate.resolve();
    await pool.waitOnStop();
    expect(task).not.toHaveBeenCalled();
    expect(pool.isStopped).toBe(true);
  });

  it("releases the caller's signal once stopped", async () => {
    const controller = new AbortController();
    const pools = [1, 2, 3].map(
      () => new WorkerPool({ max: 1, signal: controller.signal })
    );
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(3);

    await Promise.all(pools.map((pool) => pool.stop()));
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("stop waits for running tasks to finish", async () => {
    const pool = new WorkerPool({ max: 2 });
    let finished = false;
    await pool.add(async () => {
      await sleep(10);
      finished = true;
    });

    await pool.stop();
    expect(finished).toBe(true);
  });

  it("waitOnStop resolves once a later stop completes", async () => {
    const pool = new WorkerPool({ max: 1 });
    let done = false;
    const waiting = pool.waitOnStop().then(() => {
      done = true;
    });

    await sleep(1);
    expect(done).toBe(false);

    await pool.stop();
    await waiting;
    expect(done).toBe(true);
  });

  it("keeps serving after a task throws", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const pool = new WorkerPool({ max: 1 });
    const task = vi.fn();

    await pool.add(() => {
      throw new Error("boom");
    });
    await pool.add(task);
    await pool.stop();

    expect(task).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith("Worker task failed:", new Error("boom"));
    errors.mockRestore();
  });
});
