import { describe, it, expect } from "vitest";
import { SerialExecutor } from "../../src/utils/serial.js";
import { deferred } from "../helpers/fakes.js";

describe("SerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const gate = deferred<void>();
    const events: string[] = [];

    const first = executor.run(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = executor.run(() => {
      events.push("second");
      return 2;
    });

    expect(executor.size).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(executor.size).toBe(0);
  });

  it("keeps going after a task fails", async () => {
    const executor = new SerialExecutor();

    const failed = executor.run(async () => {
      throw new Error("boom");
    });
    const next = executor.run(async () => "still running");

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("still running");
  });

  it("idle resolves after everything submitted so far", async () => {
    const executor = new SerialExecutor();
    let done = false;
    void executor.run(async () => {
      await new Promise((r) => setTimeout(r, 10));
      done = true;
    });

    await executor.idle();
    expect(done).toBe(true);
  });
});
