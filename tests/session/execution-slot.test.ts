import { describe, test, expect } from "vitest";
import { ExecutionSlot } from "../../src/session/execution-slot.ts";
import { delay } from "../../src/utils/delay.ts";

describe("ExecutionSlot", () => {
  test("runs tasks one at a time in arrival order", async () => {
    const slot = new ExecutionSlot();
    const events: string[] = [];
    let running = 0;
    let maxRunning = 0;

    const task = (name: string, ms: number) => async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      running--;
      return name;
    };

    const results = await Promise.all([slot.run(task("a", 15)), slot.run(task("b", 1)), slot.run(task("c", 5))]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(maxRunning).toBe(1);
    expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  test("a failed task does not block the next one", async () => {
    const slot = new ExecutionSlot();
    const failed = slot.run(async () => {
      throw new Error("boom");
    });
    const next = slot.run(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  test("reports queued work", async () => {
    const slot = new ExecutionSlot();
    expect(slot.busy).toBe(false);

    const first = slot.run(() => delay(5));
    const second = slot.run(() => delay(5));
    expect(slot.busy).toBe(true);
    expect(slot.size).toBe(2);

    await Promise.all([first, second]);
    expect(slot.busy).toBe(false);
    expect(slot.size).toBe(0);
  });
});
