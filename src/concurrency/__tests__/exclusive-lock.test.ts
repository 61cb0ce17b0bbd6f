import { describe, it, expect } from "vitest";
import { ExclusiveLock } from "../exclusive-lock.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("ExclusiveLock", () => {
  it("runs holders one at a time, in arrival order", async () => {
    const lock = new ExclusiveLock();
    const execution: string[] = [];

    const first = lock.run(async () => {
      execution.push("first-start");
      await sleep(30);
      execution.push("first-end");
      return 1;
    });
    const second = lock.run(async () => {
      execution.push("second-start");
      await sleep(5);
      execution.push("second-end");
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(execution).toEqual(["first-start", "first-end", "second-start", "second-end"]);
  });

  it("never has more than one holder active", async () => {
    const lock = new ExclusiveLock();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 6 }, (_, i) =>
        lock.run(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(i % 2 === 0 ? 5 : 1);
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(1);
  });

  it("propagates a holder's error and keeps serving later holders", async () => {
    const lock = new ExclusiveLock();
    const execution: string[] = [];

    const failing = lock.run(async () => {
      execution.push("failing");
      throw new Error("upstream down");
    });
    const next = lock.run(async () => {
      execution.push("next");
      return "ok";
    });

    await expect(failing).rejects.toThrow("upstream down");
    expect(await next).toBe("ok");
    expect(execution).toEqual(["failing", "next"]);
  });

  it("counts holders that are waiting or running", async () => {
    const lock = new ExclusiveLock();
    const first = lock.run(() => sleep(10));
    const second = lock.run(() => sleep(1));

    expect(lock.queued).toBe(2);
    await Promise.all([first, second]);
  });
});
