import { describe, it, expect } from "vitest";
import { createFileLock } from "./file-lock.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("file lock", () => {
  it("runs operations one at a time in call order", async () => {
    const lock = createFileLock();
    const log: string[] = [];
    let releaseFirst: () => void = () => {};

    const first = lock.run(async () => {
      log.push("first:start");
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      log.push("first:end");
      return 1;
    });
    const second = lock.run(async () => {
      log.push("second");
      return 2;
    });

    await tick();
    expect(log).toEqual(["first:start"]);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps going after a failed operation", async () => {
    const lock = createFileLock();

    const failing = lock.run(async () => {
      throw new Error("EACCES");
    });
    const next = lock.run(async () => "ok");

    await expect(failing).rejects.toThrow("EACCES");
    await expect(next).resolves.toBe("ok");
  });
});
