import { describe, it, expect } from "vitest";
import { InProcessRefillLock } from "./refill-lock";

describe("InProcessRefillLock", () => {
  it("grants a key to one holder until it is released", async () => {
    const lock = new InProcessRefillLock();

    expect(await lock.tryAcquire("exercise_pool:a")).toBe(true);
    expect(await lock.tryAcquire("exercise_pool:a")).toBe(false);
    expect(await lock.tryAcquire("exercise_pool:b")).toBe(true);

    await lock.release("exercise_pool:a");

    expect(await lock.tryAcquire("exercise_pool:a")).toBe(true);
  });
});
