import { describe, it, expect, vi } from "vitest";
import { BackgroundJobQueue } from "./job-queue";

function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe("BackgroundJobQueue", () => {
  it("never runs more jobs at once than its concurrency", async () => {
    const queue = new BackgroundJobQueue({ concurrency: 2 });
    let active = 0;
    let peak = 0;
    const job = (name: string) => ({
      name,
      run: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
      },
    });

    ["a", "b", "c", "d"].forEach((name) => queue.enqueue(job(name)));
    await queue.onIdle();

    expect(peak).toBe(2);
    expect(queue.stats()).toEqual({ pending: 0, completed: 4, failed: 0, dropped: 0 });
  });

  it("logs a failing job and keeps running the rest", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const queue = new BackgroundJobQueue();
    const ran: string[] = [];

    queue.enqueue({
      name: "pool-refill",
      detail: { topic: "Fracciones" },
      run: async () => {
        throw new Error("Request timed out");
      },
    });
    queue.enqueue({ name: "prefetch-contexts", run: async () => void ran.push("prefetch-contexts") });
    await queue.onIdle();

    expect(ran).toEqual(["prefetch-contexts"]);
    expect(queue.stats()).toMatchObject({ completed: 1, failed: 1 });
    expect(errorSpy).toHaveBeenCalledWith(
      "[job-queue] job failed",
      expect.objectContaining({ job: "pool-refill", topic: "Fracciones" })
    );
  });

  it("drops jobs once the backlog is full", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const queue = new BackgroundJobQueue({ concurrency: 1, maxPending: 2 });
    const { opened, open } = gate();
    const blocked = { name: "blocked", run: () => opened };

    expect(queue.enqueue(blocked)).toBe(true);
    expect(queue.enqueue(blocked)).toBe(true);
    expect(queue.enqueue(blocked)).toBe(false);
    expect(queue.stats()).toEqual({ pending: 2, completed: 0, failed: 0, dropped: 1 });

    open();
    await queue.onIdle();

    expect(queue.stats()).toEqual({ pending: 0, completed: 2, failed: 0, dropped: 1 });
  });

  it("waits for jobs queued by running jobs before going idle", async () => {
    const queue = new BackgroundJobQueue();
    const ran: string[] = [];

    queue.enqueue({
      name: "parent",
      run: async () => {
        ran.push("parent");
        queue.enqueue({
          name: "child",
          run: async () => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            ran.push("child");
          },
        });
      },
    });
    await queue.onIdle();

    expect(ran).toEqual(["parent", "child"]);
  });
});
