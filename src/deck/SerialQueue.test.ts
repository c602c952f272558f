import { SerialQueue } from "./SerialQueue";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("runs tasks one at a time in call order", async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = queue.run(async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);
    expect(queue.size).toBe(2);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(queue.size).toBe(0);
  });

  it("returns each task's own result", async () => {
    const queue = new SerialQueue();
    const [a, b] = await Promise.all([queue.run(async () => 1), queue.run(async () => "two")]);
    expect(a).toBe(1);
    expect(b).toBe("two");
  });

  it("reports a rejection to its caller and keeps running later tasks", async () => {
    const queue = new SerialQueue();
    const failing = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    await expect(queue.idle()).resolves.toBeUndefined();
  });
});
