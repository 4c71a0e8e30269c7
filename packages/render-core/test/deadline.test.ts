import { describe, expect, it } from "vitest";
import { withDeadline } from "../src/util/deadline";
import { DeadlineExceededError, OperationAbortedError } from "../src/errors";
import { never } from "./helpers/fixtures";

describe("withDeadline", () => {
  it("passes the result through", async () => {
    await expect(withDeadline("read", async () => "value", { timeoutMs: 100 })).resolves.toBe("value");
  });

  it("passes failures through", async () => {
    await expect(withDeadline("read", () => Promise.reject(new Error("down")), { timeoutMs: 100 })).rejects.toThrow(
      "down"
    );
  });

  it("rejects once the deadline passes", async () => {
    const pending = withDeadline("cache get k", () => never<string>(), { timeoutMs: 10 });

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(pending).rejects.toThrow("cache get k exceeded its 10ms deadline");
  });

  it("ignores non-positive deadlines", async () => {
    await expect(withDeadline("read", async () => 1, { timeoutMs: 0 })).resolves.toBe(1);
  });

  it("rejects when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = withDeadline("storage stat", () => never<number>(), { signal: controller.signal });

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
  });

  it("does not start an operation under an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    const pending = withDeadline(
      "storage open",
      async () => {
        started = true;
      },
      { signal: controller.signal }
    );

    await expect(pending).rejects.toThrow("storage open was aborted");
    expect(started).toBe(false);
  });
});
