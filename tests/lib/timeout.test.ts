import { afterEach, describe, it, expect, vi } from "vitest";
import { AbortedError, TimeoutError, errorMessage, withTimeout } from "../../src/lib/timeout";
import { delay, hangUntilAborted } from "../fixtures";

describe("withTimeout", () => {
  it("resolves with the operation's value", async () => {
    await expect(withTimeout(async () => "done", 100)).resolves.toBe("done");
  });

  it("passes the operation's own error through", async () => {
    await expect(withTimeout(() => Promise.reject(new Error("boom")), 100)).rejects.toThrow("boom");
  });

  it("times out and aborts the operation's signal", async () => {
    let inner: AbortSignal | undefined;
    const promise = withTimeout((signal) => {
      inner = signal;
      return hangUntilAborted<string>(signal);
    }, 20);

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toThrow("Timed out after 20ms");
    expect(inner?.aborted).toBe(true);
  });

  it("rejects with AbortedError when the parent aborts", async () => {
    const parent = new AbortController();
    const promise = withTimeout((signal) => hangUntilAborted<string>(signal), 1000, parent.signal);
    setTimeout(() => parent.abort(), 10);
    await expect(promise).rejects.toBeInstanceOf(AbortedError);
  });

  it("does not start when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;
    await expect(
      withTimeout(async () => {
        started = true;
      }, 1000, parent.signal)
    ).rejects.toThrow("Cancelled by caller");
    expect(started).toBe(false);
  });

  describe("when the operation throws before returning a promise", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("rejects with that error and leaves no timer behind", async () => {
      vi.useFakeTimers();
      const promise = withTimeout(() => {
        throw new Error("bad request");
      }, 1000);

      await expect(promise).rejects.toThrow("bad request");
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  it("ignores a late result after the deadline", async () => {
    const promise = withTimeout(async () => {
      await delay(40);
      return "late";
    }, 10);
    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
