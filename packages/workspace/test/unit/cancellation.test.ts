import { describe, test, expect, vi } from "vitest";

import { CancellationSource, checkpoint, LinkedCancellationSource, NEVER_CANCELLED } from "../../src/cancellation.js";
import { CancelledError } from "../../src/errors.js";

describe("cancellation", () => {
  test("a source fires its listeners once with the first reason", () => {
    const source = new CancellationSource();
    const listener = vi.fn();
    source.token.onCancellationRequested(listener);

    source.cancel("closed");
    source.cancel("client");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("closed");
    expect(source.token.reason).toBe("closed");
  });

  test("late subscribers are called immediately", () => {
    const source = new CancellationSource();
    source.cancel("disposed");
    const listener = vi.fn();
    source.token.onCancellationRequested(listener);
    expect(listener).toHaveBeenCalledWith("disposed");
  });

  test("linked sources follow any of their inputs until disposed", () => {
    const a = new CancellationSource();
    const b = new CancellationSource();
    const linked = new LinkedCancellationSource([a.token, b.token]);
    b.cancel("superseded");
    expect(linked.token.reason).toBe("superseded");

    const c = new CancellationSource();
    const detached = new LinkedCancellationSource([c.token]);
    detached.dispose();
    c.cancel();
    expect(detached.token.isCancellationRequested).toBe(false);
  });

  test("checkpoint yields, then throws once cancelled", async () => {
    await expect(checkpoint(NEVER_CANCELLED)).resolves.toBeUndefined();

    const source = new CancellationSource();
    const pending = checkpoint(source.token);
    source.cancel("superseded");
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await expect(pending).rejects.toMatchObject({ reason: "superseded" });
  });
});
