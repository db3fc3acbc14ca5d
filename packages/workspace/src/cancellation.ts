import { CancelledError, type CancelReason } from "./errors.js";
import { toDisposable, type DisposableLike } from "./disposables.js";

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly reason: CancelReason | null;
  /** Fires once; fires immediately when already cancelled. */
  onCancellationRequested(listener: (reason: CancelReason) => void): DisposableLike;
}

export const NEVER_CANCELLED: CancellationToken = Object.freeze({
  isCancellationRequested: false,
  reason: null,
  onCancellationRequested: () => toDisposable(() => {}),
});

class SourceToken implements CancellationToken {
  readonly #source: CancellationSource;

  constructor(source: CancellationSource) {
    this.#source = source;
  }

  get isCancellationRequested(): boolean {
    return this.#source.reason !== null;
  }

  get reason(): CancelReason | null {
    return this.#source.reason;
  }

  onCancellationRequested(listener: (reason: CancelReason) => void): DisposableLike {
    return this.#source.subscribe(listener);
  }
}

export class CancellationSource {
  #reason: CancelReason | null = null;
  readonly #listeners = new Set<(reason: CancelReason) => void>();
  readonly token: CancellationToken = new SourceToken(this);

  get reason(): CancelReason | null {
    return this.#reason;
  }

  cancel(reason: CancelReason = "client"): void {
    if (this.#reason !== null) return;
    this.#reason = reason;
    const listeners = [...this.#listeners];
    this.#listeners.clear();
    for (const listener of listeners) listener(reason);
  }

  subscribe(listener: (reason: CancelReason) => void): DisposableLike {
    const reason = this.#reason;
    if (reason !== null) {
      listener(reason);
      return toDisposable(() => {});
    }
    this.#listeners.add(listener);
    return toDisposable(() => this.#listeners.delete(listener));
  }
}

/** Cancelled as soon as any of the linked tokens is. Dispose to detach. */
export class LinkedCancellationSource extends CancellationSource implements DisposableLike {
  readonly #links: DisposableLike[];

  constructor(tokens: readonly CancellationToken[]) {
    super();
    this.#links = tokens.map((token) => token.onCancellationRequested((reason) => this.cancel(reason)));
  }

  dispose(): void {
    for (const link of this.#links.splice(0)) link.dispose();
  }
}

export function throwIfCancelled(token: CancellationToken): void {
  if (token.isCancellationRequested) throw new CancelledError(token.reason ?? "client");
}

export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Cooperative safe point: lets queued work run, then stops if cancelled. */
export async function checkpoint(token: CancellationToken): Promise<void> {
  throwIfCancelled(token);
  await yieldToEventLoop();
  throwIfCancelled(token);
}
