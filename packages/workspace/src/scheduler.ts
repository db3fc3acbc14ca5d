import { debug, type DocumentUri, type Logger } from "@quill-ls/compiler";
import { CancellationSource, checkpoint, type CancellationToken } from "./cancellation.js";
import type { DisposableLike } from "./disposables.js";
import type { DocumentReader, InvalidationEvent } from "./document-store.js";
import { CancelledError, SupersededError, type CancelReason } from "./errors.js";
import type { ReadSetEntry } from "./snapshot.js";
import type { QueryContext } from "./types.js";

export type TaskPriority = "interactive" | "background";

export type TaskState = "queued" | "running" | "completed" | "cancelled" | "superseded" | "failed";

export interface TaskContext extends QueryContext {
  /** 1 on the first run, incremented by every restart. */
  readonly attempt: number;
}

export interface TaskSpec<T> {
  readonly label: string;
  readonly priority: TaskPriority;
  /** Document the task is about; stands in for the read set until one is declared. */
  readonly target?: DocumentUri;
  /** Caller-side cancellation, e.g. the client's request token. */
  readonly token?: CancellationToken;
  run(ctx: TaskContext): Promise<T>;
}

export interface TaskHandle<T> {
  readonly id: number;
  readonly state: TaskState;
  readonly attempts: number;
  readonly result: Promise<T>;
  cancel(): void;
}

export interface SchedulerLimits {
  readonly maxWorkers: number;
  readonly maxRestarts: number;
  readonly backgroundBudgetMs: number;
}

export interface TaskSchedulerOptions {
  readonly documents: Pick<DocumentReader, "versionOf">;
  /** Read on every dispatch so configuration changes apply to the next task. */
  readonly limits: () => SchedulerLimits;
  readonly logger: Logger;
}

export interface SchedulerStats {
  queued: number;
  running: number;
  slotsInUse: number;
  submitted: number;
  completed: number;
  cancelled: number;
  superseded: number;
  restarts: number;
  failed: number;
  demoted: number;
}

interface TaskRecord {
  readonly id: number;
  readonly label: string;
  readonly priority: TaskPriority;
  readonly target: DocumentUri | null;
  state: TaskState;
  attempts: number;
  readSet: readonly ReadSetEntry[] | null;
  readScope: "document" | "workspace";
  /** Cancellation of the current attempt only. */
  source: CancellationSource | null;
  supersededBy: DocumentUri | null;
  holdsSlot: boolean;
  demotion: ReturnType<typeof setTimeout> | null;
  external: DisposableLike | null;
  /** Runs one attempt; the returned thunk publishes its value. */
  readonly execute: (ctx: TaskContext) => Promise<() => void>;
  readonly reject: (error: unknown) => void;
}

type AttemptOutcome = { readonly ok: true; readonly commit: () => void } | { readonly ok: false; readonly error: unknown };

const TERMINAL: ReadonlySet<TaskState> = new Set(["completed", "cancelled", "superseded", "failed"]);

/**
 * Runs query tasks on a bounded number of worker slots.
 *
 * Interactive tasks always dequeue before background ones. A running task
 * whose read set is touched by an edit, an open or the close of a document
 * other than its own is superseded: its attempt is
 * cancelled at the next checkpoint and, for interactive work, run again
 * against the new state while restarts remain. A task that finishes is
 * checked against the store once more, so an answer computed from an older
 * version is never delivered as current.
 */
export class TaskScheduler implements DisposableLike {
  readonly #documents: Pick<DocumentReader, "versionOf">;
  readonly #limits: () => SchedulerLimits;
  readonly #logger: Logger;
  readonly #queues: Record<TaskPriority, TaskRecord[]> = { interactive: [], background: [] };
  readonly #running = new Set<TaskRecord>();
  #idleWaiters: (() => void)[] = [];
  #slotsInUse = 0;
  #nextId = 1;
  #disposed = false;
  readonly #counters = { submitted: 0, completed: 0, cancelled: 0, superseded: 0, restarts: 0, failed: 0, demoted: 0 };

  constructor(options: TaskSchedulerOptions) {
    this.#documents = options.documents;
    this.#limits = options.limits;
    this.#logger = options.logger;
  }

  submit<T>(spec: TaskSpec<T>): TaskHandle<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const result = new Promise<T>((res, rej) => {
      resolve = res;
      reject = rej;
    });

    const record: TaskRecord = {
      id: this.#nextId++,
      label: spec.label,
      priority: spec.priority,
      target: spec.target ?? null,
      state: "queued",
      attempts: 0,
      readSet: null,
      readScope: "document",
      source: null,
      supersededBy: null,
      holdsSlot: false,
      demotion: null,
      external: null,
      execute: async (ctx) => {
        const value = await spec.run(ctx);
        return () => resolve(value);
      },
      reject,
    };
    this.#counters.submitted += 1;

    const handle: TaskHandle<T> = {
      id: record.id,
      get state() {
        return record.state;
      },
      get attempts() {
        return record.attempts;
      },
      result,
      cancel: () => this.#cancel(record, "client"),
    };

    if (this.#disposed) {
      this.#cancel(record, "disposed");
      return handle;
    }
    this.#queues[record.priority].push(record);
    debug.scheduler("submit", { id: record.id, label: record.label, priority: record.priority });
    if (spec.token) {
      // Subscribing fires at once for an already-cancelled token.
      record.external = spec.token.onCancellationRequested((reason) => this.#cancel(record, reason));
    }
    this.#pump();
    return handle;
  }

  /** React to a store mutation. Must be called synchronously with the mutation. */
  invalidate(event: InvalidationEvent): void {
    for (const record of [...this.#running]) {
      if (record.state !== "running" || !this.#affects(record, event)) continue;
      // Closing an include only moves it from memory to disk; the answer is still wanted.
      if (event.kind === "close" && event.uri === record.target) {
        this.#cancel(record, "closed");
        continue;
      }
      record.supersededBy ??= event.uri;
      debug.scheduler("supersede", { id: record.id, label: record.label, uri: event.uri });
      record.source?.cancel("superseded");
    }
    if (event.kind !== "close") return;
    // Queued work has read nothing yet, so only a close concerns it.
    for (const queue of Object.values(this.#queues)) {
      for (const record of [...queue]) {
        if (record.target === event.uri) this.#cancel(record, "closed");
      }
    }
  }

  /** Resolves once nothing is queued or running, demoted work included. */
  idle(): Promise<void> {
    if (this.#isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.#idleWaiters.push(resolve));
  }

  stats(): SchedulerStats {
    return {
      queued: this.#queues.interactive.length + this.#queues.background.length,
      running: this.#running.size,
      slotsInUse: this.#slotsInUse,
      ...this.#counters,
    };
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    const all = [...this.#queues.interactive, ...this.#queues.background, ...this.#running];
    for (const record of all) this.#cancel(record, "disposed");
  }

  #affects(record: TaskRecord, event: InvalidationEvent): boolean {
    if (record.readSet === null) return record.target === event.uri;
    if (record.readSet.some((entry) => entry.uri === event.uri)) return true;
    // A newly opened document joins every later workspace snapshot.
    return record.readScope === "workspace" && event.kind === "open";
  }

  #pump(): void {
    while (this.#slotsInUse < this.#limits().maxWorkers) {
      const next = this.#queues.interactive.shift() ?? this.#queues.background.shift();
      if (!next) break;
      this.#start(next);
    }
    this.#checkIdle();
  }

  #start(record: TaskRecord): void {
    const source = new CancellationSource();
    record.state = "running";
    record.attempts += 1;
    record.source = source;
    record.readSet = null;
    record.supersededBy = null;
    record.holdsSlot = true;
    this.#slotsInUse += 1;
    this.#running.add(record);

    const budget = this.#limits().backgroundBudgetMs;
    if (record.priority === "background" && budget > 0) {
      record.demotion = setTimeout(() => this.#demote(record), budget);
    }
    debug.scheduler("start", { id: record.id, label: record.label, attempt: record.attempts });

    const ctx: TaskContext = {
      token: source.token,
      attempt: record.attempts,
      declareReadSet: (readSet, scope) => {
        if (record.source !== source) return;
        record.readSet = readSet;
        record.readScope = scope;
      },
      checkpoint: () => checkpoint(source.token),
    };
    void record.execute(ctx).then(
      (commit) => this.#settle(record, { ok: true, commit }),
      (error: unknown) => this.#settle(record, { ok: false, error }),
    );
  }

  #settle(record: TaskRecord, outcome: AttemptOutcome): void {
    this.#releaseSlot(record);
    this.#running.delete(record);
    record.source = null;

    if (!TERMINAL.has(record.state)) {
      if (record.supersededBy !== null) {
        this.#supersede(record, record.supersededBy);
      } else if (outcome.ok) {
        const stale = this.#staleEntry(record.readSet);
        if (stale === null) {
          this.#finish(record, "completed");
          outcome.commit();
        } else {
          debug.scheduler("stale-result", { id: record.id, label: record.label, uri: stale });
          this.#supersede(record, stale);
        }
      } else if (outcome.error instanceof CancelledError) {
        this.#finish(record, "cancelled");
        record.reject(outcome.error);
      } else {
        this.#finish(record, "failed");
        record.reject(outcome.error);
      }
    }
    this.#pump();
  }

  #supersede(record: TaskRecord, uri: DocumentUri): void {
    const restarts = record.attempts - 1;
    if (record.priority === "interactive" && restarts < this.#limits().maxRestarts && !this.#disposed) {
      this.#counters.restarts += 1;
      record.state = "queued";
      debug.scheduler("restart", { id: record.id, label: record.label, attempt: record.attempts + 1 });
      this.#queues.interactive.unshift(record);
      return;
    }
    if (record.priority === "interactive") {
      this.#logger.warn(`[scheduler] ${record.label} gave up after ${record.attempts} attempt(s); ${uri} kept changing`);
    }
    this.#finish(record, "superseded");
    record.reject(new SupersededError(uri, record.attempts));
  }

  #cancel(record: TaskRecord, reason: CancelReason): void {
    if (TERMINAL.has(record.state)) return;
    const queue = this.#queues[record.priority];
    const index = queue.indexOf(record);
    if (index >= 0) queue.splice(index, 1);

    this.#finish(record, "cancelled");
    // The attempt, if any, unwinds at its next checkpoint and settles later.
    record.source?.cancel(reason);
    record.reject(new CancelledError(reason));
    debug.scheduler("cancel", { id: record.id, label: record.label, reason });
    this.#checkIdle();
  }

  #finish(record: TaskRecord, state: "completed" | "cancelled" | "superseded" | "failed"): void {
    record.state = state;
    record.external?.dispose();
    record.external = null;
    this.#counters[state] += 1;
  }

  #demote(record: TaskRecord): void {
    record.demotion = null;
    if (!record.holdsSlot || record.state !== "running") return;
    record.holdsSlot = false;
    this.#slotsInUse -= 1;
    this.#counters.demoted += 1;
    debug.scheduler("demote", { id: record.id, label: record.label });
    this.#pump();
  }

  #releaseSlot(record: TaskRecord): void {
    if (record.demotion !== null) {
      clearTimeout(record.demotion);
      record.demotion = null;
    }
    if (!record.holdsSlot) return;
    record.holdsSlot = false;
    this.#slotsInUse -= 1;
  }

  /** First read-set document whose state moved on, or null when all are current. */
  #staleEntry(readSet: readonly ReadSetEntry[] | null): DocumentUri | null {
    for (const entry of readSet ?? []) {
      const version = this.#documents.versionOf(entry.uri);
      const current = entry.origin === "memory" ? version === entry.version : version === undefined;
      if (!current) return entry.uri;
    }
    return null;
  }

  #isIdle(): boolean {
    return this.#running.size === 0 && this.#queues.interactive.length === 0 && this.#queues.background.length === 0;
  }

  #checkIdle(): void {
    if (!this.#isIdle() || this.#idleWaiters.length === 0) return;
    const waiters = this.#idleWaiters;
    this.#idleWaiters = [];
    for (const waiter of waiters) waiter();
  }
}
