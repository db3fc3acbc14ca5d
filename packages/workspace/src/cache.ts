import { performance } from "node:perf_hooks";
import { debug } from "@quill-ls/compiler";
import { CancellationSource, NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "./cancellation.js";
import { CancelledError } from "./errors.js";

/**
 * A named family of cache entries whose values share one type. Keys are
 * `(kind, fingerprint)`, so the kind is what ties a stored value to its type.
 */
export interface CacheKind<T> {
  readonly name: string;
  /** Phantom marker; never read. */
  readonly __value?: (value: T) => T;
}

export function defineCacheKind<T>(name: string): CacheKind<T> {
  return { name };
}

export interface EvictionCandidate {
  readonly kind: string;
  /** Milliseconds the value took to compute. */
  readonly cost: number;
  readonly weight: number;
  /** Cache generation of the last hit or store. */
  readonly lastUsed: number;
  readonly hits: number;
}

/** Lower scores are evicted first. */
export type EvictionScore = (entry: EvictionCandidate, generation: number) => number;

/** Approximate LRU weighted by compute cost. */
export const defaultEvictionScore: EvictionScore = (entry, generation) =>
  (entry.cost + 1) / (1 + generation - entry.lastUsed);

export interface AnalysisCacheOptions {
  readonly maxWeight: number;
  readonly score?: EvictionScore;
  readonly now?: () => number;
}

export interface ComputeOptions {
  /** Detaches this caller only; the computation continues for other waiters. */
  readonly token?: CancellationToken;
  readonly weight?: number;
}

export type ComputeFn<T> = (token: CancellationToken) => T | Promise<T>;

export interface CacheStats {
  hits: number;
  misses: number;
  coalesced: number;
  evictions: number;
  failures: number;
  abandoned: number;
  size: number;
  weight: number;
  inFlight: number;
}

interface Entry extends EvictionCandidate {
  readonly value: unknown;
  lastUsed: number;
  hits: number;
}

interface Flight {
  readonly promise: Promise<unknown>;
  readonly source: CancellationSource;
  waiters: number;
}

/**
 * Memoizes compiler and query results by `(kind, fingerprint)`.
 *
 * - At most one computation per key is in flight; concurrent callers share it.
 * - Values are stored only after the computation resolves. Failures are
 *   delivered to every waiter and never stored.
 * - Total weight is bounded; eviction picks the lowest-scoring completed
 *   entries and never touches in-flight computations, which live in their
 *   own table.
 */
export class AnalysisCache {
  readonly #entries = new Map<string, Entry>();
  readonly #inFlight = new Map<string, Flight>();
  readonly #score: EvictionScore;
  readonly #now: () => number;
  #maxWeight: number;
  #weight = 0;
  #generation = 0;
  #stats = { hits: 0, misses: 0, coalesced: 0, evictions: 0, failures: 0, abandoned: 0 };

  constructor(options: AnalysisCacheOptions) {
    this.#maxWeight = options.maxWeight;
    this.#score = options.score ?? defaultEvictionScore;
    this.#now = options.now ?? (() => performance.now());
  }

  async getOrCompute<T>(
    kind: CacheKind<T>,
    fingerprint: string,
    compute: ComputeFn<T>,
    options: ComputeOptions = {},
  ): Promise<T> {
    const token = options.token ?? NEVER_CANCELLED;
    throwIfCancelled(token);
    const key = cacheKey(kind.name, fingerprint);

    const hit = this.#entries.get(key);
    if (hit) {
      hit.lastUsed = ++this.#generation;
      hit.hits += 1;
      this.#stats.hits += 1;
      debug.cache("hit", { kind: kind.name, fingerprint: fingerprint.slice(0, 12) });
      return hit.value as T;
    }

    let flight = this.#inFlight.get(key);
    if (flight) {
      this.#stats.coalesced += 1;
      debug.cache("dedupe.hit", { kind: kind.name, waiters: flight.waiters + 1 });
    } else {
      this.#stats.misses += 1;
      flight = this.#start(key, kind.name, compute, options.weight ?? 1);
    }
    return (await this.#wait(key, flight, token)) as T;
  }

  peek<T>(kind: CacheKind<T>, fingerprint: string): T | undefined {
    const entry = this.#entries.get(cacheKey(kind.name, fingerprint));
    return entry ? (entry.value as T) : undefined;
  }

  has<T>(kind: CacheKind<T>, fingerprint: string): boolean {
    return this.#entries.has(cacheKey(kind.name, fingerprint));
  }

  isInFlight<T>(kind: CacheKind<T>, fingerprint: string): boolean {
    return this.#inFlight.has(cacheKey(kind.name, fingerprint));
  }

  /** Drop every stored value of one kind. Running computations are unaffected. */
  invalidateKind<T>(kind: CacheKind<T>): number {
    let removed = 0;
    for (const [key, entry] of this.#entries) {
      if (entry.kind !== kind.name) continue;
      this.#delete(key, entry);
      removed += 1;
    }
    debug.cache("invalidate.kind", { kind: kind.name, removed });
    return removed;
  }

  clear(): void {
    this.#entries.clear();
    this.#weight = 0;
    debug.cache("clear");
  }

  setMaxWeight(maxWeight: number): void {
    this.#maxWeight = maxWeight;
    this.#prune(null);
  }

  stats(): CacheStats {
    return {
      ...this.#stats,
      size: this.#entries.size,
      weight: this.#weight,
      inFlight: this.#inFlight.size,
    };
  }

  #start(key: string, kind: string, compute: ComputeFn<unknown>, weight: number): Flight {
    const source = new CancellationSource();
    const startedAt = this.#now();
    const promise = (async () => compute(source.token))();
    const flight: Flight = { promise, source, waiters: 0 };
    this.#inFlight.set(key, flight);
    debug.cache("compute.start", { kind });

    void promise.then(
      (value) => {
        const current = this.#inFlight.get(key) === flight;
        if (current) this.#inFlight.delete(key);
        // An abandoned computation left the table already; its result is not published.
        if (!current || source.token.isCancellationRequested) return;
        const cost = Math.max(0, this.#now() - startedAt);
        const entry: Entry = { kind, value, cost, weight, lastUsed: ++this.#generation, hits: 0 };
        this.#entries.set(key, entry);
        this.#weight += weight;
        debug.cache("compute.stored", { kind, cost: Math.round(cost) });
        this.#prune(key);
      },
      (error: unknown) => {
        if (this.#inFlight.get(key) === flight) this.#inFlight.delete(key);
        if (error instanceof CancelledError) return;
        this.#stats.failures += 1;
        debug.cache("compute.failed", { kind, message: error instanceof Error ? error.message : String(error) });
      },
    );
    return flight;
  }

  #wait(key: string, flight: Flight, token: CancellationToken): Promise<unknown> {
    flight.waiters += 1;
    return new Promise<unknown>((resolve, reject) => {
      let settled = false;
      const subscription = token.onCancellationRequested((reason) => {
        if (settled) return;
        settled = true;
        this.#detach(key, flight);
        reject(new CancelledError(reason));
      });
      void flight.promise.then(
        (value) => {
          if (settled) return;
          settled = true;
          flight.waiters -= 1;
          subscription.dispose();
          resolve(value);
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          flight.waiters -= 1;
          subscription.dispose();
          reject(error);
        },
      );
    });
  }

  /** A waiter gave up; the last one to leave cancels the computation itself. */
  #detach(key: string, flight: Flight): void {
    flight.waiters -= 1;
    if (flight.waiters > 0 || this.#inFlight.get(key) !== flight) return;
    this.#inFlight.delete(key);
    this.#stats.abandoned += 1;
    debug.cache("compute.abandoned", { key: key.slice(0, 40) });
    flight.source.cancel("abandoned");
  }

  #prune(keep: string | null): void {
    while (this.#weight > this.#maxWeight) {
      let victim: [string, Entry] | null = null;
      let lowest = Number.POSITIVE_INFINITY;
      for (const candidate of this.#entries) {
        if (candidate[0] === keep) continue;
        const score = this.#score(candidate[1], this.#generation);
        if (score < lowest) {
          lowest = score;
          victim = candidate;
        }
      }
      if (!victim) return;
      this.#delete(victim[0], victim[1]);
      this.#stats.evictions += 1;
      debug.cache("evict", { kind: victim[1].kind, score: lowest });
    }
  }

  #delete(key: string, entry: Entry): void {
    this.#entries.delete(key);
    this.#weight -= entry.weight;
  }
}

function cacheKey(kind: string, fingerprint: string): string {
  return `${kind}\u0000${fingerprint}`;
}
