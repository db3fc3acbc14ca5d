import { formatError, type Logger } from "@quill-ls/compiler";
import { toDisposable, type DisposableLike } from "./disposables.js";

export type Listener<T> = (value: T) => void;

export class SimpleEmitter<T> {
  #listeners = new Set<Listener<T>>();
  readonly #name: string;
  readonly #logger: Logger;

  constructor(name: string, logger: Logger) {
    this.#name = name;
    this.#logger = logger;
  }

  on(listener: Listener<T>): DisposableLike {
    this.#listeners.add(listener);
    return toDisposable(() => this.#listeners.delete(listener));
  }

  /** A throwing listener is logged and does not stop delivery to the others. */
  emit(value: T): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(value);
      } catch (e) {
        this.#logger.error(`[${this.#name}] listener failed: ${formatError(e)}`);
      }
    }
  }

  get size(): number {
    return this.#listeners.size;
  }
}
