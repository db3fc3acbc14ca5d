export interface DisposableLike {
  dispose(): void;
}

export function toDisposable(fn: () => void): DisposableLike {
  return { dispose: fn };
}

export class DisposableStore implements DisposableLike {
  #items: DisposableLike[] = [];
  #disposed = false;

  add<T extends DisposableLike>(item: T): T {
    if (this.#disposed) {
      item.dispose();
      return item;
    }
    this.#items.push(item);
    return item;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    for (const item of this.#items.splice(0, this.#items.length).reverse()) {
      item.dispose();
    }
  }
}
