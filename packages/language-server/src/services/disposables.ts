export interface DisposableLike {
  dispose(): void;
}

export function toDisposable(fn: () => void): DisposableLike {
  return { dispose: fn };
}

/**
 * Disposes its items in reverse order of registration. Items added after
 * the store itself was disposed are disposed immediately.
 */
export class DisposableStore implements DisposableLike {
  #items: DisposableLike[] = [];
  #disposed = false;
  readonly #onError: (error: unknown) => void;

  constructor(onError: (error: unknown) => void) {
    this.#onError = onError;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  add<T extends DisposableLike>(item: T): T {
    if (this.#disposed) {
      this.#disposeOne(item);
      return item;
    }
    this.#items.push(item);
    return item;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    for (const item of this.#items.splice(0, this.#items.length).reverse()) {
      this.#disposeOne(item);
    }
  }

  #disposeOne(item: DisposableLike): void {
    try {
      item.dispose();
    } catch (e) {
      this.#onError(e);
    }
  }
}
