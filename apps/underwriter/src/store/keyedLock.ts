/**
 * Serialises async work per key. A caller arriving while work for the same
 * key is in flight runs after it settles, whatever its outcome.
 */
export class KeyedLock {
  private inflight = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.inflight.get(key);
    const promise = previous ? previous.then(task, task) : task();
    this.inflight.set(key, promise);
    // the caller observes any rejection through the returned promise
    promise.finally(() => {
      if (this.inflight.get(key) === promise) this.inflight.delete(key);
    }).catch(() => undefined);
    return promise;
  }

  get size(): number {
    return this.inflight.size;
  }
}
