export type Release = () => void;

// Per-key async mutex; waiters are granted the lock in arrival order
export class PerKeyMutex {
  // A key is held while it has an entry; the array holds waiting grants
  private queues = new Map<string, Array<() => void>>();

  /**
   * Wait for the lock on `key`. Resolves with a release function that is safe
   * to call more than once. An aborted signal drops the waiter from the queue.
   */
  lock(key: string, signal?: AbortSignal): Promise<Release> {
    return new Promise<Release>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const release = this.releaser(key);
      const queue = this.queues.get(key);
      if (!queue) {
        this.queues.set(key, []);
        resolve(release);
        return;
      }

      const onAbort = () => {
        const index = queue.indexOf(grant);
        if (index >= 0) {
          queue.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(release);
      };

      queue.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.queues.get(key);
      const next = queue?.shift();
      if (next) {
        next();
      } else {
        this.queues.delete(key);
      }
    };
  }
}
