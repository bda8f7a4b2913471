// packages/server/src/roomQueue.ts

/**
 * Per-key promise chains. Tasks sharing a key run one after another in
 * submission order; tasks on different keys do not wait for each other.
 */
export class RoomQueue {
  private readonly queues = new Map<string, Promise<unknown>>();

  enqueue<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();

    const run = previous
      .catch(() => undefined)
      .then(() => task());

    const tail = run.finally(() => {
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    });
    // the caller observes failures through `run`
    tail.catch(() => undefined);
    this.queues.set(key, tail);

    return run;
  }

  /** Number of keys with queued or running work. */
  get pendingKeys(): number {
    return this.queues.size;
  }
}

export function sessionKey(code: string): string {
  return `poker:${code}`;
}

export const CREATE_KEY = "poker:create";
