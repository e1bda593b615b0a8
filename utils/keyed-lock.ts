import { AsyncLocalStorage } from 'async_hooks';
import { ReentrantCallError } from './ledger-error';

/**
 * Per-resource exclusive locks. Tasks sharing a key run one after another in arrival
 * order; tasks on disjoint keys run concurrently. Keys are taken in sorted order so two
 * multi-key tasks cannot deadlock each other.
 *
 * The keys held by the running call chain are tracked, and a nested call asking for one
 * of them is rejected instead of waiting on itself.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();
  private held = new AsyncLocalStorage<ReadonlySet<string>>();

  async runExclusive<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const owned = this.held.getStore();
    const clash = owned ? ordered.find((key) => owned.has(key)) : undefined;
    if (clash !== undefined) throw new ReentrantCallError(clash);

    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      const scope = new Set<string>([...(owned ?? []), ...ordered]);
      return await this.held.run(scope, task);
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

export const userKey = (user: string) => `user:${user}`;
export const marketKey = (asset: string) => `market:${asset}`;
