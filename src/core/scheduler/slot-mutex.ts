/**
 * Per-key exclusive sections
 *
 * Unrelated keys never contend. Waiters are served in arrival order.
 */

export type Release = () => void;

interface KeyState {
  held: boolean;
  waiters: Array<(release: Release) => void>;
}

export class KeyedMutex {
  private keys = new Map<string, KeyState>();

  /**
   * Take the key now, or return null when it is held or has waiters.
   */
  tryAcquire(key: string): Release | null {
    const state = this.keys.get(key);
    if (state && (state.held || state.waiters.length > 0)) return null;

    this.keys.set(key, { held: true, waiters: state?.waiters ?? [] });
    return this.releaser(key);
  }

  acquire(key: string): Promise<Release> {
    const state = this.keys.get(key);
    if (!state || (!state.held && state.waiters.length === 0)) {
      this.keys.set(key, { held: true, waiters: [] });
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve) => {
      state.waiters.push(resolve);
    });
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.keys.get(key)?.held ?? false;
  }

  /** Held, or with someone waiting for it */
  isBusy(key: string): boolean {
    const state = this.keys.get(key);
    return state !== undefined && (state.held || state.waiters.length > 0);
  }

  waiting(key: string): number {
    return this.keys.get(key)?.waiters.length ?? 0;
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff(key);
    };
  }

  private handOff(key: string): void {
    const state = this.keys.get(key);
    if (!state) return;

    const next = state.waiters.shift();
    if (next) {
      next(this.releaser(key));
      return;
    }

    this.keys.delete(key);
  }
}
