/**
 * Mutual exclusion on unit state.
 */
import { StateLockedError } from '../../utils/errors.js';

export interface StateLock {
  readonly key: string;
  readonly holder: string;
  release(): Promise<void>;
}

export interface StateLockService {
  /**
   * @throws StateLockedError when another holder owns the key
   */
  acquire(key: string, holder: string): Promise<StateLock>;
}

/**
 * Process-local lock table. Backends with native locking plug in through
 * StateLockService.
 */
export class InMemoryStateLockService implements StateLockService {
  private readonly held = new Map<string, string>();

  async acquire(key: string, holder: string): Promise<StateLock> {
    const current = this.held.get(key);
    if (current !== undefined) {
      throw new StateLockedError(key, current);
    }
    this.held.set(key, holder);

    let released = false;
    return {
      key,
      holder,
      release: async () => {
        if (released) return;
        released = true;
        if (this.held.get(key) === holder) {
          this.held.delete(key);
        }
      },
    };
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  holderOf(key: string): string | undefined {
    return this.held.get(key);
  }
}
