import { Mutex } from 'async-mutex';

/**
 * Per-target mutexes. Operations on one target run one at a time; different
 * targets proceed in parallel.
 */
class TargetLocks {
  private targetMutexes = new Map<number, Mutex>();

  getTargetMutex(targetId: number): Mutex {
    let mutex = this.targetMutexes.get(targetId);
    if (!mutex) {
      mutex = new Mutex();
      this.targetMutexes.set(targetId, mutex);
    }
    return mutex;
  }

  async withTargetLock<T>(targetId: number, fn: () => Promise<T>): Promise<T> {
    return this.getTargetMutex(targetId).runExclusive(fn);
  }

  isLocked(targetId: number): boolean {
    return this.targetMutexes.get(targetId)?.isLocked() ?? false;
  }

  /** Drop the mutex of a deleted target */
  cleanupTarget(targetId: number): void {
    this.targetMutexes.delete(targetId);
  }
}

export { TargetLocks };
export const targetLocks = new TargetLocks();
