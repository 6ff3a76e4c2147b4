import { LockError, ErrorCode } from '@/shared/errors/LockError';
import type { Disposable } from '@/shared/utils/Disposable';
import type { QueueLock } from './QueueLock';

/**
 * 独占访问令牌
 *
 * 只由 FutureGuard 在授予后创建。存活期间可以读写被保护值；
 * release()（或 dispose()）释放锁并唤醒下一个等待者，只生效一次。
 *
 * @example
 * ```typescript
 * const guard = await lock.lock();
 * try {
 *   guard.value = guard.value + 1;
 * } finally {
 *   guard.release();
 * }
 * ```
 */
export class Guard<T> implements Disposable {
  private released = false;

  /** @internal */
  constructor(private readonly lock: QueueLock<T>) {}

  get value(): T {
    this.ensureHeld();
    return this.lock.shared.cell.get();
  }

  set value(value: T) {
    this.ensureHeld();
    this.lock.shared.cell.set(value);
  }

  /**
   * 用 fn 的返回值替换被保护值
   *
   * @returns 新值
   */
  update(fn: (value: T) => T): T {
    this.ensureHeld();
    return this.lock.shared.cell.update(fn);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * 释放锁
   *
   * 先解锁并尝试授予下一个请求，再释放 Guard 持有的句柄。
   * strict 策略下，若下一个请求已被取消，会抛出 STALLED_GRANT，
   * 此时 Guard 仍视为已释放。
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;

    try {
      this.lock.unlock();
    } finally {
      this.lock.dispose();
    }
  }

  dispose(): void {
    this.release();
  }

  private ensureHeld(): void {
    if (this.released) {
      throw new LockError(ErrorCode.GUARD_RELEASED, 'Guard has already been released');
    }
  }
}
