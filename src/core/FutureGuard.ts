import type { NotifierReceiver } from '@/shared/concurrency/Notifier';
import { LockError, ErrorCode } from '@/shared/errors/LockError';
import type { Poll, Waker } from '@/shared/types/LockTypes';
import type { Disposable } from '@/shared/utils/Disposable';
import { Guard } from './Guard';
import type { QueueLock } from './QueueLock';

/**
 * 一个进行中的加锁请求，授予后解析为 Guard
 *
 * 既可以手动 poll，也可以直接 await（实现了 PromiseLike）。
 * 每次 poll 都会顺带推进队列，不论自己是否排在队首。
 *
 * @example
 * ```typescript
 * const future = lock.lock();
 *
 * // 方式 1：直接 await
 * const guard = await future;
 *
 * // 方式 2：手动 poll
 * const result = future.poll(() => schedulePollAgain());
 * if (result.ready) {
 *   result.value.release();
 * }
 * ```
 */
export class FutureGuard<T> implements PromiseLike<Guard<T>>, Disposable {
  private lock: QueueLock<T> | undefined;
  private canceled = false;
  private waiting: Promise<Guard<T>> | undefined;
  private wakeDriver: Waker | undefined;

  /** @internal */
  constructor(lock: QueueLock<T>, private readonly receiver: NotifierReceiver) {
    this.lock = lock;
  }

  /**
   * 推进一次
   *
   * @param waker - 尚未授予时登记，授予或取消后被调用
   * @throws {LockError} FUTURE_COMPLETED：已经解析或已取消后再次 poll
   * @throws {LockError} CANCELED：通知发送端在授予前被丢弃
   */
  poll(waker?: Waker): Poll<Guard<T>> {
    const lock = this.lock;
    if (!lock) {
      throw new LockError(ErrorCode.FUTURE_COMPLETED, 'FutureGuard has already completed');
    }

    lock.processQueue();

    switch (this.receiver.poll(this.withDriver(waker))) {
      case 'fired':
        this.lock = undefined;
        return { ready: true, value: new Guard(lock) };
      case 'canceled':
        this.lock = undefined;
        this.receiver.dispose();
        lock.dispose();
        throw new LockError(ErrorCode.CANCELED, 'Lock request was canceled before it was granted');
      case 'pending':
        return { ready: false };
    }
  }

  /**
   * 一直推进直到解析
   *
   * 多次调用返回同一个 Promise。
   */
  wait(): Promise<Guard<T>> {
    if (!this.waiting) {
      this.waiting = this.drive();
    }
    return this.waiting;
  }

  then<TResult1 = Guard<T>, TResult2 = never>(
    onfulfilled?: ((value: Guard<T>) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected);
  }

  get isCompleted(): boolean {
    return this.lock === undefined;
  }

  /**
   * 放弃等待
   *
   * 队列中的请求保持原位，出队时按 cancellationPolicy 处理。
   * 若授予已送达但尚未被 poll 观察到，交由 SharedState.abandonGrant 处理。
   */
  cancel(): void {
    const lock = this.lock;
    if (!lock) {
      return;
    }
    this.lock = undefined;
    this.canceled = true;

    const granted = this.receiver.state === 'fired';
    this.receiver.dispose();
    try {
      if (granted) {
        lock.shared.abandonGrant();
      }
    } finally {
      lock.dispose();
      this.wakeDriver?.();
    }
  }

  dispose(): void {
    this.cancel();
  }

  /**
   * 通道只保留一个 waker：wait() 进行中时手动 poll 登记的 waker
   * 必须同时唤醒驱动循环，否则授予只会通知到手动调用方
   */
  private withDriver(waker: Waker | undefined): Waker | undefined {
    const driver = this.wakeDriver;
    if (!driver || !waker || waker === driver) {
      return waker ?? driver;
    }
    return () => {
      try {
        waker();
      } finally {
        driver();
      }
    };
  }

  private async drive(): Promise<Guard<T>> {
    for (;;) {
      if (this.canceled) {
        throw new LockError(ErrorCode.CANCELED, 'Lock request was canceled before it was granted');
      }

      const woken = new Promise<void>((resolve) => {
        this.wakeDriver = resolve;
      });
      const result = this.poll(this.wakeDriver);
      if (result.ready) {
        this.wakeDriver = undefined;
        return result.value;
      }
      await woken;
    }
  }
}
