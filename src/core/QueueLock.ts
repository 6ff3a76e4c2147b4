import { resolveLockOptions } from '@/application/config/LockConfigBuilder';
import { createNotifier } from '@/shared/concurrency/Notifier';
import { LockError, ErrorCode } from '@/shared/errors/LockError';
import type { LockOptions, MutableCell, ReadonlyCell } from '@/shared/types/LockTypes';
import { using, type Disposable } from '@/shared/utils/Disposable';
import { LockRequest } from '@/domain/LockRequest';
import { SharedState } from '@/domain/SharedState';
import { FutureGuard } from './FutureGuard';
import type { Guard } from './Guard';

/**
 * 队列式异步独占锁的句柄
 *
 * 同一把锁可以有任意多个句柄（clone），它们共享同一个 SharedState。
 * 最后一个句柄 dispose 时共享状态被销毁：队列中剩余的请求收到取消，
 * 被保护值若实现了 Disposable 也会被释放。
 *
 * @example
 * ```typescript
 * const counter = QueueLock.from(0, { name: 'counter' });
 *
 * // 方式 1：手动控制
 * const guard = await counter.lock();
 * try {
 *   guard.value += 1;
 * } finally {
 *   guard.release();
 * }
 *
 * // 方式 2：自动释放（推荐）
 * await counter.runExclusive((guard) => {
 *   guard.value += 1;
 * });
 * ```
 */
export class QueueLock<T> implements Disposable {
  private disposed = false;

  private constructor(private readonly inner: SharedState<T>) {}

  /**
   * 创建一把新锁，初始为未锁定
   */
  static from<T>(value: T, options: LockOptions = {}): QueueLock<T> {
    return new QueueLock(new SharedState(value, resolveLockOptions(options)));
  }

  /**
   * 底层共享状态，供在锁之上构建的类型使用
   */
  get shared(): SharedState<T> {
    this.ensureUsable();
    return this.inner;
  }

  /**
   * 新建一个指向同一把锁的句柄
   */
  clone(): QueueLock<T> {
    this.ensureUsable();
    this.inner.retain();
    return new QueueLock(this.inner);
  }

  /**
   * 发起加锁请求
   *
   * 请求立即入队；返回的 FutureGuard 持有本句柄的一个克隆，
   * 因此调用后本句柄仍可继续使用。
   */
  lock(): FutureGuard<T> {
    this.ensureUsable();
    const { sender, receiver } = createNotifier();
    this.inner.push(new LockRequest(sender));
    return new FutureGuard(this.clone(), receiver);
  }

  /**
   * 在排他锁内执行函数
   *
   * 即使函数抛出异常也会释放锁。
   * strict 策略下若释放时撞上已取消的请求，Guard.release 抛出的
   * STALLED_GRANT 会取代 fn 的返回值或异常，fn 的结果随之丢失。
   */
  async runExclusive<R>(fn: (guard: Guard<T>) => Promise<R> | R): Promise<R> {
    const guard = await this.lock();
    return using(guard, fn);
  }

  /**
   * 仅当本句柄是唯一句柄时，直接返回被保护值的存储单元
   *
   * 不经过状态位与队列：唯一句柄本身就证明了没有其他访问者。
   * 存在其他句柄（包括等待中的 FutureGuard 与存活的 Guard）时返回 undefined。
   */
  getMut(): MutableCell<T> | undefined {
    this.ensureUsable();
    return this.inner.handleCount === 1 ? this.inner.cell : undefined;
  }

  /**
   * 不加任何检查地返回只读访问
   *
   * 调用方必须自行保证此时没有 Guard 在写入。
   */
  rawRef(): ReadonlyCell<T> {
    this.ensureUsable();
    return this.inner.cell;
  }

  /**
   * 不加任何检查地返回读写访问
   *
   * 绕过全部同步，调用方必须自行保证独占。
   */
  rawMutRef(): MutableCell<T> {
    this.ensureUsable();
    return this.inner.cell;
  }

  /**
   * 将调用方自行构造的请求入队
   */
  pushRequest(request: LockRequest): void {
    this.ensureUsable();
    this.inner.push(request);
  }

  /**
   * 锁空闲时出队并授予下一个请求
   */
  processQueue(): void {
    this.ensureUsable();
    this.inner.processQueue();
  }

  /**
   * 解锁并唤醒下一个等待者
   *
   * 不检查调用方是否持有锁；正常情况下应通过 Guard.release() 解锁。
   */
  unlock(): void {
    this.ensureUsable();
    this.inner.unlock();
  }

  get isLocked(): boolean {
    return this.shared.isLocked;
  }

  get queueLength(): number {
    return this.shared.queueLength;
  }

  get handleCount(): number {
    return this.shared.handleCount;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * 释放本句柄，幂等
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.inner.releaseRef();
  }

  private ensureUsable(): void {
    if (this.disposed) {
      throw new LockError(ErrorCode.HANDLE_DISPOSED, 'QueueLock handle has been disposed');
    }
  }
}
