import { AtomicStatus, LockStatus } from '@/shared/concurrency/AtomicStatus';
import { PendingQueue } from '@/shared/concurrency/PendingQueue';
import { LockError, ErrorCode } from '@/shared/errors/LockError';
import type { Logger } from '@/shared/logging/Logger';
import type { ResolvedLockOptions } from '@/shared/types/LockTypes';
import { isDisposable } from '@/shared/utils/Disposable';
import type { LockRequest } from './LockRequest';
import { ValueCell } from './ValueCell';

/**
 * 锁的共享状态
 *
 * 由同一把锁的所有 QueueLock 句柄共享：状态位、被保护值、等待队列，
 * 以及句柄引用计数。状态位只通过 AtomicStatus 的 CAS / store 修改，
 * 它是授予决策的唯一串行化点。
 *
 * 状态转换：
 * - processQueue: UNLOCKED → LOCKED 成功后出队一个请求并授予；
 *   队列为空则回到 UNLOCKED。CAS 失败（已是 LOCKED）什么都不做。
 * - unlock: 写入 UNLOCKED，随后立即 processQueue，把锁交给下一个等待者。
 *
 * processQueue 是幂等的，任何参与者都可以随时调用。
 */
export class SharedState<T> {
  readonly cell: ValueCell<T>;
  private readonly queue = new PendingQueue<LockRequest>();
  private readonly logger: Logger;
  private refs = 1;
  private tornDown = false;

  constructor(
    value: T,
    private readonly options: ResolvedLockOptions,
    private readonly statusCell: AtomicStatus = new AtomicStatus()
  ) {
    this.cell = new ValueCell(value);
    this.logger = options.logger;
  }

  /**
   * 当前状态
   *
   * @throws {LockError} 状态单元中出现非法取值
   */
  get status(): LockStatus {
    const value = this.statusCell.load();
    switch (value) {
      case LockStatus.UNLOCKED:
        return LockStatus.UNLOCKED;
      case LockStatus.LOCKED:
        return LockStatus.LOCKED;
      default:
        throw this.invalidStatus(value);
    }
  }

  get isLocked(): boolean {
    return this.status === LockStatus.LOCKED;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get handleCount(): number {
    return this.refs;
  }

  get isTornDown(): boolean {
    return this.tornDown;
  }

  /**
   * 新增一个句柄引用
   */
  retain(): void {
    this.ensureAlive();
    this.refs++;
  }

  /**
   * 释放一个句柄引用，最后一个引用释放时销毁共享状态
   */
  releaseRef(): void {
    if (this.tornDown) {
      return;
    }
    this.refs--;
    if (this.refs === 0) {
      this.teardown();
    }
  }

  /**
   * 请求入队
   */
  push(request: LockRequest): void {
    this.ensureAlive();
    this.queue.push(request);
    this.logger.debug('Lock requested', { queueLength: this.queue.length });
  }

  /**
   * 尝试推进队列
   *
   * @throws {LockError} INVALID_STATUS：状态单元中出现非法取值
   * @throws {LockError} STALLED_GRANT：strict 策略下出队的请求已被取消
   */
  processQueue(): void {
    const previous = this.statusCell.compareAndSwap(LockStatus.UNLOCKED, LockStatus.LOCKED);
    switch (previous) {
      case LockStatus.UNLOCKED:
        this.grantNext();
        return;
      case LockStatus.LOCKED:
        // 锁已被持有，或授予正在途中
        return;
      default:
        throw this.invalidStatus(previous);
    }
  }

  /**
   * 释放锁并把它交给下一个等待者
   */
  unlock(): void {
    this.statusCell.store(LockStatus.UNLOCKED);
    this.logger.debug('Lock released', { queueLength: this.queue.length });
    this.processQueue();
  }

  /**
   * 处理已送达但请求方在观察之前就放弃了的授予
   *
   * skip 策略下立即转交给下一个等待者；strict 策略下锁保持锁定。
   */
  abandonGrant(): void {
    if (this.options.cancellationPolicy === 'skip') {
      this.logger.debug('Forwarding abandoned grant', { queueLength: this.queue.length });
      this.unlock();
      return;
    }
    this.logger.warn('Granted request was dropped; lock stays held', {
      queueLength: this.queue.length
    });
  }

  private grantNext(): void {
    for (let request = this.queue.tryPop(); request; request = this.queue.tryPop()) {
      if (request.grant()) {
        this.logger.debug('Lock granted', { queueLength: this.queue.length });
        return;
      }

      if (this.options.cancellationPolicy === 'strict') {
        const error = new LockError(
          ErrorCode.STALLED_GRANT,
          'Lock request was dropped before it could be granted',
          undefined,
          { queueLength: this.queue.length }
        );
        this.logger.error('Grant stalled on a canceled request', error);
        throw error;
      }

      this.logger.debug('Skipped canceled request', { queueLength: this.queue.length });
    }

    this.statusCell.store(LockStatus.UNLOCKED);
  }

  private teardown(): void {
    this.tornDown = true;

    const dropped = this.queue.drain();
    for (const request of dropped) {
      request.dispose();
    }

    const value = this.cell.get();
    if (isDisposable(value)) {
      value.dispose();
    }

    this.logger.debug('Lock torn down', { droppedRequests: dropped.length });
  }

  private ensureAlive(): void {
    if (this.tornDown) {
      throw new LockError(ErrorCode.HANDLE_DISPOSED, 'Lock has been torn down');
    }
  }

  private invalidStatus(value: number): LockError {
    return new LockError(
      ErrorCode.INVALID_STATUS,
      `Lock status holds an invalid value: ${value}`,
      undefined,
      { status: value }
    );
  }
}
