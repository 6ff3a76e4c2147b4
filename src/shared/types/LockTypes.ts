import type { Logger } from '../logging/Logger';

/**
 * 被取消的请求出队时的处理策略
 *
 * - skip: 跳过该请求，继续授予队列中的下一个请求
 * - strict: 保持锁定并抛出 STALLED_GRANT，后续请求全部停滞
 */
export type CancellationPolicy = 'skip' | 'strict';

export interface LockOptions {
  /** 锁名称，作为 lockId 写入日志 */
  name?: string;
  logger?: Logger;
  cancellationPolicy?: CancellationPolicy;
}

export interface ResolvedLockOptions {
  name: string;
  logger: Logger;
  cancellationPolicy: CancellationPolicy;
}

/**
 * 唤醒回调：通知方触发或被丢弃时调用，调用方应再次 poll
 */
export type Waker = () => void;

/**
 * poll 的结果
 */
export type Poll<T> =
  | { ready: false }
  | { ready: true; value: T };

/**
 * 通知通道接收端的状态
 */
export type NotifierState = 'pending' | 'fired' | 'canceled';

/**
 * 只读的值访问
 */
export interface ReadonlyCell<T> {
  get(): T;
}

/**
 * 可读写的值访问
 */
export interface MutableCell<T> extends ReadonlyCell<T> {
  set(value: T): void;
  update(fn: (value: T) => T): T;
}
