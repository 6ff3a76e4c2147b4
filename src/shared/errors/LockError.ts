/**
 * 锁错误码枚举
 */
export enum ErrorCode {
  // 内部不变量被破坏（不可恢复）
  INVALID_STATUS = 'INVALID_STATUS',
  FUTURE_COMPLETED = 'FUTURE_COMPLETED',

  // 授予错误
  CANCELED = 'CANCELED',
  STALLED_GRANT = 'STALLED_GRANT',

  // 使用错误
  GUARD_RELEASED = 'GUARD_RELEASED',
  HANDLE_DISPOSED = 'HANDLE_DISPOSED',
  NOTIFIER_CONSUMED = 'NOTIFIER_CONSUMED',

  // 配置错误
  INVALID_CONFIG = 'INVALID_CONFIG'
}

/**
 * 属于编程错误的错误码，出现即说明调用方或锁本身存在缺陷
 */
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.INVALID_STATUS,
  ErrorCode.FUTURE_COMPLETED
]);

/**
 * 统一的锁错误类
 *
 * @example
 * ```typescript
 * throw new LockError(
 *   ErrorCode.CANCELED,
 *   'Lock request was canceled before it was granted'
 * );
 * ```
 */
export class LockError extends Error {
  /**
   * @param code - 错误码
   * @param message - 错误消息
   * @param cause - 原始错误对象（可选）
   * @param context - 额外的上下文信息（可选）
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LockError';

    // 保持原型链正确（TypeScript 继承 Error 的问题）
    Object.setPrototypeOf(this, LockError.prototype);
  }

  /**
   * 是否为不可恢复的编程错误
   */
  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }

  /**
   * 将错误转换为 JSON 格式
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      cause: this.cause instanceof Error ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack
      } : this.cause,
      context: this.context,
      stack: this.stack
    };
  }

  /**
   * 判断是否为特定错误码
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }
}

/**
 * 判断一个未知值是否为指定错误码的 LockError
 */
export function isLockError(error: unknown, code?: ErrorCode): error is LockError {
  return error instanceof LockError && (code === undefined || error.code === code);
}
