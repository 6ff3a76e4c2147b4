/**
 * 资源释放接口
 *
 * Guard、FutureGuard 和 QueueLock 句柄都实现此接口
 */
export interface Disposable {
  /**
   * 释放资源
   *
   * 该方法应该是幂等的，多次调用应该安全
   */
  dispose(): void;
}

/**
 * 检查对象是否实现了 Disposable 接口
 */
export function isDisposable(obj: unknown): obj is Disposable {
  return (
    obj !== null &&
    typeof obj === 'object' &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

/**
 * 使用 using 语法糖的辅助函数（模拟 TC39 提案）
 *
 * @example
 * ```typescript
 * await using(await lock.lock(), async (guard) => {
 *   guard.value += 1;
 * }); // 自动调用 dispose，释放锁
 * ```
 */
export async function using<T extends Disposable, R>(
  resource: T,
  fn: (resource: T) => Promise<R> | R
): Promise<R> {
  try {
    return await fn(resource);
  } finally {
    resource.dispose();
  }
}
