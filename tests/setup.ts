import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
});

// 导出测试工具函数
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * 让已排队的微任务（包括 waker 回调）执行完
 */
export async function flushMicrotasks(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

/**
 * 执行 fn 并返回其抛出的错误，未抛出时测试失败
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
