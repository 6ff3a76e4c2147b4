import type { MutableCell } from '@/shared/types/LockTypes';

/**
 * 被保护值的存储单元（内部可变性）
 *
 * 单元本身不做任何同步：谁能拿到它，谁就能读写。
 * 它的正确性完全依赖外部的状态位与 Guard 纪律，只应通过
 * Guard、QueueLock.getMut() 或显式的 raw 访问器暴露。
 */
export class ValueCell<T> implements MutableCell<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  /**
   * 用 fn 的返回值替换当前值
   *
   * @returns 新值
   */
  update(fn: (value: T) => T): T {
    this.value = fn(this.value);
    return this.value;
  }
}
