/**
 * 锁状态取值
 */
export enum LockStatus {
  UNLOCKED = 0,
  LOCKED = 1
}

/**
 * 基于 Int32Array 的原子状态单元
 *
 * 所有读写都走 Atomics，compareAndSwap 返回交换前观察到的值，
 * 由调用方决定如何解释（包括非法取值）。
 */
export class AtomicStatus {
  private readonly view: Int32Array;

  /**
   * @param view - 状态所在的单元，默认新建一个 UNLOCKED 单元
   */
  constructor(view: Int32Array = new Int32Array(1)) {
    this.view = view;
  }

  load(): number {
    return Atomics.load(this.view, 0);
  }

  store(value: LockStatus): void {
    Atomics.store(this.view, 0, value);
  }

  /**
   * 当前值等于 expected 时写入 next
   *
   * @returns 交换前的值
   */
  compareAndSwap(expected: LockStatus, next: LockStatus): number {
    return Atomics.compareExchange(this.view, 0, expected, next);
  }
}
