import type { NotifierSender } from '@/shared/concurrency/Notifier';

/**
 * 一个排队中的加锁请求
 *
 * 持有通知通道的发送端；出队时由 SharedState 触发授予。
 */
export class LockRequest {
  constructor(readonly sender: NotifierSender) {}

  /**
   * 授予该请求
   *
   * @returns 请求方已放弃等待时返回 false
   */
  grant(): boolean {
    if (this.sender.isSpent) {
      return false;
    }
    return this.sender.send();
  }

  /**
   * 不授予就丢弃请求，请求方会收到取消
   */
  dispose(): void {
    this.sender.dispose();
  }
}
