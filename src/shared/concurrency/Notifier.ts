import { LockError, ErrorCode } from '../errors/LockError';
import type { NotifierState, Waker } from '../types/LockTypes';

/**
 * 发送端与接收端共享的通道状态
 */
export interface NotifierChannel {
  state: NotifierState;
  senderUsed: boolean;
  receiverDropped: boolean;
  waker: Waker | undefined;
}

function wake(channel: NotifierChannel): void {
  const waker = channel.waker;
  channel.waker = undefined;
  if (waker) {
    // 唤醒放到微任务中执行，避免在授予路径上重入调用方代码
    queueMicrotask(waker);
  }
}

/**
 * 通知通道的发送端，只能触发一次
 */
export class NotifierSender {
  constructor(private readonly channel: NotifierChannel) {}

  /**
   * 触发通知
   *
   * @returns 接收端已被丢弃时返回 false
   * @throws {LockError} 发送端已被使用过
   */
  send(): boolean {
    if (this.channel.senderUsed) {
      throw new LockError(ErrorCode.NOTIFIER_CONSUMED, 'Notifier has already been used');
    }
    this.channel.senderUsed = true;

    if (this.channel.receiverDropped) {
      return false;
    }

    this.channel.state = 'fired';
    wake(this.channel);
    return true;
  }

  /**
   * 是否已触发或已被丢弃
   */
  get isSpent(): boolean {
    return this.channel.senderUsed;
  }

  /**
   * 接收端是否已被丢弃
   */
  get isCanceled(): boolean {
    return this.channel.receiverDropped;
  }

  /**
   * 未触发就丢弃发送端，接收端会观察到 canceled
   */
  dispose(): void {
    if (this.channel.senderUsed) {
      return;
    }
    this.channel.senderUsed = true;
    this.channel.state = 'canceled';
    wake(this.channel);
  }
}

/**
 * 通知通道的接收端
 */
export class NotifierReceiver {
  constructor(private readonly channel: NotifierChannel) {}

  /**
   * 查询通道状态，仍在等待时登记 waker
   *
   * 同一时刻只保留最后一次登记的 waker。
   */
  poll(waker?: Waker): NotifierState {
    if (this.channel.receiverDropped) {
      throw new LockError(ErrorCode.NOTIFIER_CONSUMED, 'Notifier receiver has been dropped');
    }
    if (this.channel.state === 'pending' && waker) {
      this.channel.waker = waker;
    }
    return this.channel.state;
  }

  get state(): NotifierState {
    return this.channel.state;
  }

  get isDropped(): boolean {
    return this.channel.receiverDropped;
  }

  /**
   * 丢弃接收端，此后的 send 返回 false
   */
  dispose(): void {
    this.channel.receiverDropped = true;
    this.channel.waker = undefined;
  }
}

/**
 * 创建一次性通知通道
 *
 * @example
 * ```typescript
 * const { sender, receiver } = createNotifier();
 * receiver.poll(() => console.log('woken'));
 * sender.send(); // receiver.state === 'fired'
 * ```
 */
export function createNotifier(): { sender: NotifierSender; receiver: NotifierReceiver } {
  const channel: NotifierChannel = {
    state: 'pending',
    senderUsed: false,
    receiverDropped: false,
    waker: undefined
  };
  return {
    sender: new NotifierSender(channel),
    receiver: new NotifierReceiver(channel)
  };
}
