import { describe, it, expect, vi } from 'vitest';
import { createNotifier } from '@/shared/concurrency/Notifier';
import { flushMicrotasks } from '../../setup';

describe('Notifier', () => {
  it('should start pending', () => {
    const { receiver } = createNotifier();

    expect(receiver.poll()).toBe('pending');
  });

  it('should fire once and wake the registered waker', async () => {
    const { sender, receiver } = createNotifier();
    const waker = vi.fn();

    receiver.poll(waker);
    expect(sender.send()).toBe(true);

    expect(receiver.poll()).toBe('fired');
    // 唤醒在微任务中执行
    expect(waker).not.toHaveBeenCalled();
    await flushMicrotasks();
    expect(waker).toHaveBeenCalledTimes(1);
  });

  it('should keep only the latest waker', async () => {
    const { sender, receiver } = createNotifier();
    const first = vi.fn();
    const second = vi.fn();

    receiver.poll(first);
    receiver.poll(second);
    sender.send();
    await flushMicrotasks();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should reject a second send', () => {
    const { sender } = createNotifier();

    sender.send();

    expect(() => sender.send()).toThrow('Notifier has already been used');
  });

  it('should report failure when the receiver was dropped', () => {
    const { sender, receiver } = createNotifier();

    receiver.dispose();

    expect(sender.isCanceled).toBe(true);
    expect(sender.send()).toBe(false);
    expect(sender.isSpent).toBe(true);
  });

  it('should report canceled when the sender is dropped before firing', async () => {
    const { sender, receiver } = createNotifier();
    const waker = vi.fn();

    receiver.poll(waker);
    sender.dispose();
    await flushMicrotasks();

    expect(receiver.poll()).toBe('canceled');
    expect(waker).toHaveBeenCalledTimes(1);
  });

  it('should ignore dropping a sender that already fired', () => {
    const { sender, receiver } = createNotifier();

    sender.send();
    sender.dispose();

    expect(receiver.state).toBe('fired');
  });

  it('should refuse polling a dropped receiver', () => {
    const { receiver } = createNotifier();

    receiver.dispose();

    expect(receiver.isDropped).toBe(true);
    expect(() => receiver.poll()).toThrow('Notifier receiver has been dropped');
  });
});
