import { describe, it, expect, vi } from 'vitest';
import { FutureGuard } from '@/core/FutureGuard';
import { QueueLock } from '@/core/QueueLock';
import { createNotifier } from '@/shared/concurrency/Notifier';
import { ErrorCode, isLockError } from '@/shared/errors/LockError';
import { Logger } from '@/shared/logging/Logger';
import type { CancellationPolicy } from '@/shared/types/LockTypes';
import { captureError, flushMicrotasks } from '../setup';

function createLock(cancellationPolicy: CancellationPolicy = 'skip') {
  return QueueLock.from(0, { logger: new Logger({ enableConsole: false }), cancellationPolicy });
}

describe('FutureGuard', () => {
  describe('poll', () => {
    it('should resolve immediately when the lock is free', () => {
      const lock = createLock();
      const future = lock.lock();

      const result = future.poll();

      expect(result.ready).toBe(true);
      expect(future.isCompleted).toBe(true);
      expect(lock.isLocked).toBe(true);
    });

    it('should stay pending and wake once granted', async () => {
      const lock = createLock();
      const guard = await lock.lock();
      const future = lock.lock();
      const waker = vi.fn();

      expect(future.poll(waker)).toEqual({ ready: false });
      expect(future.isCompleted).toBe(false);

      guard.release();
      await flushMicrotasks();

      expect(waker).toHaveBeenCalledTimes(1);
      expect(future.poll().ready).toBe(true);
    });

    it('should refuse polling after completion', () => {
      const lock = createLock();
      const future = lock.lock();
      future.poll();

      const error = captureError(() => future.poll());

      expect(isLockError(error, ErrorCode.FUTURE_COMPLETED)).toBe(true);
      expect(isLockError(error) && error.fatal).toBe(true);
    });

    it('should surface cancellation when the sender is dropped', () => {
      const lock = createLock();
      const { sender, receiver } = createNotifier();
      const future = new FutureGuard(lock.clone(), receiver);

      sender.dispose();
      const error = captureError(() => future.poll());

      expect(isLockError(error, ErrorCode.CANCELED)).toBe(true);
      expect(future.isCompleted).toBe(true);
      expect(lock.handleCount).toBe(1);
    });
  });

  describe('wait', () => {
    it('should resolve when awaited', async () => {
      const lock = createLock();

      const guard = await lock.lock();

      expect(guard.value).toBe(0);
      guard.release();
    });

    it('should return the same promise on repeated calls', async () => {
      const lock = createLock();
      const future = lock.lock();

      const first = future.wait();
      const second = future.wait();

      expect(first).toBe(second);
      (await first).release();
    });

    it('should resolve waiters in turn', async () => {
      const lock = createLock();
      const guard = await lock.lock();
      const seen: number[] = [];

      const waiters = [1, 2, 3].map((id) =>
        lock.lock().then((next) => {
          seen.push(id);
          next.release();
        })
      );
      await flushMicrotasks();
      expect(seen).toEqual([]);

      guard.release();
      await Promise.all(waiters);

      expect(seen).toEqual([1, 2, 3]);
    });

    it('should keep waking wait() after a manual poll registers its own waker', async () => {
      const lock = createLock();
      const guard = await lock.lock();
      const future = lock.lock();
      const waker = vi.fn();

      const waiting = future.wait();
      expect(future.poll(waker)).toEqual({ ready: false });
      guard.release();

      const next = await waiting;
      expect(waker).toHaveBeenCalledTimes(1);
      expect(future.isCompleted).toBe(true);
      expect(lock.isLocked).toBe(true);

      next.release();
      expect(lock.isLocked).toBe(false);
    });

    it('should reject with cancellation when the sender is dropped', async () => {
      const lock = createLock();
      const { sender, receiver } = createNotifier();
      const future = new FutureGuard(lock.clone(), receiver);

      const waiting = future.wait();
      sender.dispose();

      await expect(waiting).rejects.toThrow('Lock request was canceled before it was granted');
    });

    it('should reject when canceled while waiting', async () => {
      const lock = createLock();
      const guard = await lock.lock();
      const future = lock.lock();

      const waiting = future.wait();
      future.cancel();

      await expect(waiting).rejects.toThrow('Lock request was canceled before it was granted');
      guard.release();
      expect(lock.isLocked).toBe(false);
    });
  });

  describe('cancel', () => {
    it('should be idempotent and release the handle', () => {
      const lock = createLock();
      const future = lock.lock();
      expect(lock.handleCount).toBe(2);

      future.cancel();
      future.dispose();

      expect(lock.handleCount).toBe(1);
      expect(future.isCompleted).toBe(true);
      expect(() => future.poll()).toThrow('FutureGuard has already completed');
    });

    it('should grant the next waiter after a canceled one under the skip policy', async () => {
      const lock = createLock('skip');
      const guard = await lock.lock();
      const first = lock.lock();
      const second = lock.lock();

      expect(first.poll().ready).toBe(false);
      first.cancel();
      guard.release();

      const result = second.poll();
      expect(result.ready).toBe(true);
      expect(lock.queueLength).toBe(0);
    });

    it('should stall behind a canceled waiter under the strict policy', async () => {
      const lock = createLock('strict');
      const guard = await lock.lock();
      const first = lock.lock();
      const second = lock.lock();

      first.cancel();

      expect(() => guard.release()).toThrow('Lock request was dropped before it could be granted');
      expect(guard.isReleased).toBe(true);
      expect(lock.isLocked).toBe(true);
      expect(second.poll().ready).toBe(false);
      expect(second.poll().ready).toBe(false);
    });

    it('should forward a delivered but unobserved grant under the skip policy', async () => {
      const lock = createLock('skip');
      const guard = await lock.lock();
      const first = lock.lock();
      const second = lock.lock();

      guard.release();
      first.cancel();

      expect(second.poll().ready).toBe(true);
    });

    it('should keep a delivered but unobserved grant under the strict policy', async () => {
      const lock = createLock('strict');
      const guard = await lock.lock();
      const first = lock.lock();
      const second = lock.lock();

      guard.release();
      first.cancel();

      expect(lock.isLocked).toBe(true);
      expect(second.poll().ready).toBe(false);
    });
  });
});
