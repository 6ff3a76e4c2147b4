import { describe, it, expect } from 'vitest';
import { isDisposable, using } from '@/shared/utils/Disposable';

describe('Disposable', () => {
  describe('isDisposable', () => {
    it('should return true for objects with dispose method', () => {
      const obj = { dispose: () => {} };
      expect(isDisposable(obj)).toBe(true);
    });

    it('should return false for objects without dispose method', () => {
      expect(isDisposable({})).toBe(false);
      expect(isDisposable({ dispose: 'no' })).toBe(false);
      expect(isDisposable(null)).toBe(false);
      expect(isDisposable(undefined)).toBe(false);
      expect(isDisposable(42)).toBe(false);
    });
  });

  describe('using', () => {
    it('should auto-dispose after async function', async () => {
      let disposed = false;
      const resource = {
        value: 42,
        dispose: () => { disposed = true; }
      };

      const result = await using(resource, async (r) => {
        expect(disposed).toBe(false);
        return r.value * 2;
      });

      expect(result).toBe(84);
      expect(disposed).toBe(true);
    });

    it('should support synchronous functions', async () => {
      let disposed = false;
      const resource = { dispose: () => { disposed = true; } };

      const result = await using(resource, () => 'sync result');

      expect(result).toBe('sync result');
      expect(disposed).toBe(true);
    });

    it('should dispose even when function throws', async () => {
      let disposed = false;
      const resource = {
        dispose: () => { disposed = true; }
      };

      await expect(
        using(resource, async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');

      expect(disposed).toBe(true);
    });
  });
});
