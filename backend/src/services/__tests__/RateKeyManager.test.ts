import { describe, it, expect } from 'vitest';
import { RateKeyManager } from '../RateKeyManager';

describe('RateKeyManager', () => {
  const MINUTE = 60 * 1000;

  function managerAt(start: number, limit: number = 3) {
    let now = start;
    const manager = new RateKeyManager(
      { eBird: { credential: 'test-secret', quota: { limit, windowMs: MINUTE } } },
      () => now
    );
    return {
      manager,
      advance: (ms: number) => {
        now += ms;
      },
    };
  }

  describe('reserve', () => {
    it('should allow providers without a quota', async () => {
      const manager = new RateKeyManager();

      await expect(manager.reserve('Guardian')).resolves.toEqual({ allowed: true });
    });

    it('should grant exactly the limit to concurrent callers', async () => {
      const { manager } = managerAt(0, 3);

      const reservations = await Promise.all(Array.from({ length: 10 }, () => manager.reserve('eBird')));

      expect(reservations.filter((r) => r.allowed)).toHaveLength(3);
      expect(manager.getQuotaState('eBird')?.callsUsed).toBe(3);
    });

    it('should report how long until the window resets', async () => {
      const { manager } = managerAt(125000, 1);

      await manager.reserve('eBird');
      const denied = await manager.reserve('eBird');

      expect(denied).toEqual({ allowed: false, retryAfterMs: 55000 });
    });

    it('should start a fresh window after rollover', async () => {
      const { manager, advance } = managerAt(125000, 1);

      await manager.reserve('eBird');
      advance(MINUTE);

      await expect(manager.reserve('eBird')).resolves.toEqual({ allowed: true });
      expect(manager.getQuotaState('eBird')).toEqual({
        callsUsed: 1,
        windowStart: 180000,
        windowMs: MINUTE,
        limit: 1,
      });
    });

    it('should match provider names case-insensitively', async () => {
      const { manager } = managerAt(0, 1);

      await manager.reserve('EBIRD');

      expect((await manager.reserve('ebird')).allowed).toBe(false);
    });

    it('should deny everything with a zero limit', async () => {
      const { manager } = managerAt(0, 0);

      expect((await manager.reserve('eBird')).allowed).toBe(false);
    });
  });

  describe('credentials', () => {
    it('should hand out configured credentials only', () => {
      const { manager } = managerAt(0);

      expect(manager.getCredential('eBird')).toBe('test-secret');
      expect(manager.hasCredential('ebird')).toBe(true);
      expect(manager.hasCredential('AQICN')).toBe(false);
      expect(manager.getCredential('AQICN')).toBeUndefined();
    });
  });

  describe('diagnostics', () => {
    it('should reflect rollover without reserving', async () => {
      const { manager, advance } = managerAt(0, 2);

      await manager.reserve('eBird');
      advance(2 * MINUTE);

      expect(manager.getQuotaState('eBird')?.callsUsed).toBe(0);
      expect(manager.getQuotaState('Guardian')).toBeUndefined();
    });

    it('should snapshot every quota by lower-cased name', async () => {
      const { manager } = managerAt(0, 2);

      await manager.reserve('eBird');

      expect(manager.snapshot()).toEqual({
        ebird: { callsUsed: 1, windowStart: 0, windowMs: MINUTE, limit: 2 },
      });
    });

    it('should refuse invalid quotas', () => {
      expect(() => new RateKeyManager({ eBird: { quota: { limit: -1, windowMs: MINUTE } } })).toThrow(RangeError);
      expect(() => new RateKeyManager({ eBird: { quota: { limit: 5, windowMs: 0 } } })).toThrow(RangeError);
    });
  });
});
