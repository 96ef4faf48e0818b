import { getGameContext, maskSensitiveData, runWithGameContext } from '../../../src/server/utils/logger';

describe('logger', () => {
  describe('maskSensitiveData', () => {
    it('should redact secret-looking keys at any depth', () => {
      expect(
        maskSensitiveData({
          saveName: 'Evening',
          apiKey: 'test-secret',
          nested: { password: 'test-secret', turn: 3 },
          list: [{ token: 'test-secret' }],
        })
      ).toEqual({
        saveName: 'Evening',
        apiKey: '[REDACTED]',
        nested: { password: '[REDACTED]', turn: 3 },
        list: [{ token: '[REDACTED]' }],
      });
    });

    it('should stop at the depth limit', () => {
      expect(maskSensitiveData({ a: { b: 1 } }, 1)).toEqual({ a: '[MAX_DEPTH_EXCEEDED]' });
    });
  });

  describe('game context', () => {
    it('should expose the context only inside the callback, across awaits', async () => {
      expect(getGameContext()).toBeUndefined();

      const seen = await runWithGameContext({ sessionId: 'session-1', seed: 4 }, async () => {
        await Promise.resolve();
        return getGameContext();
      });

      expect(seen).toEqual({ sessionId: 'session-1', seed: 4 });
      expect(getGameContext()).toBeUndefined();
    });
  });
});
