import { parseMatchArgs, runMatch } from '../../scripts/run-robot-match';
import { GameHost } from '../../src/server/game/GameHost';
import { createStrategyFactory } from '../../src/server/game/strategyFactory';
import { InMemorySaveGameRepository } from '../../src/server/services/SaveGameRepository';
import { GameErrorCode } from '../../src/shared/errors';

const NODE = ['node', 'run-robot-match.ts'];

describe('parseMatchArgs', () => {
  it('should default to two aggressive robots around a friendly one', () => {
    expect(parseMatchArgs(NODE)).toEqual({
      seed: undefined,
      profiles: ['aggressive', 'friendly', 'aggressive'],
      names: ['Robot 1', 'Robot 2', 'Robot 3'],
      saveName: undefined,
    });
  });

  it('should read flags with separate or inline values', () => {
    expect(parseMatchArgs([...NODE, '--seed', '42', '--profiles=friendly, friendly,aggressive', '--save', 'night run'])).toEqual({
      seed: 42,
      profiles: ['friendly', 'friendly', 'aggressive'],
      names: ['Robot 1', 'Robot 2', 'Robot 3'],
      saveName: 'night run',
    });
  });

  it('should refuse a bad seed and a save without a name', () => {
    expect(() => parseMatchArgs([...NODE, '--seed', '-3'])).toThrow('--seed must be a non-negative integer, got "-3"');
    expect(() => parseMatchArgs([...NODE, '--seed', 'abc'])).toThrow('--seed must be a non-negative integer');
    expect(() => parseMatchArgs([...NODE, '--save'])).toThrow('--save needs a name');
  });
});

describe('runMatch', () => {
  function host(repository = new InMemorySaveGameRepository()): GameHost {
    return new GameHost({
      repository,
      strategyFactory: createStrategyFactory({ seed: 13, thinkingDelayMinMs: 0, thinkingDelayMaxMs: 0 }),
    });
  }

  it('should play a full match and save it when asked', async () => {
    const repository = new InMemorySaveGameRepository();

    const result = await runMatch(parseMatchArgs([...NODE, '--seed', '13', '--save', 'Robots']), host(repository));

    expect(result?.scores.map((line) => line.name).sort()).toEqual(['Robot 1', 'Robot 2', 'Robot 3']);
    await expect(repository.list()).resolves.toEqual(['Robots']);
  });

  it('should reject an unknown profile before playing', async () => {
    await expect(runMatch(parseMatchArgs([...NODE, '--profiles', 'aggressive,sneaky,friendly']), host())).rejects.toMatchObject({
      code: GameErrorCode.GAME_INVALID_SETUP,
    });
  });
});
