import { GameHost } from '../../src/server/game/GameHost';
import { config } from '../../src/server/config';
import { logger } from '../../src/server/utils/logger';
import { InMemorySaveGameRepository } from '../../src/server/services/SaveGameRepository';
import type { SaveGameRepository, SavedGame } from '../../src/server/services/SaveGameRepository';
import {
  CorruptSaveError,
  GameErrorCode,
  GameNotStartedError,
  SaveNotFoundError,
} from '../../src/shared/errors';
import type { GameSetupInput } from '../../src/shared/validation/schemas';
import { passiveAnswer, scriptedFactory, sequentialIds } from '../helpers/engineTestUtils';

const ROBOTS: GameSetupInput = {
  seed: 9,
  players: [
    { name: 'Ada', isRobot: true, profile: 'aggressive' },
    { name: 'Fay', isRobot: true, profile: 'friendly' },
    { name: 'Gus', isRobot: true, profile: 'aggressive' },
  ],
};

const HUMANS: GameSetupInput = {
  players: [{ name: 'Ann' }, { name: 'Ben' }, { name: 'Cat' }],
};

function createHost(repository: SaveGameRepository = new InMemorySaveGameRepository()): GameHost {
  return new GameHost({ repository, strategyFactory: scriptedFactory(), newRequestId: sequentialIds() });
}

/** Repository that hands back whatever record it was built with. */
class FixedRecordRepository extends InMemorySaveGameRepository {
  constructor(private readonly record: SavedGame) {
    super();
  }

  override async load(): Promise<SavedGame> {
    return this.record;
  }
}

describe('GameHost', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log the application version when it starts', () => {
    const info = jest.spyOn(logger, 'info');

    createHost();

    expect(info).toHaveBeenCalledWith('Game host ready', { version: config.app.version, environment: 'test' });
  });

  it('should refuse to save when no game is open', async () => {
    const failure = createHost().saveGame('Evening');

    await expect(failure).rejects.toBeInstanceOf(GameNotStartedError);
    await expect(failure).rejects.toMatchObject({
      code: GameErrorCode.GAME_NOT_STARTED,
      context: { operation: 'saveGame', saveName: 'Evening' },
    });
  });

  it('should save a game and load it back as a new session', async () => {
    const host = createHost();
    const session = host.newGame(ROBOTS);
    await session.run();

    await host.saveGame('Finished');
    const loaded = await host.loadGame('finished');

    expect(loaded).not.toBe(session);
    expect(host.session).toBe(loaded);
    expect(loaded.saveName).toBe('Finished');
    expect(loaded.game.result).toEqual(session.game.result);
    expect(loaded.game.board.seed).toBe(9);
    await expect(host.listSaves()).resolves.toEqual(['Finished']);
  });

  it('should resume a loaded game that was saved mid-deployment', async () => {
    const host = createHost();
    const game = host.newGame(HUMANS).game;
    const opening = game.start();
    if (opening) {
      game.submit(passiveAnswer(opening));
    }
    await host.saveGame('Early');

    const loaded = await host.loadGame('Early');

    expect(loaded.game.isStarted).toBe(true);
    expect(loaded.game.pendingDecision).toMatchObject({ type: 'deploy_choose_hex', player: 'GREEN' });
    expect(loaded.status).toMatchObject({ kind: 'active_turn', phase: 'deploy', currentPlayer: 'GREEN' });
  });

  it('should stop the previous session when another game replaces it', () => {
    const host = createHost();
    const first = host.newGame(HUMANS);

    const second = host.newGame(HUMANS);

    expect(host.session).toBe(second);
    expect(first.status).toEqual({
      kind: 'abandoned',
      turn: 1,
      phase: 'deploy',
      reason: 'Replaced by another game',
    });
  });

  it('should keep the current game when a save is missing', async () => {
    const host = createHost();
    const current = host.newGame(HUMANS);

    await expect(host.loadGame('nothing')).rejects.toBeInstanceOf(SaveNotFoundError);

    expect(host.session).toBe(current);
    expect(current.isStopped).toBe(false);
  });

  it('should report a save the engine cannot rebuild as corrupt', async () => {
    const host = createHost(
      new FixedRecordRepository({ name: 'Bad', savedAt: '2026-03-01T12:00:00.000Z', snapshot: { version: 1 } })
    );
    const current = host.newGame(HUMANS);

    const failure = host.loadGame('Bad');

    await expect(failure).rejects.toBeInstanceOf(CorruptSaveError);
    await expect(failure).rejects.toMatchObject({
      code: GameErrorCode.SAVE_CORRUPT,
      message: 'Saved game "Bad" cannot be loaded: Snapshot does not match the expected shape',
      context: { saveName: 'Bad', cause: 'STATE_SNAPSHOT_INVALID' },
    });
    expect(host.session).toBe(current);
  });

  it('should delete saves through the repository', async () => {
    const host = createHost();
    host.newGame(HUMANS);
    await host.saveGame('Spare');

    await host.deleteSave('SPARE');

    await expect(host.listSaves()).resolves.toEqual([]);
  });

  it('should forget the session on close', () => {
    const host = createHost();
    const session = host.newGame(HUMANS);

    host.close();

    expect(host.session).toBeNull();
    expect(host.game).toBeNull();
    expect(session.status).toMatchObject({ kind: 'abandoned', reason: 'Host closed' });
  });
});
