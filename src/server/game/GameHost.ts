import { deserializeGame, isEngineError, serializeGame } from '../../shared/engine';
import type { Game, StrategyFactory } from '../../shared/engine';
import { CorruptSaveError, GameNotStartedError } from '../../shared/errors';
import type { GameSetupInput } from '../../shared/validation/schemas';
import { FileSaveGameRepository } from '../services/FileSaveGameRepository';
import type { SaveGameRepository, SavedGame } from '../services/SaveGameRepository';
import { config } from '../config';
import { logger } from '../utils/logger';
import { createGame } from './gameSetup';
import type { CreateGameOptions } from './gameSetup';
import { GameSession } from './GameSession';
import type { GameSessionOptions } from './GameSession';
import { createStrategy } from './strategyFactory';

export interface GameHostOptions {
  repository?: SaveGameRepository;
  /** Rebuilds seats of loaded games; new games use it too when given. */
  strategyFactory?: StrategyFactory;
  session?: Omit<GameSessionOptions, 'sessionId' | 'saveName'>;
  newRequestId?: () => string;
}

/**
 * Owns the game currently on the table and the saved-game store behind the
 * main menu: new game, save, load, list and delete.
 *
 * Loading replaces the current game only once the save has been read and
 * rebuilt; any failure leaves the current game in place.
 */
export class GameHost {
  private readonly repository: SaveGameRepository;
  private readonly strategyFactory: StrategyFactory | undefined;
  private currentSession: GameSession | null = null;

  constructor(private readonly options: GameHostOptions = {}) {
    this.repository = options.repository ?? new FileSaveGameRepository();
    this.strategyFactory = options.strategyFactory;
    logger.info('Game host ready', { version: config.app.version, environment: config.nodeEnv });
  }

  get session(): GameSession | null {
    return this.currentSession;
  }

  get game(): Game | null {
    return this.currentSession ? this.currentSession.game : null;
  }

  /** Sets up a new game; the caller starts it with `session.run()`. */
  newGame(setup: GameSetupInput): GameSession {
    const createOptions: CreateGameOptions = {
      strategyFactory: this.strategyFactory,
      newRequestId: this.options.newRequestId,
    };
    const game = createGame(setup, createOptions);
    return this.replaceSession(new GameSession(game, { ...this.options.session }));
  }

  async saveGame(name: string): Promise<SavedGame> {
    const game = this.game;
    if (!game) {
      throw new GameNotStartedError('saveGame', { saveName: name });
    }
    return this.repository.save(name, serializeGame(game));
  }

  async loadGame(name: string): Promise<GameSession> {
    const record = await this.repository.load(name);

    let game: Game;
    try {
      game = deserializeGame(record.snapshot, this.strategyFactory ?? createStrategy);
    } catch (error) {
      if (isEngineError(error)) {
        logger.error('Saved game could not be rebuilt', { saveName: record.name, error });
        throw new CorruptSaveError(record.name, error.message, { cause: error.code, ...error.context });
      }
      throw error;
    }

    return this.replaceSession(new GameSession(game, { ...this.options.session, saveName: record.name }));
  }

  listSaves(): Promise<string[]> {
    return this.repository.list();
  }

  deleteSave(name: string): Promise<void> {
    return this.repository.delete(name);
  }

  /** Stops the current session, if any. */
  close(reason: string = 'Host closed'): void {
    this.currentSession?.stop(reason);
    this.currentSession = null;
  }

  private replaceSession(session: GameSession): GameSession {
    this.close('Replaced by another game');
    this.currentSession = session;
    logger.info('Game session ready', {
      sessionId: session.id,
      saveName: session.saveName,
      started: session.game.isStarted,
    });
    return session;
  }
}
