import { Game, MAX_PLAYERS, PLAYER_COLORS } from '../../shared/engine';
import type { GameEventBus, PlayerColor, StrategyFactory } from '../../shared/engine';
import { GameError, GameErrorCode } from '../../shared/errors';
import { GameSetupSchema } from '../../shared/validation/schemas';
import type { GameSetupInput } from '../../shared/validation/schemas';
import { config } from '../config';
import { logger } from '../utils/logger';
import { createStrategyFactory } from './strategyFactory';

export interface CreateGameOptions {
  /** Defaults to a factory seeded like the board, so seeded games replay. */
  strategyFactory?: StrategyFactory;
  events?: GameEventBus;
  newRequestId?: () => string;
}

/**
 * Validates a setup form and builds an unstarted game with one seat per
 * player, coloured BLUE, GREEN, RED in the order given.
 */
export function createGame(input: GameSetupInput, options: CreateGameOptions = {}): Game {
  const parsed = GameSetupSchema.safeParse(input);
  if (!parsed.success) {
    throw new GameError(GameErrorCode.GAME_INVALID_SETUP, 'Invalid game setup', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const setup = parsed.data;
  if (setup.players.length !== MAX_PLAYERS) {
    throw new GameError(GameErrorCode.GAME_INVALID_SETUP, `A game needs exactly ${MAX_PLAYERS} players`, {
      players: setup.players.length,
    });
  }

  const seed = setup.seed ?? config.game.seed;
  const strategyFactory = options.strategyFactory ?? createStrategyFactory({ seed });
  const game = new Game({ seed, events: options.events, newRequestId: options.newRequestId });

  for (const seat of setup.players) {
    const profile = seat.isRobot && seat.profile ? seat.profile : 'human';
    const color = game.addPlayer(seat.name, strategyFactory(profile, nextColor(game))).color;
    logger.debug('Player seated', { name: seat.name, color, profile });
  }

  logger.info('Game created', { seed: game.board.seed, players: game.players.map((player) => player.name) });
  return game;
}

/** Colour the next seat will get from `Game.addPlayer`. */
function nextColor(game: Game): PlayerColor {
  return PLAYER_COLORS[game.players.length];
}
