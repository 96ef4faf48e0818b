import { v4 as uuidv4 } from 'uuid';
import type { Decision, Game, GameResult } from '../../shared/engine';
import { DecisionRejectedTooOftenError, GameErrorCode, isGameError } from '../../shared/errors';
import { deriveGameSessionStatus } from '../../shared/stateMachines/gameSession';
import type { GameSessionStatus } from '../../shared/stateMachines/gameSession';
import { config } from '../config';
import { logger, runWithGameContext } from '../utils/logger';
import { HumanStrategy } from './HumanStrategy';
import { PlayerInteractionManager } from './PlayerInteractionManager';

export interface GameSessionOptions {
  sessionId?: string;
  /** Shown in log lines when the game came from (or went to) a save. */
  saveName?: string;
  /** Consecutive rejected decisions a robot may make before the session aborts. */
  maxRejectedDecisions?: number;
}

/**
 * GameSession drives a single game from its current pending decision to the
 * end:
 * - Starts the game if it has not been started
 * - Routes each pending request to the seat's strategy
 * - Submits the answer and asks again when the engine rejects it
 * - Logs phase changes, rejected decisions and the final result
 *
 * Human seats are asked through their HumanStrategy and may retry any number
 * of times. A robot that keeps answering illegally aborts the session with a
 * DecisionError.
 */
export class GameSession {
  readonly id: string;
  readonly saveName: string | undefined;

  private readonly interaction: PlayerInteractionManager;
  private readonly maxRejectedDecisions: number;
  private running: Promise<GameResult | null> | null = null;
  private stopReason: string | undefined;

  constructor(
    readonly game: Game,
    options: GameSessionOptions = {}
  ) {
    this.id = options.sessionId ?? uuidv4();
    this.saveName = options.saveName;
    this.maxRejectedDecisions = options.maxRejectedDecisions ?? config.game.maxRejectedDecisions;
    this.interaction = new PlayerInteractionManager(game);
  }

  get status(): GameSessionStatus {
    return deriveGameSessionStatus(this.game, this.stopReason);
  }

  get isStopped(): boolean {
    return this.stopReason !== undefined;
  }

  /**
   * Plays until the game ends. Resolves with the result, or with null when
   * the session was stopped first. Calling it again returns the same run.
   */
  run(): Promise<GameResult | null> {
    if (!this.running) {
      this.running = runWithGameContext(
        { sessionId: this.id, saveName: this.saveName, seed: this.game.board.seed },
        () => this.loop()
      );
    }
    return this.running;
  }

  /** Stops driving the game; a human decision still pending is cancelled. */
  stop(reason: string = 'Session stopped'): void {
    if (this.stopReason !== undefined || this.game.isOver) {
      return;
    }
    this.stopReason = reason;
    logger.info('Game session stopped', { reason, turn: this.game.turn, phase: this.game.phase });
    for (const player of this.game.players) {
      if (player.strategy instanceof HumanStrategy) {
        player.strategy.cancel(reason);
      }
    }
  }

  private async loop(): Promise<GameResult | null> {
    const unsubscribers = this.attachLogging();
    try {
      if (!this.game.isStarted) {
        this.game.start();
      }

      let rejections = 0;
      while (this.stopReason === undefined) {
        const request = this.game.pendingDecision;
        if (!request) {
          break;
        }

        logger.debug('Decision requested', {
          requestId: request.id,
          requestType: request.type,
          player: request.player,
        });

        let decision: Decision;
        try {
          decision = await this.interaction.requestDecision(request);
        } catch (error) {
          if (this.isStopped && isGameError(error) && error.code === GameErrorCode.DECISION_CANCELLED) {
            break;
          }
          throw error;
        }
        if (this.isStopped) {
          break;
        }

        logger.debug('Decision received', { requestId: request.id, decision });
        const outcome = this.game.submit(decision);
        if (outcome.accepted) {
          rejections = 0;
          continue;
        }

        rejections++;
        const player = this.game.playerByColor(request.player);
        if (player.strategy.profile !== 'human' && rejections >= this.maxRejectedDecisions) {
          throw new DecisionRejectedTooOftenError(player.name, rejections, outcome.reason ?? 'rejected', {
            requestType: request.type,
            profile: player.strategy.profile,
          });
        }
      }

      return this.game.result;
    } catch (error) {
      logger.error('Game session failed', {
        error,
        turn: this.game.turn,
        phase: this.game.phase,
      });
      throw error;
    } finally {
      unsubscribers.forEach((unsubscribe) => unsubscribe());
    }
  }

  private attachLogging(): Array<() => void> {
    const events = this.game.events;
    return [
      events.onEvent('phase_changed', (event) => {
        logger.info('Phase changed', { from: event.from, to: event.to, turn: event.turn });
      }),
      events.onEvent('invalid_decision', (event) => {
        logger.warn('Decision rejected', {
          player: event.player,
          requestType: event.requestType,
          reason: event.reason,
        });
      }),
      events.onEvent('game_ended', (event) => {
        logger.info('Game ended', {
          winner: event.winnerName,
          tie: event.tie,
          scores: event.scores.map((line) => `${line.name}=${line.score}`),
        });
      }),
    ];
  }
}
