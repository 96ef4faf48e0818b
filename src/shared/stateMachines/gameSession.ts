import type { DecisionRequestType, Game, GamePhase, GameResult, PlayerColor } from '../engine';

/**
 * Explicit session-level view of a game, derived from the {@link Game}. This
 * does not replace the engine as the source of truth; it is a smaller lens
 * for hosts that show "waiting", "whose turn" and "game over" screens.
 */

export interface WaitingForPlayersSession {
  kind: 'waiting_for_players';
  seatsTaken: number;
}

export interface ActiveTurnSession {
  kind: 'active_turn';
  turn: number;
  phase: GamePhase;
  currentPlayer: PlayerColor | null;
  /** Decision point the game is waiting on, if any. */
  awaiting: DecisionRequestType | null;
}

export interface CompletedSession {
  kind: 'completed';
  result: GameResult;
}

export interface AbandonedSession {
  kind: 'abandoned';
  turn: number;
  phase: GamePhase;
  /** Why the session stopped before the game ended. */
  reason: string;
}

export type GameSessionStatus =
  | WaitingForPlayersSession
  | ActiveTurnSession
  | CompletedSession
  | AbandonedSession;

/**
 * Pure derivation of a {@link GameSessionStatus}. `abandonReason` is set by
 * the host once it stops driving the game early.
 */
export function deriveGameSessionStatus(game: Game, abandonReason?: string): GameSessionStatus {
  const result = game.result;
  if (result) {
    return { kind: 'completed', result };
  }

  if (abandonReason !== undefined) {
    return { kind: 'abandoned', turn: game.turn, phase: game.phase, reason: abandonReason };
  }

  if (!game.isStarted) {
    return { kind: 'waiting_for_players', seatsTaken: game.players.length };
  }

  return {
    kind: 'active_turn',
    turn: game.turn,
    phase: game.phase,
    currentPlayer: game.currentPlayer ? game.currentPlayer.color : null,
    awaiting: game.pendingDecision ? game.pendingDecision.type : null,
  };
}
