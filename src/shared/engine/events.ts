/**
 * Game Event Bus - typed notifications for presentation layers and logs.
 *
 * The engine emits an event for every observable change: phase and turn
 * changes, the current player, command efficiencies, deployments, combat,
 * scoring and hex updates. Listeners run synchronously inside the engine call
 * that caused the change and must not drive the game from inside a handler.
 *
 * Usage:
 * ```typescript
 * const off = game.events.onEvent('combat_resolved', (event) => {
 *   console.log(`${event.attacker} lost ${event.attackerLosses} ships`);
 * });
 * off();
 * ```
 */

import { EventEmitter } from 'events';
import type { DecisionRequest } from './decisions';
import type { CommandId, GamePhase, HexCoord, PlayerColor } from './types';

export interface ScoreLine {
  color: PlayerColor;
  name: string;
  score: number;
}

export interface GameResult {
  winner: PlayerColor;
  winnerName: string;
  scores: ScoreLine[];
  /** True when more than one player shares the top score. */
  tie: boolean;
  tiedPlayers: PlayerColor[];
}

export type GameEvent =
  | { type: 'decision_requested'; request: DecisionRequest }
  | { type: 'invalid_decision'; player: PlayerColor; requestType: DecisionRequest['type']; reason: string }
  | { type: 'phase_changed'; from: GamePhase | null; to: GamePhase; turn: number }
  | { type: 'turn_changed'; turn: number }
  | { type: 'current_player_changed'; player: PlayerColor | null }
  | { type: 'player_order_changed'; order: PlayerColor[] }
  | {
      type: 'command_efficiency';
      subPhase: number;
      /** Players choosing each command in this sub-phase, keyed by command id. */
      efficiencies: Record<CommandId, number>;
      order: PlayerColor[];
    }
  | { type: 'ships_deployed'; player: PlayerColor; hex: HexCoord; count: number }
  | {
      type: 'combat_resolved';
      attacker: PlayerColor;
      defender: PlayerColor | null;
      from: HexCoord;
      target: HexCoord;
      committed: number;
      attackerLosses: number;
      defenderLosses: number;
      shipsLanded: number;
      controlTransferred: boolean;
    }
  | {
      type: 'sector_scored';
      sectorId: number;
      endOfGame: boolean;
      awards: Array<{ player: PlayerColor; hex: HexCoord; points: number }>;
    }
  | { type: 'round_ended'; turn: number; shipsRemoved: number }
  | ({ type: 'game_ended' } & GameResult)
  | { type: 'hex_updated'; hex: HexCoord; controller: PlayerColor | null; ships: number };

export type GameEventType = GameEvent['type'];

export type GameEventOf<T extends GameEventType> = Extract<GameEvent, { type: T }>;

const ANY_EVENT = '*';

export class GameEventBus extends EventEmitter {
  emitEvent(event: GameEvent): void {
    this.emit(event.type, event);
    this.emit(ANY_EVENT, event);
  }

  /** Subscribe to one event type; returns an unsubscribe function. */
  onEvent<T extends GameEventType>(type: T, listener: (event: GameEventOf<T>) => void): () => void {
    this.on(type, listener);
    return () => {
      this.off(type, listener);
    };
  }

  onAnyEvent(listener: (event: GameEvent) => void): () => void {
    this.on(ANY_EVENT, listener);
    return () => {
      this.off(ANY_EVENT, listener);
    };
  }
}
