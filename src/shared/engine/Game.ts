import { v4 as uuidv4 } from 'uuid';
import { Board } from './board/Board';
import type { CommandContext } from './commands/Command';
import type { Decision, DecisionRequest } from './decisions';
import { isDecisionFor } from './decisions';
import { EngineErrorCode, SetupError, entityNotFound } from './errors';
import type { GameResult } from './events';
import { GameEventBus } from './events';
import { Player } from './players/Player';
import { DeployState } from './states/DeployState';
import type { GameState } from './states/GameState';
import type { Strategy } from './strategy';
import type { GamePhase, PlayerColor } from './types';
import { MAX_PLAYERS, PLAYER_COLORS, PLAYER_NAME_MAX_LENGTH } from './types';

export interface GameOptions {
  /** Seed for the board layout; random when omitted. */
  seed?: number;
  board?: Board;
  events?: GameEventBus;
  /** Source of decision request ids. */
  newRequestId?: () => string;
}

export interface SubmitResult {
  accepted: boolean;
  reason?: string;
  /** Decision pending after the submission (unchanged when rejected). */
  pending: DecisionRequest | null;
}

export interface RestoredGame {
  board: Board;
  players: Player[];
  turn: number;
  currentPlayer: Player | null;
  started: boolean;
  buildState: (game: Game) => GameState;
  events?: GameEventBus;
}

/**
 * The rules engine for one three-player game.
 *
 * The game advances on its own until it needs a player's decision, publishes
 * that request as `pendingDecision`, and waits for `submit()`. A rejected
 * decision changes nothing and leaves the same request pending. Engine calls
 * are synchronous; asking strategies for answers is the host's job.
 */
export class Game {
  readonly board: Board;
  readonly events: GameEventBus;
  readonly commandContext: CommandContext;

  private readonly playerList: Player[] = [];
  private turnNumber = 1;
  private current: Player | null = null;
  private state: GameState;
  private pending: DecisionRequest | null = null;
  private started = false;
  private finalResult: GameResult | null = null;
  private readonly requestIds: () => string;

  constructor(options: GameOptions = {}) {
    this.board = options.board ?? new Board({ seed: options.seed });
    this.events = options.events ?? new GameEventBus();
    this.requestIds = options.newRequestId ?? (() => uuidv4());
    this.commandContext = {
      board: this.board,
      events: this.events,
      newRequestId: () => this.newRequestId(),
    };
    this.board.onHexUpdated((hex) => {
      this.events.emitEvent({
        type: 'hex_updated',
        hex: hex.coord,
        controller: hex.controller?.color ?? null,
        ships: hex.shipCount,
      });
    });
    this.state = new DeployState(this);
  }

  static restore(init: RestoredGame): Game {
    const game = new Game({ board: init.board, events: init.events });
    game.playerList.push(...init.players);
    game.turnNumber = init.turn;
    game.current = init.currentPlayer;
    game.started = init.started;
    game.state = init.buildState(game);
    if (game.started) {
      game.advance();
    }
    return game;
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  /** Adds a seat; colours are assigned BLUE, GREEN, RED in join order. */
  addPlayer(name: string, strategy: Strategy): Player {
    if (this.started) {
      throw new SetupError(EngineErrorCode.SETUP_NOT_READY, 'Cannot add players once the game has started');
    }
    if (this.playerList.length >= MAX_PLAYERS) {
      throw new SetupError(EngineErrorCode.SETUP_TOO_MANY_PLAYERS, `A game has at most ${MAX_PLAYERS} players`, {
        name,
      });
    }
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new SetupError(EngineErrorCode.SETUP_INVALID_PLAYER, 'Player name must not be empty');
    }
    const player = new Player(
      trimmed.slice(0, PLAYER_NAME_MAX_LENGTH),
      PLAYER_COLORS[this.playerList.length],
      strategy
    );
    this.playerList.push(player);
    return player;
  }

  start(): DecisionRequest | null {
    if (this.started) {
      throw new SetupError(EngineErrorCode.SETUP_NOT_READY, 'Game already started');
    }
    if (this.playerList.length !== MAX_PLAYERS) {
      throw new SetupError(EngineErrorCode.SETUP_NOT_READY, `A game needs exactly ${MAX_PLAYERS} players`, {
        players: this.playerList.length,
      });
    }
    this.started = true;
    this.events.emitEvent({ type: 'phase_changed', from: null, to: this.state.phase, turn: this.turnNumber });
    this.events.emitEvent({ type: 'turn_changed', turn: this.turnNumber });
    this.advance();
    return this.pending;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Turn order; the first player leads the round. */
  get players(): readonly Player[] {
    return this.playerList;
  }

  playerByColor(color: PlayerColor): Player {
    const player = this.playerList.find((candidate) => candidate.color === color);
    if (!player) {
      throw entityNotFound('player', { color }, 'Game');
    }
    return player;
  }

  get turn(): number {
    return this.turnNumber;
  }

  get currentPlayer(): Player | null {
    return this.current;
  }

  get currentState(): GameState {
    return this.state;
  }

  get phase(): GamePhase {
    return this.state.phase;
  }

  get isStarted(): boolean {
    return this.started;
  }

  get pendingDecision(): DecisionRequest | null {
    return this.pending;
  }

  get isOver(): boolean {
    return this.finalResult !== null;
  }

  get result(): GameResult | null {
    return this.finalResult;
  }

  // ---------------------------------------------------------------------------
  // Driving the game
  // ---------------------------------------------------------------------------

  submit(decision: Decision): SubmitResult {
    const request = this.pending;
    if (request === null) {
      return { accepted: false, reason: 'No decision is pending', pending: null };
    }

    const decisionType = decision.type;
    if (!isDecisionFor(request.type, decision)) {
      return this.reject(request, `'${decisionType}' does not answer '${request.type}'`);
    }

    const outcome = this.state.apply(decision);
    if (!outcome.accepted) {
      return this.reject(request, outcome.reason);
    }

    this.pending = null;
    this.advance();
    return { accepted: true, pending: this.pending };
  }

  private reject(request: DecisionRequest, reason: string): SubmitResult {
    this.events.emitEvent({
      type: 'invalid_decision',
      player: request.player,
      requestType: request.type,
      reason,
    });
    return { accepted: false, reason, pending: request };
  }

  private advance(): void {
    for (;;) {
      const step = this.state.step();
      if (step.kind === 'decision') {
        this.pending = step.request;
        this.events.emitEvent({ type: 'decision_requested', request: step.request });
        return;
      }
      if (step.kind === 'terminal') {
        this.pending = null;
        this.setCurrentPlayer(null);
        return;
      }
      const from = this.state.phase;
      this.state = step.next;
      this.events.emitEvent({ type: 'phase_changed', from, to: step.next.phase, turn: this.turnNumber });
    }
  }

  // ---------------------------------------------------------------------------
  // Hooks for phase states
  // ---------------------------------------------------------------------------

  newRequestId(): string {
    return this.requestIds();
  }

  setCurrentPlayer(player: Player | null): void {
    if (this.current === player) {
      return;
    }
    this.current = player;
    this.events.emitEvent({ type: 'current_player_changed', player: player ? player.color : null });
  }

  /** Last player moves to the front. */
  rotatePlayers(): void {
    const last = this.playerList.pop();
    if (last) {
      this.playerList.unshift(last);
    }
    this.events.emitEvent({
      type: 'player_order_changed',
      order: this.playerList.map((player) => player.color),
    });
  }

  advanceTurn(): void {
    this.turnNumber++;
    this.events.emitEvent({ type: 'turn_changed', turn: this.turnNumber });
  }

  recordResult(result: GameResult): void {
    this.finalResult = result;
  }
}
