/**
 * Game setup, the submit contract and the deploy and plan phases.
 */

import { EngineErrorCode, Game, SetupError } from '../../src/shared/engine';
import type { GameEvent } from '../../src/shared/engine';
import {
  STANDARD_OPENING,
  ScriptedStrategy,
  catchError,
  createTestGame,
  playStandardOpening,
  submitOrFail,
  testBoard,
} from '../helpers/engineTestUtils';

describe('Game', () => {
  describe('setup', () => {
    it('should assign colours in join order and trim long names', () => {
      const game = new Game({ board: testBoard() });

      const first = game.addPlayer('  Maximilian  ', new ScriptedStrategy());
      const second = game.addPlayer('Bo', new ScriptedStrategy());

      expect([first.name, first.color]).toEqual(['Maximil', 'BLUE']);
      expect([second.name, second.color]).toEqual(['Bo', 'GREEN']);
    });

    it('should refuse an empty name and a fourth player', () => {
      const game = createTestGame();

      expect(catchError(() => game.addPlayer('Dana', new ScriptedStrategy()))).toMatchObject({
        code: EngineErrorCode.SETUP_TOO_MANY_PLAYERS,
      });
      expect(catchError(() => new Game().addPlayer('   ', new ScriptedStrategy()))).toMatchObject({
        code: EngineErrorCode.SETUP_INVALID_PLAYER,
      });
    });

    it('should only start with exactly three players, and only once', () => {
      const short = new Game({ board: testBoard() });
      short.addPlayer('Alpha', new ScriptedStrategy());

      const error = catchError(() => short.start());
      expect(error).toBeInstanceOf(SetupError);
      expect(error).toMatchObject({ code: EngineErrorCode.SETUP_NOT_READY });

      const game = createTestGame();
      game.start();
      expect(() => game.start()).toThrow(SetupError);
      expect(() => game.addPlayer('Late', new ScriptedStrategy())).toThrow(SetupError);
    });

    it('should generate a seeded board when none is given', () => {
      expect(new Game({ seed: 11 }).board.seed).toBe(11);
    });
  });

  describe('submit', () => {
    it('should report that nothing is pending before the game starts', () => {
      const game = createTestGame();

      expect(game.submit({ type: 'deploy', hex: { x: 1, y: 0 } })).toEqual({
        accepted: false,
        reason: 'No decision is pending',
        pending: null,
      });
    });

    it('should reject a decision of the wrong type and keep the same request', () => {
      const events: GameEvent[] = [];
      const game = createTestGame();
      game.events.onEvent('invalid_decision', (event) => events.push(event));
      const request = game.start();

      const outcome = game.submit({ type: 'plan', order: [1, 2, 3] });

      expect(outcome).toEqual({
        accepted: false,
        reason: "'plan' does not answer 'deploy_choose_hex'",
        pending: request,
      });
      expect(game.pendingDecision).toBe(request);
      expect(events).toEqual([
        {
          type: 'invalid_decision',
          player: 'BLUE',
          requestType: 'deploy_choose_hex',
          reason: "'plan' does not answer 'deploy_choose_hex'",
        },
      ]);
    });

    it('should issue a fresh request id for every request', () => {
      const game = createTestGame();
      const first = game.start();
      const second = submitOrFail(game, { type: 'deploy', hex: { x: 1, y: 0 } });

      expect(first?.id).toBe('req-1');
      expect(second?.id).toBe('req-2');
    });
  });

  describe('deploy phase', () => {
    it('should open with every level-1 system outside the central sector', () => {
      const game = createTestGame();
      const request = game.start();

      expect(game.phase).toBe('deploy');
      expect(game.currentPlayer?.color).toBe('BLUE');
      expect(request).toEqual({
        id: 'req-1',
        player: 'BLUE',
        prompt: 'Choose a level-1 system to deploy 2 ships',
        type: 'deploy_choose_hex',
        options: [
          { x: 1, y: 0 },
          { x: 2, y: 1 },
          { x: 0, y: 2 },
          { x: 1, y: 2 },
          { x: 0, y: 4 },
          { x: 0, y: 5 },
          { x: 4, y: 0 },
          { x: 5, y: 0 },
          { x: 3, y: 4 },
          { x: 5, y: 4 },
          { x: 8, y: 1 },
          { x: 8, y: 0 },
          { x: 8, y: 3 },
          { x: 6, y: 3 },
          { x: 6, y: 5 },
          { x: 6, y: 4 },
        ],
        placementsMade: 0,
        placementsTotal: 6,
      });
    });

    it('should deploy in snake order', () => {
      const game = createTestGame();
      const deployers: string[] = [];
      let pending = game.start();

      for (const hex of STANDARD_OPENING) {
        deployers.push(pending?.player ?? 'none');
        pending = submitOrFail(game, { type: 'deploy', hex });
      }

      expect(deployers).toEqual(['BLUE', 'GREEN', 'RED', 'RED', 'GREEN', 'BLUE']);
    });

    it('should close a sector once anyone has deployed in it', () => {
      const game = createTestGame();
      game.start();

      const next = submitOrFail(game, { type: 'deploy', hex: { x: 1, y: 0 } });

      expect(next?.type).toBe('deploy_choose_hex');
      if (next?.type === 'deploy_choose_hex') {
        expect(next.options).toHaveLength(14);
        expect(next.options).not.toContainEqual({ x: 2, y: 1 });
      }
      expect(game.submit({ type: 'deploy', hex: { x: 2, y: 1 } })).toMatchObject({
        accepted: false,
        reason: 'Deploy on a level-1 system in an empty, non-central sector',
      });
    });

    it('should refuse level-2 systems and the Tri-Prime', () => {
      const game = createTestGame();
      game.start();

      expect(game.submit({ type: 'deploy', hex: { x: 0, y: 0 } }).accepted).toBe(false);
      expect(game.submit({ type: 'deploy', hex: { x: 4, y: 2 } }).accepted).toBe(false);
      expect(game.board.hexes.every((hex) => hex.shipCount === 0)).toBe(true);
    });

    it('should place two ships per deployment and move on to planning', () => {
      const events: GameEvent[] = [];
      const game = createTestGame();
      game.events.onEvent('phase_changed', (event) => events.push(event));

      const pending = playStandardOpening(game);

      expect(STANDARD_OPENING.map((coord) => game.board.requireHex(coord).shipCount)).toEqual([
        2, 2, 2, 2, 2, 2,
      ]);
      expect(game.board.requireHex({ x: 8, y: 3 }).controller?.color).toBe('BLUE');
      expect(game.board.requireHex({ x: 4, y: 0 }).controller?.color).toBe('RED');
      expect(game.players.map((player) => player.undeployedShips().length)).toEqual([11, 11, 11]);
      expect(game.phase).toBe('plan');
      expect(pending).toMatchObject({ type: 'plan_choose_order', player: 'BLUE', options: [1, 2, 3] });
      expect(events).toEqual([
        { type: 'phase_changed', from: null, to: 'deploy', turn: 1 },
        { type: 'phase_changed', from: 'deploy', to: 'plan', turn: 1 },
      ]);
    });
  });

  describe('plan phase', () => {
    it('should ask every player in turn order for a plan', () => {
      const game = createTestGame();
      playStandardOpening(game);

      const second = submitOrFail(game, { type: 'plan', order: [3, 2, 1] });
      const third = submitOrFail(game, { type: 'plan', order: [1, 2, 3] });

      expect(second?.player).toBe('GREEN');
      expect(third?.player).toBe('RED');
      expect(game.players[0].chosenCommands).toEqual([3, 2, 1]);
    });

    it('should reject plans that do not use each command once', () => {
      const game = createTestGame();
      playStandardOpening(game);

      expect(game.submit({ type: 'plan', order: [1, 1, 2] })).toMatchObject({
        accepted: false,
        reason: 'The plan must order Expand, Explore and Exterminate once each',
      });
      expect(game.submit({ type: 'plan', order: [1, 2] }).accepted).toBe(false);
      expect(game.players[0].chosenCommands).toBeNull();
    });
  });
});
