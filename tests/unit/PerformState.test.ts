/**
 * Perform phase: efficiency matrix, execution order per sub-phase and the
 * command sequence a round produces.
 */

import {
  PerformState,
  computeEfficiencies,
  orderPlayersForSubPhase,
} from '../../src/shared/engine';
import type { CommandId, Decision, DecisionRequest, GameEvent, PlayerColor } from '../../src/shared/engine';
import {
  createPlayers,
  createTestGame,
  driveUntil,
  passiveAnswer,
  playStandardOpening,
  submitOrFail,
} from '../helpers/engineTestUtils';

const PLANS: Record<PlayerColor, CommandId[]> = {
  BLUE: [1, 2, 3],
  GREEN: [1, 3, 2],
  RED: [2, 1, 3],
};

function planFor(request: DecisionRequest): Decision {
  return request.type === 'plan_choose_order'
    ? { type: 'plan', order: PLANS[request.player] }
    : passiveAnswer(request);
}

describe('PerformState', () => {
  it('should count the players choosing each command in each sub-phase', () => {
    const players = createPlayers();
    players.forEach((player) => player.setChosenCommands(PLANS[player.color]));

    expect(computeEfficiencies(players)).toEqual([
      [0, 2, 1, 0],
      [0, 1, 1, 1],
      [0, 0, 1, 2],
    ]);
  });

  it('should run Expand before Explore before Exterminate, keeping turn order on ties', () => {
    const players = createPlayers();
    players.forEach((player) => player.setChosenCommands(PLANS[player.color]));

    const colors = (subPhase: number) =>
      orderPlayersForSubPhase(players, subPhase).map((player) => player.color);

    expect(colors(0)).toEqual(['BLUE', 'GREEN', 'RED']);
    expect(colors(1)).toEqual(['RED', 'BLUE', 'GREEN']);
    expect(colors(2)).toEqual(['GREEN', 'BLUE', 'RED']);
  });

  it('should announce every sub-phase with its efficiencies and order', () => {
    const game = createTestGame();
    const announced: GameEvent[] = [];
    game.events.onEvent('command_efficiency', (event) => announced.push(event));
    playStandardOpening(game);

    driveUntil(game, (request) => request.type === 'exploit_choose_sector', planFor);

    expect(announced).toEqual([
      {
        type: 'command_efficiency',
        subPhase: 0,
        efficiencies: { 1: 2, 2: 1, 3: 0 },
        order: ['BLUE', 'GREEN', 'RED'],
      },
      {
        type: 'command_efficiency',
        subPhase: 1,
        efficiencies: { 1: 1, 2: 1, 3: 1 },
        order: ['RED', 'BLUE', 'GREEN'],
      },
      {
        type: 'command_efficiency',
        subPhase: 2,
        efficiencies: { 1: 0, 2: 1, 3: 2 },
        order: ['GREEN', 'BLUE', 'RED'],
      },
    ]);
  });

  it('should ask only for commands that have a legal choice', () => {
    const game = createTestGame();
    playStandardOpening(game);
    const asked: string[] = [];

    driveUntil(
      game,
      (request) => {
        if (request.type !== 'plan_choose_order') {
          asked.push(`${request.player}:${request.type}`);
        }
        return request.type === 'exploit_choose_sector';
      },
      planFor
    );

    // Nobody borders an enemy system, so every Exterminate ends on its own.
    expect(asked).toEqual([
      'BLUE:expand_choose_hex',
      'GREEN:expand_choose_hex',
      'RED:explore_choose_start',
      'RED:expand_choose_hex',
      'BLUE:explore_choose_start',
      'GREEN:explore_choose_start',
      'BLUE:exploit_choose_sector',
    ]);
  });

  it('should size each command by the efficiency of its sub-phase', () => {
    const game = createTestGame();
    playStandardOpening(game);

    const request = driveUntil(game, (pending) => pending.type === 'expand_choose_hex', planFor);

    expect(game.currentState).toBeInstanceOf(PerformState);
    expect(request).toMatchObject({
      type: 'expand_choose_hex',
      player: 'BLUE',
      options: [
        { x: 1, y: 0 },
        { x: 8, y: 3 },
      ],
      shipsAdded: 0,
      shipsAllowed: 2,
    });

    const next = submitOrFail(game, { type: 'expand', hex: { x: 8, y: 3 }, ships: 2 });
    expect(next).toMatchObject({ type: 'expand_choose_hex', player: 'GREEN', shipsAllowed: 2 });
    expect(game.board.requireHex({ x: 8, y: 3 }).shipCount).toBe(4);
  });

  it('should route decisions to the running command only', () => {
    const game = createTestGame();
    playStandardOpening(game);
    driveUntil(game, (pending) => pending.type === 'expand_choose_hex', planFor);

    expect(game.submit({ type: 'exploit', sectorId: 0 })).toMatchObject({
      accepted: false,
      reason: "'exploit' does not answer 'expand_choose_hex'",
    });
    expect(game.submit({ type: 'expand', hex: { x: 0, y: 2 }, ships: 1 })).toMatchObject({
      accepted: false,
      reason: 'Hex is not a system you control',
    });
  });
});
