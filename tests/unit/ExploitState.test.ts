/**
 * Exploit and end-of-round handling: sector choice, skipped players,
 * capacity sweep, rotation of the turn order.
 */

import type { CommandId, Decision, DecisionRequest, GameEvent, PlayerColor } from '../../src/shared/engine';
import {
  createTestGame,
  driveUntil,
  passiveAnswer,
  playStandardOpening,
  submitOrFail,
} from '../helpers/engineTestUtils';

function toExploit() {
  const game = createTestGame();
  playStandardOpening(game);
  const request = driveUntil(game, (pending) => pending.type === 'exploit_choose_sector');
  return { game, request };
}

describe('ExploitState', () => {
  it('should offer each player the unscored sectors where they hold a system', () => {
    const { game, request } = toExploit();

    expect(game.phase).toBe('exploit');
    expect(request).toMatchObject({ type: 'exploit_choose_sector', player: 'BLUE', options: [0, 7] });

    const green = submitOrFail(game, { type: 'exploit', sectorId: 7 });

    expect(game.players[0].score).toBe(1);
    expect(game.board.sector(7).scored).toBe(true);
    expect(green).toMatchObject({ player: 'GREEN', options: [1, 6] });
  });

  it('should reject sectors without the player or already scored', () => {
    const { game } = toExploit();
    submitOrFail(game, { type: 'exploit', sectorId: 0 });

    expect(game.submit({ type: 'exploit', sectorId: 2 })).toMatchObject({
      accepted: false,
      reason: 'Sector already scored this round or holds none of your systems',
    });
    expect(game.players[1].score).toBe(0);
  });

  it('should skip a player who holds nothing', () => {
    const { game } = toExploit();
    const green = game.players[1];
    for (const hex of game.board.hexesOccupiedBy(green)) {
      hex.takeOldest(hex.shipCount).forEach((ship) => ship.recall());
    }

    const next = submitOrFail(game, { type: 'exploit', sectorId: 0 });

    expect(next).toMatchObject({ type: 'exploit_choose_sector', player: 'RED', options: [2, 3] });
  });

  it('should rotate the last player to the front and start the next round', () => {
    const { game } = toExploit();
    const events: GameEvent[] = [];
    game.events.onAnyEvent((event) => {
      if (event.type === 'round_ended' || event.type === 'player_order_changed' || event.type === 'turn_changed') {
        events.push(event);
      }
    });

    submitOrFail(game, { type: 'exploit', sectorId: 0 });
    submitOrFail(game, { type: 'exploit', sectorId: 1 });
    const next = submitOrFail(game, { type: 'exploit', sectorId: 2 });

    expect(events).toEqual([
      { type: 'round_ended', turn: 1, shipsRemoved: 0 },
      { type: 'player_order_changed', order: ['RED', 'BLUE', 'GREEN'] },
      { type: 'turn_changed', turn: 2 },
    ]);
    expect(game.turn).toBe(2);
    expect(game.phase).toBe('plan');
    expect(next).toMatchObject({ type: 'plan_choose_order', player: 'RED' });
    expect(game.board.sectors.some((sector) => sector.scored)).toBe(false);
    expect(game.players.map((player) => player.score)).toEqual([1, 1, 1]);
  });

  it('should send ships beyond capacity home when the round ends', () => {
    const plans: Record<PlayerColor, CommandId[]> = {
      BLUE: [1, 2, 3],
      GREEN: [2, 1, 3],
      RED: [2, 3, 1],
    };
    const answer = (request: DecisionRequest): Decision => {
      if (request.type === 'plan_choose_order') {
        return { type: 'plan', order: plans[request.player] };
      }
      if (request.type === 'expand_choose_hex' && request.player === 'BLUE') {
        return { type: 'expand', hex: { x: 1, y: 0 }, ships: 3 };
      }
      return passiveAnswer(request);
    };
    const game = createTestGame();
    const removed: number[] = [];
    game.events.onEvent('round_ended', (event) => removed.push(event.shipsRemoved));
    playStandardOpening(game);

    driveUntil(game, (request) => request.type === 'exploit_choose_sector', answer);
    const home = game.board.requireHex({ x: 1, y: 0 });
    expect(home.shipCount).toBe(5);

    driveUntil(game, (request) => request.type === 'plan_choose_order', answer);

    expect(removed).toEqual([3]);
    expect(home.ships.map((ship) => ship.index)).toEqual([5, 6]);
    expect(game.playerByColor('BLUE').undeployedShips()).toHaveLength(11);
  });
});
