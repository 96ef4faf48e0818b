/**
 * Exterminate: target selection, one-for-one combat, control transfer,
 * reinforcement of a held target and the invasion limits.
 */

import { Exterminate } from '../../src/shared/engine';
import type { GameEvent } from '../../src/shared/engine';
import { createCommandContext, createPlayers, placeShips } from '../helpers/engineTestUtils';

function setup(efficiency = 1) {
  const context = createCommandContext();
  const [blue, green, red] = createPlayers();
  const events: GameEvent[] = [];
  context.events.onAnyEvent((event) => events.push(event));
  const exterminate = new Exterminate(context, blue, efficiency);
  return { board: context.board, blue, green, red, events, exterminate };
}

describe('Exterminate', () => {
  it('should offer enemy systems next to a hex with ships able to invade', () => {
    const { board, blue, red, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 3);
    placeShips(board, { x: 2, y: 1 }, red, 5);
    // Not a system, so never a target.
    placeShips(board, { x: 0, y: 1 }, red, 1);

    expect(exterminate.nextRequest()).toMatchObject({
      type: 'exterminate_choose_target',
      player: 'BLUE',
      options: [{ x: 2, y: 1 }],
      invasionsMade: 0,
      invasionsAllowed: 3,
    });
  });

  it('should trade ships one for one when the attack is too small', () => {
    const { board, blue, red, events, exterminate } = setup();
    const from = placeShips(board, { x: 1, y: 0 }, blue, 3);
    const target = placeShips(board, { x: 2, y: 1 }, red, 5);

    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });
    expect(exterminate.nextRequest()).toMatchObject({
      type: 'exterminate_choose_ships',
      target: { x: 2, y: 1 },
      options: [{ hex: { x: 1, y: 0 }, uninvadedShips: 3 }],
      defenderShips: 5,
      shipsCommitted: 0,
      maxShips: 3,
    });

    expect(exterminate.apply({ type: 'exterminate_commit', hex: { x: 1, y: 0 }, ships: 3 })).toEqual({
      accepted: true,
    });

    expect(from.shipCount).toBe(0);
    expect(target.controller).toBe(red);
    expect(target.ships.map((ship) => ship.index)).toEqual([3, 4]);
    expect(blue.undeployedShips()).toHaveLength(15);
    expect(red.undeployedShips()).toHaveLength(13);
    expect(events.find((event) => event.type === 'combat_resolved')).toEqual({
      type: 'combat_resolved',
      attacker: 'BLUE',
      defender: 'RED',
      from: { x: 1, y: 0 },
      target: { x: 2, y: 1 },
      committed: 3,
      attackerLosses: 3,
      defenderLosses: 3,
      shipsLanded: 0,
      controlTransferred: false,
    });

    // Nothing left to attack with.
    expect(exterminate.nextRequest()).toBeNull();
    expect(exterminate.invasionsMade).toBe(1);
  });

  it('should land survivors and take the system when the attack is larger', () => {
    const { board, blue, red, exterminate } = setup();
    const from = placeShips(board, { x: 1, y: 0 }, blue, 5);
    const target = placeShips(board, { x: 2, y: 1 }, red, 2);

    expect(exterminate.startInvadingHex(target)).toBe(true);
    const result = exterminate.addShipsInvadingHex(from, 5);

    expect(result).toEqual({
      attackerLosses: 2,
      defenderLosses: 2,
      shipsLanded: 3,
      controlTransferred: true,
    });
    expect(target.controller).toBe(blue);
    expect(target.shipCount).toBe(3);
    expect(target.ships.every((ship) => ship.hasInvaded)).toBe(true);
    expect(from.shipCount).toBe(0);
    expect(red.isEliminated()).toBe(true);
  });

  it('should not let ships that invaded this round invade again', () => {
    const { board, blue, red, exterminate } = setup();
    const from = placeShips(board, { x: 1, y: 0 }, blue, 5);
    const target = placeShips(board, { x: 2, y: 1 }, red, 2);
    placeShips(board, { x: 2, y: 2 }, red, 1);

    exterminate.startInvadingHex(target);
    exterminate.addShipsInvadingHex(from, 5);

    // (2,2) touches (2,1), but every ship there has already invaded.
    expect(exterminate.hexesCanInvade()).toEqual([]);
    expect(exterminate.nextRequest()).toBeNull();
  });

  it('should cap commitments at the ships available when the invasion started', () => {
    const { board, blue, red, exterminate } = setup();
    const from = placeShips(board, { x: 1, y: 0 }, blue, 4);
    const target = placeShips(board, { x: 2, y: 1 }, red, 1);

    exterminate.startInvadingHex(target);
    exterminate.addShipsInvadingHex(from, 2);

    expect(exterminate.shipsUsedCurrentInvasion).toBe(2);
    expect(exterminate.maxShipsCurrentInvasion).toBe(4);
    expect(exterminate.canAddShipsInvadingHex(from, 3)).toBe(false);
    expect(exterminate.canAddShipsInvadingHex(from, 2)).toBe(true);
  });

  it('should reinforce a target already taken during the same invasion', () => {
    const { board, blue, red, events, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 4);
    const target = placeShips(board, { x: 2, y: 1 }, red, 1);

    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });
    exterminate.apply({ type: 'exterminate_commit', hex: { x: 1, y: 0 }, ships: 2 });
    expect(exterminate.nextRequest()).toMatchObject({
      type: 'exterminate_choose_ships',
      options: [{ hex: { x: 1, y: 0 }, uninvadedShips: 2 }],
      defenderShips: 0,
      shipsCommitted: 2,
      maxShips: 4,
    });

    exterminate.apply({ type: 'exterminate_commit', hex: { x: 1, y: 0 }, ships: 2 });

    expect(target.controller).toBe(blue);
    expect(target.shipCount).toBe(3);
    const combats = events.filter((event) => event.type === 'combat_resolved');
    expect(combats).toHaveLength(2);
    expect(combats[1]).toMatchObject({
      defender: null,
      attackerLosses: 0,
      shipsLanded: 2,
      controlTransferred: false,
    });
  });

  it('should gather every adjacent held hex as a launch point', () => {
    const { board, blue, red, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 1);
    placeShips(board, { x: 1, y: 1 }, blue, 2);
    placeShips(board, { x: 2, y: 1 }, red, 2);

    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });

    expect(exterminate.nextRequest()).toMatchObject({
      options: [
        { hex: { x: 1, y: 0 }, uninvadedShips: 1 },
        { hex: { x: 1, y: 1 }, uninvadedShips: 2 },
      ],
      maxShips: 3,
    });
  });

  it('should reject commitments from other hexes or of an impossible size', () => {
    const { board, blue, red, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 2);
    placeShips(board, { x: 0, y: 1 }, blue, 1);
    const target = placeShips(board, { x: 2, y: 1 }, red, 1);
    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });

    expect(exterminate.apply({ type: 'exterminate_commit', hex: { x: 0, y: 1 }, ships: 1 })).toEqual({
      accepted: false,
      reason: 'Ships cannot be sent from this hex',
    });
    expect(exterminate.apply({ type: 'exterminate_commit', hex: { x: 1, y: 0 }, ships: 3 })).toEqual({
      accepted: false,
      reason: 'Ship count must be between 1 and 2',
    });
    expect(target.controller).toBe(red);
  });

  it('should count a stopped invasion and offer the next target', () => {
    const { board, blue, red, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 2);
    placeShips(board, { x: 2, y: 1 }, red, 1);
    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });

    expect(exterminate.apply({ type: 'exterminate_stop_invasion' })).toEqual({ accepted: true });

    expect(exterminate.nextRequest()).toMatchObject({
      type: 'exterminate_choose_target',
      invasionsMade: 1,
    });
  });

  it('should finish once the invasion allowance is used', () => {
    const { board, blue, red, exterminate } = setup(3);
    placeShips(board, { x: 1, y: 0 }, blue, 2);
    placeShips(board, { x: 2, y: 1 }, red, 1);
    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });
    exterminate.apply({ type: 'exterminate_stop_invasion' });

    expect(exterminate.nextRequest()).toBeNull();
    expect(exterminate.isFinished).toBe(true);
  });

  it('should refuse a second target while an invasion is in progress', () => {
    const { board, blue, red, exterminate } = setup();
    placeShips(board, { x: 1, y: 0 }, blue, 2);
    placeShips(board, { x: 2, y: 1 }, red, 1);
    exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } });

    expect(exterminate.apply({ type: 'exterminate_target', hex: { x: 2, y: 1 } })).toEqual({
      accepted: false,
      reason: 'An invasion is already in progress',
    });
  });
});
