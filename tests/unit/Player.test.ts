import { EngineErrorCode, InvalidState } from '../../src/shared/engine';
import { catchError, createPlayers } from '../helpers/engineTestUtils';

describe('Player', () => {
  it('should start with fifteen ships in the pool', () => {
    const [blue] = createPlayers();

    expect(blue.ships).toHaveLength(15);
    expect(blue.undeployedShips()).toHaveLength(15);
    expect(blue.ships.map((ship) => ship.index)).toEqual([...Array(15).keys()]);
    expect(blue.ships.every((ship) => ship.owner === blue)).toBe(true);
  });

  it('should hand out pool ships in fleet order', () => {
    const [blue] = createPlayers();

    const taken = blue.takeFromPool(2);

    expect(taken.map((ship) => ship.index)).toEqual([0, 1]);
    expect(taken.every((ship) => ship.deployed)).toBe(true);
    expect(blue.deployedShips()).toEqual(taken);
    expect(blue.takeFromPool(1)[0].index).toBe(2);
  });

  it('should never hand out more ships than the pool holds', () => {
    const [blue] = createPlayers();

    expect(blue.takeFromPool(20)).toHaveLength(15);
    expect(blue.takeFromPool(1)).toEqual([]);
  });

  it('should count as eliminated while no ship is on the board', () => {
    const [blue] = createPlayers();

    expect(blue.isEliminated()).toBe(true);
    const [ship] = blue.takeFromPool(1);
    expect(blue.isEliminated()).toBe(false);
    ship.recall();
    expect(blue.isEliminated()).toBe(true);
  });

  it('should clear movement and invasion flags when ships are recalled or a round starts', () => {
    const [blue] = createPlayers();
    const [first, second] = blue.takeFromPool(2);
    first.markMoved();
    second.markInvaded();

    blue.resetShipsForNewRound();
    expect([first.hasMoved, second.hasInvaded]).toEqual([false, false]);

    first.markMoved();
    first.recall();
    expect(first.deployed).toBe(false);
    expect(first.hasMoved).toBe(false);
  });

  it('should ignore movement flags restored onto a pool ship', () => {
    const [blue] = createPlayers();
    const ship = blue.ships[0];

    ship.restore({ deployed: false, hasMoved: true, hasInvaded: true });

    expect([ship.deployed, ship.hasMoved, ship.hasInvaded]).toEqual([false, false, false]);
  });

  it('should keep a copy of the chosen plan', () => {
    const [blue] = createPlayers();
    const order: Array<1 | 2 | 3> = [3, 1, 2];

    blue.setChosenCommands(order);
    order[0] = 1;

    expect(blue.chosenCommands).toEqual([3, 1, 2]);
    expect(blue.commandForSubPhase(0)).toBe(3);
  });

  it('should throw InvalidState when asked for a command it never planned', () => {
    const [blue] = createPlayers();

    const error = catchError(() => blue.commandForSubPhase(0));

    expect(error).toBeInstanceOf(InvalidState);
    expect(error).toMatchObject({ code: EngineErrorCode.STATE_UNKNOWN_COMMAND });
  });
});
