import type { Sector } from '../board/Sector';
import type { StateSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, ExploitSectorRequest } from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Game } from '../Game';
import type { Player } from '../players/Player';
import { EndRoundState } from './EndRoundState';
import { GameState } from './GameState';
import type { StateStep } from './GameState';

/**
 * Each player, in turn order, scores one sector that has not been scored
 * this round and in which they hold a system. Players with no such sector
 * are skipped.
 */
export class ExploitState extends GameState {
  readonly phase = 'exploit';
  private playerIndex: number;

  constructor(game: Game, playerIndex = 0) {
    super(game);
    this.playerIndex = playerIndex;
  }

  scorableSectors(player: Player): Sector[] {
    return this.game.board.sectors.filter(
      (sector) => !sector.scored && sector.isOccupiedBy(player)
    );
  }

  step(): StateStep {
    const players = this.game.players;
    while (this.playerIndex < players.length) {
      const player = players[this.playerIndex];
      const options = this.scorableSectors(player);
      if (options.length === 0) {
        this.playerIndex++;
        continue;
      }
      this.game.setCurrentPlayer(player);
      const request: ExploitSectorRequest = {
        id: this.game.newRequestId(),
        player: player.color,
        prompt: 'Choose a sector to exploit',
        type: 'exploit_choose_sector',
        options: options.map((sector) => sector.id),
      };
      return { kind: 'decision', request };
    }
    return { kind: 'transition', next: new EndRoundState(this.game) };
  }

  override apply(decision: Decision): DecisionOutcome {
    if (decision.type !== 'exploit') {
      return super.apply(decision);
    }
    const player = this.game.players[this.playerIndex];
    const sector = this.scorableSectors(player).find((candidate) => candidate.id === decision.sectorId);
    if (!sector) {
      return rejected('Sector already scored this round or holds none of your systems');
    }
    const awards = sector.scoreSector(false);
    this.game.events.emitEvent({
      type: 'sector_scored',
      sectorId: sector.id,
      endOfGame: false,
      awards: awards.map((award) => ({
        player: award.player.color,
        hex: award.hex.coord,
        points: award.points,
      })),
    });
    this.playerIndex++;
    return ACCEPTED;
  }

  snapshot(): StateSnapshot {
    return { phase: this.phase, playerIndex: this.playerIndex };
  }
}
