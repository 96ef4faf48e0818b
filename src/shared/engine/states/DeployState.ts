import type { Hex } from '../board/Hex';
import type { StateSnapshot } from '../contracts/schemas';
import type { Decision, DecisionOutcome, DeployHexRequest } from '../decisions';
import { ACCEPTED, rejected } from '../decisions';
import type { Game } from '../Game';
import type { Player } from '../players/Player';
import { SHIPS_PER_DEPLOYMENT, coordKey } from '../types';
import { GameState } from './GameState';
import type { StateStep } from './GameState';
import { PlanState } from './PlanState';

/**
 * Opening placement. Each player places two ships twice, in snake order
 * (first to last, then last to first), on a level-1 system of a sector
 * nobody has entered yet. The central sector is off limits.
 */
export class DeployState extends GameState {
  readonly phase = 'deploy';
  private placementsMade: number;

  constructor(game: Game, placementsMade = 0) {
    super(game);
    this.placementsMade = placementsMade;
  }

  get placementsTotal(): number {
    return this.game.players.length * 2;
  }

  get placementCount(): number {
    return this.placementsMade;
  }

  currentDeployer(): Player {
    const count = this.game.players.length;
    const index = Math.min(this.placementsMade, 2 * count - 1 - this.placementsMade);
    return this.game.players[index];
  }

  canInitDeploy(hex: Hex): boolean {
    const sector = this.game.board.sectorOf(hex);
    return hex.level === 1 && sector !== undefined && !sector.isCentral && !sector.isOccupied();
  }

  deploymentOptions(): Hex[] {
    return this.game.board.systems.filter((hex) => this.canInitDeploy(hex));
  }

  step(): StateStep {
    if (this.placementsMade >= this.placementsTotal) {
      return { kind: 'transition', next: new PlanState(this.game) };
    }
    const player = this.currentDeployer();
    this.game.setCurrentPlayer(player);
    const request: DeployHexRequest = {
      id: this.game.newRequestId(),
      player: player.color,
      prompt: `Choose a level-1 system to deploy ${SHIPS_PER_DEPLOYMENT} ships`,
      type: 'deploy_choose_hex',
      options: this.deploymentOptions().map((hex) => hex.coord),
      placementsMade: this.placementsMade,
      placementsTotal: this.placementsTotal,
    };
    return { kind: 'decision', request };
  }

  /** Places two ships of the current deployer. Returns false when the hex is not allowed. */
  deploy(hex: Hex): boolean {
    if (this.placementsMade >= this.placementsTotal || !this.canInitDeploy(hex)) {
      return false;
    }
    const player = this.currentDeployer();
    hex.addShips(player.takeFromPool(SHIPS_PER_DEPLOYMENT));
    this.game.events.emitEvent({
      type: 'ships_deployed',
      player: player.color,
      hex: hex.coord,
      count: SHIPS_PER_DEPLOYMENT,
    });
    this.placementsMade++;
    return true;
  }

  override apply(decision: Decision): DecisionOutcome {
    if (decision.type !== 'deploy') {
      return super.apply(decision);
    }
    const key = coordKey(decision.hex);
    const hex = this.deploymentOptions().find((candidate) => candidate.key === key);
    if (!hex || !this.deploy(hex)) {
      return rejected('Deploy on a level-1 system in an empty, non-central sector');
    }
    return ACCEPTED;
  }

  snapshot(): StateSnapshot {
    return { phase: this.phase, placementsMade: this.placementsMade };
  }
}
