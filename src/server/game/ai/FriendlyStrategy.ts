import { COMMAND_IDS } from '../../../shared/engine';
import type {
  DecisionMap,
  DeployHexRequest,
  ExpandHexRequest,
  ExploitSectorRequest,
  ExploreNextRequest,
  ExploreStartRequest,
  ExterminateShipsRequest,
  ExterminateTargetRequest,
  Game,
  HexCoord,
  PlanOrderRequest,
} from '../../../shared/engine';
import { RobotStrategy } from './RobotStrategy';

const FINISH = { type: 'finish_command' } as const;

/** Odds of skipping an Exterminate altogether. */
const SKIP_INVASION_CHANCE = 0.75;

function half(count: number): number {
  return Math.floor((count + 1) / 2);
}

/**
 * Peaceful profile: plans Explore, Expand, Exterminate; spreads ships onto
 * its weakest systems; makes at most one short movement; rarely attacks and
 * then with half of what it could send.
 */
export class FriendlyStrategy extends RobotStrategy {
  readonly profile = 'friendly';

  chooseDeployHex(request: DeployHexRequest): Promise<DecisionMap['deploy_choose_hex']> {
    return this.simulateThinking<DecisionMap['deploy_choose_hex']>(() => ({ type: 'deploy', hex: request.options[0] }));
  }

  choosePlan(_request: PlanOrderRequest): Promise<DecisionMap['plan_choose_order']> {
    return this.simulateThinking<DecisionMap['plan_choose_order']>(() => ({
      type: 'plan',
      order: [COMMAND_IDS.EXPLORE, COMMAND_IDS.EXPAND, COMMAND_IDS.EXTERMINATE],
    }));
  }

  chooseExpand(request: ExpandHexRequest, game: Game): Promise<DecisionMap['expand_choose_hex']> {
    return this.simulateThinking<DecisionMap['expand_choose_hex']>(() => {
      const target = half(request.shipsAllowed);
      const weakest = this.minBy(request.options, (coord) => {
        const hex = game.board.requireHex(coord);
        return hex.shipCount + hex.level;
      });
      if (!weakest || request.shipsAdded >= target) {
        return FINISH;
      }
      return { type: 'expand', hex: weakest, ships: target - request.shipsAdded };
    });
  }

  chooseExploreStart(request: ExploreStartRequest, game: Game): Promise<DecisionMap['explore_choose_start']> {
    return this.simulateThinking<DecisionMap['explore_choose_start']>(() => {
      if (this.coinFlip() || request.movementsMade >= 1) {
        return FINISH;
      }
      const start = this.minBy(request.options, (coord) => {
        const hex = game.board.requireHex(coord);
        return hex.shipCount / Math.max(1, hex.neighbors.length);
      });
      return start ? { type: 'explore_start', hex: start } : FINISH;
    });
  }

  chooseExploreNext(request: ExploreNextRequest, game: Game): Promise<DecisionMap['explore_choose_next']> {
    return this.simulateThinking<DecisionMap['explore_choose_next']>(() => {
      // One step away from the start is far enough.
      if (request.path.length >= 2) {
        return FINISH;
      }
      const next = this.minBy(request.options, (coord) => game.board.requireHex(coord).shipCount);
      if (!next) {
        return FINISH;
      }
      const fleetAdjustment = request.path.length === 1 ? half(request.unmovedShipsAtCurrent) : 0;
      return { type: 'explore_next', hex: next, fleetAdjustment };
    });
  }

  chooseExterminateTarget(
    request: ExterminateTargetRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_target']> {
    return this.simulateThinking<DecisionMap['exterminate_choose_target']>(() => {
      if (this.rng() < SKIP_INVASION_CHANCE) {
        return FINISH;
      }
      // Fewest defenders first, then the lowest level.
      const target = this.minBy(request.options, (coord: HexCoord) => {
        const hex = game.board.requireHex(coord);
        return hex.shipCount * 10 + hex.level;
      });
      return target ? { type: 'exterminate_target', hex: target } : FINISH;
    });
  }

  chooseExterminateShips(request: ExterminateShipsRequest): Promise<DecisionMap['exterminate_choose_ships']> {
    return this.simulateThinking<DecisionMap['exterminate_choose_ships']>(() => {
      const target = half(request.maxShips);
      const first = request.options[0];
      if (!first || request.shipsCommitted >= target) {
        return FINISH;
      }
      return {
        type: 'exterminate_commit',
        hex: first.hex,
        ships: Math.min(target - request.shipsCommitted, first.uninvadedShips),
      };
    });
  }

  chooseExploitSector(request: ExploitSectorRequest, game: Game): Promise<DecisionMap['exploit_choose_sector']> {
    return this.simulateThinking<DecisionMap['exploit_choose_sector']>(() => {
      const player = game.playerByColor(request.player);
      const pick =
        this.minBy(request.options, (sectorId) => game.board.sector(sectorId).getScorePlayerExploit(player)) ??
        request.options[0];
      return { type: 'exploit', sectorId: pick };
    });
  }
}
