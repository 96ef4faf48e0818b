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
  PlanOrderRequest,
} from '../../../shared/engine';
import { RobotStrategy } from './RobotStrategy';

const FINISH = { type: 'finish_command' } as const;

/**
 * Attacks first and commits everything it can: plans Exterminate, Explore,
 * Expand; reinforces its strongest system; moves whole stacks; throws every
 * ship of the first invading hex at a target.
 */
export class AggressiveStrategy extends RobotStrategy {
  readonly profile = 'aggressive';

  chooseDeployHex(request: DeployHexRequest): Promise<DecisionMap['deploy_choose_hex']> {
    return this.simulateThinking<DecisionMap['deploy_choose_hex']>(() => ({ type: 'deploy', hex: request.options[0] }));
  }

  choosePlan(_request: PlanOrderRequest): Promise<DecisionMap['plan_choose_order']> {
    return this.simulateThinking<DecisionMap['plan_choose_order']>(() => ({
      type: 'plan',
      order: [COMMAND_IDS.EXTERMINATE, COMMAND_IDS.EXPLORE, COMMAND_IDS.EXPAND],
    }));
  }

  chooseExpand(request: ExpandHexRequest, game: Game): Promise<DecisionMap['expand_choose_hex']> {
    return this.simulateThinking<DecisionMap['expand_choose_hex']>(() => {
      const best = this.maxBy(request.options, (coord) => {
        const hex = game.board.requireHex(coord);
        return hex.shipCount + hex.level;
      });
      if (!best) {
        return FINISH;
      }
      return { type: 'expand', hex: best, ships: request.shipsAllowed - request.shipsAdded };
    });
  }

  chooseExploreStart(request: ExploreStartRequest, game: Game): Promise<DecisionMap['explore_choose_start']> {
    return this.simulateThinking<DecisionMap['explore_choose_start']>(() => {
      const best = this.maxBy(request.options, (coord) => {
        const hex = game.board.requireHex(coord);
        return hex.shipCount / Math.max(1, hex.neighbors.length);
      });
      return best ? { type: 'explore_start', hex: best } : FINISH;
    });
  }

  chooseExploreNext(request: ExploreNextRequest, game: Game): Promise<DecisionMap['explore_choose_next']> {
    return this.simulateThinking<DecisionMap['explore_choose_next']>(() => {
      const best = this.maxBy(request.options, (coord) => game.board.requireHex(coord).shipCount);
      if (!best) {
        return { type: 'explore_stop_movement' };
      }
      return { type: 'explore_next', hex: best, fleetAdjustment: request.unmovedShipsAtCurrent };
    });
  }

  chooseExterminateTarget(
    request: ExterminateTargetRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_target']> {
    return this.simulateThinking<DecisionMap['exterminate_choose_target']>(() => {
      // Either the weakest or the strongest target, on a coin flip.
      const defenders = (coord: { x: number; y: number }): number => game.board.requireHex(coord).shipCount;
      const target = this.coinFlip()
        ? this.minBy(request.options, defenders)
        : this.maxBy(request.options, defenders);
      return target ? { type: 'exterminate_target', hex: target } : FINISH;
    });
  }

  chooseExterminateShips(request: ExterminateShipsRequest): Promise<DecisionMap['exterminate_choose_ships']> {
    return this.simulateThinking<DecisionMap['exterminate_choose_ships']>(() => {
      const first = request.options[0];
      if (!first) {
        return { type: 'exterminate_stop_invasion' };
      }
      return { type: 'exterminate_commit', hex: first.hex, ships: first.uninvadedShips };
    });
  }

  chooseExploitSector(request: ExploitSectorRequest, game: Game): Promise<DecisionMap['exploit_choose_sector']> {
    return this.simulateThinking<DecisionMap['exploit_choose_sector']>(() => {
      const player = game.playerByColor(request.player);
      const best =
        this.maxBy(request.options, (sectorId) => game.board.sector(sectorId).getScorePlayerExploit(player)) ??
        request.options[0];
      return { type: 'exploit', sectorId: best };
    });
  }
}
