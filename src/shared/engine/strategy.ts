import type {
  DecisionMap,
  DeployHexRequest,
  ExpandHexRequest,
  ExploitSectorRequest,
  ExploreNextRequest,
  ExploreStartRequest,
  ExterminateShipsRequest,
  ExterminateTargetRequest,
  PlanOrderRequest,
} from './decisions';
import type { Game } from './Game';
import type { PlayerColor } from './types';

export type StrategyProfile = 'human' | 'aggressive' | 'friendly';

export const STRATEGY_PROFILES: readonly StrategyProfile[] = ['human', 'aggressive', 'friendly'];

/**
 * Decision policy of one player.
 *
 * The engine never calls a strategy itself: a host (see GameSession) asks the
 * current player's strategy for an answer and submits it to the game. Each
 * method receives the pending request, which already lists the legal choices,
 * together with the game for any further inspection.
 */
export interface Strategy {
  readonly profile: StrategyProfile;

  chooseDeployHex(
    request: DeployHexRequest,
    game: Game
  ): Promise<DecisionMap['deploy_choose_hex']>;

  choosePlan(request: PlanOrderRequest, game: Game): Promise<DecisionMap['plan_choose_order']>;

  chooseExpand(request: ExpandHexRequest, game: Game): Promise<DecisionMap['expand_choose_hex']>;

  chooseExploreStart(
    request: ExploreStartRequest,
    game: Game
  ): Promise<DecisionMap['explore_choose_start']>;

  chooseExploreNext(
    request: ExploreNextRequest,
    game: Game
  ): Promise<DecisionMap['explore_choose_next']>;

  chooseExterminateTarget(
    request: ExterminateTargetRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_target']>;

  chooseExterminateShips(
    request: ExterminateShipsRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_ships']>;

  chooseExploitSector(
    request: ExploitSectorRequest,
    game: Game
  ): Promise<DecisionMap['exploit_choose_sector']>;
}

/** Rebuilds a strategy for a seat when a stored game is loaded. */
export type StrategyFactory = (profile: StrategyProfile, color: PlayerColor) => Strategy;
