import type { Decision, DecisionRequest, Game, Strategy } from '../../shared/engine';

/**
 * PlayerInteractionManager is the bridge between the pure game engine and the
 * strategies that answer its decision requests.
 *
 * The engine only publishes a pending `DecisionRequest`; this class routes it
 * to the seat's strategy method for that decision point. Whether the answer
 * is legal is still the engine's call (see `Game.submit`).
 */
export class PlayerInteractionManager {
  constructor(private readonly game: Game) {}

  async requestDecision(request: DecisionRequest): Promise<Decision> {
    const strategy = this.game.playerByColor(request.player).strategy;
    return this.route(strategy, request);
  }

  private route(strategy: Strategy, request: DecisionRequest): Promise<Decision> {
    switch (request.type) {
      case 'deploy_choose_hex':
        return strategy.chooseDeployHex(request, this.game);
      case 'plan_choose_order':
        return strategy.choosePlan(request, this.game);
      case 'expand_choose_hex':
        return strategy.chooseExpand(request, this.game);
      case 'explore_choose_start':
        return strategy.chooseExploreStart(request, this.game);
      case 'explore_choose_next':
        return strategy.chooseExploreNext(request, this.game);
      case 'exterminate_choose_target':
        return strategy.chooseExterminateTarget(request, this.game);
      case 'exterminate_choose_ships':
        return strategy.chooseExterminateShips(request, this.game);
      case 'exploit_choose_sector':
        return strategy.chooseExploitSector(request, this.game);
      default: {
        const unhandled: never = request;
        return Promise.reject(new Error(`Unhandled decision request: ${JSON.stringify(unhandled)}`));
      }
    }
  }
}
