/**
 * Robot Strategy Base Class
 * Shared plumbing for the scripted seats: a seeded random source, the
 * simulated thinking pause and a few selection helpers.
 */

import { createRng, randomInt, randomSeed } from '../../../shared/engine';
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
  Rng,
  Strategy,
  StrategyProfile,
} from '../../../shared/engine';
import { config } from '../../config';

export interface RobotConfig {
  /** Seed for the robot's own choices; random when omitted. */
  seed?: number;
  rng?: Rng;
  thinkingDelayMinMs?: number;
  thinkingDelayMaxMs?: number;
}

export interface RobotThinkingListener {
  (event: { profile: StrategyProfile; phase: 'thinking' | 'done'; delayMs: number }): void;
}

/**
 * Base robot strategy
 * Both scripted profiles extend this class
 */
export abstract class RobotStrategy implements Strategy {
  abstract readonly profile: StrategyProfile;

  protected readonly rng: Rng;
  private readonly thinkMinMs: number;
  private readonly thinkMaxMs: number;
  private readonly thinkingListeners = new Set<RobotThinkingListener>();

  constructor(robotConfig: RobotConfig = {}) {
    this.rng = robotConfig.rng ?? createRng(robotConfig.seed ?? randomSeed());
    this.thinkMinMs = robotConfig.thinkingDelayMinMs ?? config.robots.thinkingDelayMinMs;
    this.thinkMaxMs = Math.max(this.thinkMinMs, robotConfig.thinkingDelayMaxMs ?? config.robots.thinkingDelayMaxMs);
  }

  abstract chooseDeployHex(request: DeployHexRequest, game: Game): Promise<DecisionMap['deploy_choose_hex']>;
  abstract choosePlan(request: PlanOrderRequest, game: Game): Promise<DecisionMap['plan_choose_order']>;
  abstract chooseExpand(request: ExpandHexRequest, game: Game): Promise<DecisionMap['expand_choose_hex']>;
  abstract chooseExploreStart(
    request: ExploreStartRequest,
    game: Game
  ): Promise<DecisionMap['explore_choose_start']>;
  abstract chooseExploreNext(
    request: ExploreNextRequest,
    game: Game
  ): Promise<DecisionMap['explore_choose_next']>;
  abstract chooseExterminateTarget(
    request: ExterminateTargetRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_target']>;
  abstract chooseExterminateShips(
    request: ExterminateShipsRequest,
    game: Game
  ): Promise<DecisionMap['exterminate_choose_ships']>;
  abstract chooseExploitSector(
    request: ExploitSectorRequest,
    game: Game
  ): Promise<DecisionMap['exploit_choose_sector']>;

  /** Notified before and after each thinking pause, for "is thinking" displays. */
  onThinking(listener: RobotThinkingListener): () => void {
    this.thinkingListeners.add(listener);
    return () => {
      this.thinkingListeners.delete(listener);
    };
  }

  /**
   * Simulate thinking time for better UX
   * Waits a random delay between the configured bounds, then returns the choice
   */
  protected async simulateThinking<T>(choose: () => T): Promise<T> {
    const delayMs = this.thinkMinMs + randomInt(this.rng, this.thinkMaxMs - this.thinkMinMs + 1);
    this.notifyThinking('thinking', delayMs);
    if (delayMs > 0) {
      await new Promise<void>((resolve) => {
        setTimeout(resolve, delayMs);
      });
    }
    this.notifyThinking('done', delayMs);
    return choose();
  }

  protected coinFlip(): boolean {
    return this.rng() < 0.5;
  }

  /**
   * First element with the highest score; undefined for an empty array
   */
  protected maxBy<T>(items: readonly T[], score: (item: T) => number): T | undefined {
    let best: T | undefined;
    let bestScore = -Infinity;
    for (const item of items) {
      const value = score(item);
      if (value > bestScore) {
        best = item;
        bestScore = value;
      }
    }
    return best;
  }

  protected minBy<T>(items: readonly T[], score: (item: T) => number): T | undefined {
    return this.maxBy(items, (item) => -score(item));
  }

  private notifyThinking(phase: 'thinking' | 'done', delayMs: number): void {
    this.thinkingListeners.forEach((listener) => listener({ profile: this.profile, phase, delayMs }));
  }
}
