import { PLAYER_COLORS } from '../../shared/engine';
import type { PlayerColor, Strategy, StrategyFactory, StrategyProfile } from '../../shared/engine';
import { AggressiveStrategy } from './ai/AggressiveStrategy';
import { FriendlyStrategy } from './ai/FriendlyStrategy';
import type { RobotConfig } from './ai/RobotStrategy';
import { HumanStrategy } from './HumanStrategy';

export interface StrategyFactoryOptions extends Omit<RobotConfig, 'seed' | 'rng'> {
  /**
   * Base seed for robot choices. Each seat derives its own seed from it so a
   * seeded match replays identically.
   */
  seed?: number;
}

/**
 * Builds strategies by profile. Used by game setup and when a saved game is
 * loaded, where only the profile name is stored.
 */
export function createStrategyFactory(options: StrategyFactoryOptions = {}): StrategyFactory {
  return (profile: StrategyProfile, color: PlayerColor): Strategy => {
    const robotConfig: RobotConfig = {
      thinkingDelayMinMs: options.thinkingDelayMinMs,
      thinkingDelayMaxMs: options.thinkingDelayMaxMs,
      seed: options.seed === undefined ? undefined : options.seed + PLAYER_COLORS.indexOf(color) + 1,
    };
    switch (profile) {
      case 'human':
        return new HumanStrategy();
      case 'aggressive':
        return new AggressiveStrategy(robotConfig);
      case 'friendly':
        return new FriendlyStrategy(robotConfig);
    }
  };
}

export const createStrategy: StrategyFactory = createStrategyFactory();
