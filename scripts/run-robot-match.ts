#!/usr/bin/env ts-node
/**
 * Headless robot match.
 *
 * Seats three scripted players, plays a full game without thinking pauses
 * and logs the final scores. With --save the finished game is written to the
 * saves directory.
 *
 * Usage:
 *   npm run match -- --seed 42 --profiles aggressive,friendly,aggressive --save "robot match"
 */

import { createStrategyFactory } from '../src/server/game/strategyFactory';
import { GameHost } from '../src/server/game/GameHost';
import { logger } from '../src/server/utils/logger';
import type { GameResult } from '../src/shared/engine';
import { getExitCode, wrapError } from '../src/shared/errors';

export interface MatchConfig {
  seed?: number;
  profiles: string[];
  names: string[];
  saveName?: string;
}

const DEFAULT_PROFILES = ['aggressive', 'friendly', 'aggressive'];

export function parseMatchArgs(argv: string[]): MatchConfig {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) {
      continue;
    }
    const eqIndex = raw.indexOf('=');
    if (eqIndex !== -1) {
      args[raw.slice(2, eqIndex)] = raw.slice(eqIndex + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[raw.slice(2)] = next;
      i += 1;
    } else {
      args[raw.slice(2)] = true;
    }
  }

  const seedArg = args.seed;
  let seed: number | undefined;
  if (typeof seedArg === 'string') {
    seed = Number(seedArg);
    if (!Number.isInteger(seed) || seed < 0) {
      throw new Error(`--seed must be a non-negative integer, got "${seedArg}"`);
    }
  }

  const profilesArg = args.profiles;
  const profiles =
    typeof profilesArg === 'string'
      ? profilesArg
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      : DEFAULT_PROFILES;

  const saveArg = args.save;
  if (saveArg === true) {
    throw new Error('--save needs a name');
  }

  return {
    seed,
    profiles,
    names: profiles.map((_, index) => `Robot ${index + 1}`),
    saveName: typeof saveArg === 'string' ? saveArg : undefined,
  };
}

export async function runMatch(match: MatchConfig, host?: GameHost): Promise<GameResult | null> {
  const matchHost =
    host ??
    new GameHost({
      strategyFactory: createStrategyFactory({
        seed: match.seed,
        thinkingDelayMinMs: 0,
        thinkingDelayMaxMs: 0,
      }),
    });

  const session = matchHost.newGame({
    seed: match.seed,
    players: match.profiles.map((profile, index) => ({
      name: match.names[index],
      isRobot: true,
      profile,
    })),
  });

  const result = await session.run();
  if (result) {
    for (const line of result.scores) {
      logger.info('Final score', { player: line.name, color: line.color, score: line.score });
    }
    logger.info('Match result', { winner: result.winnerName, tie: result.tie, tiedPlayers: result.tiedPlayers });
  }

  if (match.saveName !== undefined) {
    await matchHost.saveGame(match.saveName);
  }
  return result;
}

async function main(argv: string[]): Promise<number> {
  try {
    await runMatch(parseMatchArgs(argv));
    return 0;
  } catch (error) {
    const wrapped = wrapError(error, { script: 'run-robot-match' });
    logger.error('Robot match failed', { error: wrapped.toJSON() });
    return getExitCode(error);
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
