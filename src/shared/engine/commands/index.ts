import { EngineErrorCode, InvalidState } from '../errors';
import type { Player } from '../players/Player';
import { COMMAND_IDS } from '../types';
import type { Command, CommandContext } from './Command';
import { Expand } from './Expand';
import { Explore } from './Explore';
import { Exterminate } from './Exterminate';

export { Command } from './Command';
export type { CommandContext } from './Command';
export { Expand } from './Expand';
export { Explore } from './Explore';
export type { RestoredExplore } from './Explore';
export { Exterminate } from './Exterminate';
export type { CombatResult, RestoredExterminate } from './Exterminate';

/** Builds the command a player planned. Unknown ids mean a corrupted plan. */
export function createCommand(
  commandId: number,
  context: CommandContext,
  player: Player,
  efficiency: number
): Command {
  switch (commandId) {
    case COMMAND_IDS.EXPAND:
      return new Expand(context, player, efficiency);
    case COMMAND_IDS.EXPLORE:
      return new Explore(context, player, efficiency);
    case COMMAND_IDS.EXTERMINATE:
      return new Exterminate(context, player, efficiency);
    default:
      throw new InvalidState(
        EngineErrorCode.STATE_UNKNOWN_COMMAND,
        'Unknown command id',
        { commandId, player: player.color },
        'PerformState'
      );
  }
}
