/**
 * Decision requests issued by the engine and the decisions players answer
 * them with.
 *
 * Every request carries the full set of legal hexes/sectors/commands for the
 * current moment, so a strategy never has to re-derive the rules. Answers are
 * still validated by the engine; an illegal answer leaves the state untouched
 * and the same request stays pending.
 */

import type { CommandId, HexCoord, PlayerColor } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════════════════

interface DecisionRequestBase {
  /** Unique per request; a restored game issues fresh ids. */
  id: string;
  player: PlayerColor;
  prompt: string;
}

export interface DeployHexRequest extends DecisionRequestBase {
  type: 'deploy_choose_hex';
  options: HexCoord[];
  placementsMade: number;
  placementsTotal: number;
}

export interface PlanOrderRequest extends DecisionRequestBase {
  type: 'plan_choose_order';
  options: CommandId[];
}

export interface ExpandHexRequest extends DecisionRequestBase {
  type: 'expand_choose_hex';
  options: HexCoord[];
  shipsAdded: number;
  shipsAllowed: number;
}

export interface ExploreStartRequest extends DecisionRequestBase {
  type: 'explore_choose_start';
  options: HexCoord[];
  movementsMade: number;
  movementsAllowed: number;
}

export interface ExploreNextRequest extends DecisionRequestBase {
  type: 'explore_choose_next';
  options: HexCoord[];
  path: HexCoord[];
  fleetSize: number;
  /** Ships at the current end of the path that can still join the fleet. */
  unmovedShipsAtCurrent: number;
  movementsMade: number;
  movementsAllowed: number;
}

export interface ExterminateTargetRequest extends DecisionRequestBase {
  type: 'exterminate_choose_target';
  options: HexCoord[];
  invasionsMade: number;
  invasionsAllowed: number;
}

export interface InvadingHexOption {
  hex: HexCoord;
  uninvadedShips: number;
}

export interface ExterminateShipsRequest extends DecisionRequestBase {
  type: 'exterminate_choose_ships';
  target: HexCoord;
  options: InvadingHexOption[];
  defenderShips: number;
  shipsCommitted: number;
  maxShips: number;
}

export interface ExploitSectorRequest extends DecisionRequestBase {
  type: 'exploit_choose_sector';
  /** Sector ids. */
  options: number[];
}

export type DecisionRequest =
  | DeployHexRequest
  | PlanOrderRequest
  | ExpandHexRequest
  | ExploreStartRequest
  | ExploreNextRequest
  | ExterminateTargetRequest
  | ExterminateShipsRequest
  | ExploitSectorRequest;

export type DecisionRequestType = DecisionRequest['type'];

// ═══════════════════════════════════════════════════════════════════════════
// DECISIONS
// ═══════════════════════════════════════════════════════════════════════════

export interface DeployDecision {
  type: 'deploy';
  hex: HexCoord;
}

export interface PlanDecision {
  type: 'plan';
  order: CommandId[];
}

export interface ExpandDecision {
  type: 'expand';
  hex: HexCoord;
  ships: number;
}

export interface ExploreStartDecision {
  type: 'explore_start';
  hex: HexCoord;
}

/**
 * Move the fleet one hex. A positive adjustment first picks up that many
 * unmoved ships at the current hex; a negative one leaves ships behind.
 */
export interface ExploreNextDecision {
  type: 'explore_next';
  hex: HexCoord;
  fleetAdjustment: number;
}

/** Land the fleet where it stands, ending the current movement. */
export interface ExploreStopMovementDecision {
  type: 'explore_stop_movement';
}

export interface ExterminateTargetDecision {
  type: 'exterminate_target';
  hex: HexCoord;
}

export interface ExterminateCommitDecision {
  type: 'exterminate_commit';
  hex: HexCoord;
  ships: number;
}

export interface ExterminateStopInvasionDecision {
  type: 'exterminate_stop_invasion';
}

export interface ExploitDecision {
  type: 'exploit';
  sectorId: number;
}

/** End the whole command early. */
export interface FinishCommandDecision {
  type: 'finish_command';
}

export type Decision =
  | DeployDecision
  | PlanDecision
  | ExpandDecision
  | ExploreStartDecision
  | ExploreNextDecision
  | ExploreStopMovementDecision
  | ExterminateTargetDecision
  | ExterminateCommitDecision
  | ExterminateStopInvasionDecision
  | ExploitDecision
  | FinishCommandDecision;

export type DecisionType = Decision['type'];

/** Which answers each request accepts. */
export interface DecisionMap {
  deploy_choose_hex: DeployDecision;
  plan_choose_order: PlanDecision;
  expand_choose_hex: ExpandDecision | FinishCommandDecision;
  explore_choose_start: ExploreStartDecision | FinishCommandDecision;
  explore_choose_next: ExploreNextDecision | ExploreStopMovementDecision | FinishCommandDecision;
  exterminate_choose_target: ExterminateTargetDecision | FinishCommandDecision;
  exterminate_choose_ships:
    | ExterminateCommitDecision
    | ExterminateStopInvasionDecision
    | FinishCommandDecision;
  exploit_choose_sector: ExploitDecision;
}

export type DecisionFor<R extends DecisionRequest> = DecisionMap[R['type']];

export const ALLOWED_DECISIONS: { [K in DecisionRequestType]: ReadonlyArray<DecisionMap[K]['type']> } = {
  deploy_choose_hex: ['deploy'],
  plan_choose_order: ['plan'],
  expand_choose_hex: ['expand', 'finish_command'],
  explore_choose_start: ['explore_start', 'finish_command'],
  explore_choose_next: ['explore_next', 'explore_stop_movement', 'finish_command'],
  exterminate_choose_target: ['exterminate_target', 'finish_command'],
  exterminate_choose_ships: ['exterminate_commit', 'exterminate_stop_invasion', 'finish_command'],
  exploit_choose_sector: ['exploit'],
};

export function isDecisionFor<T extends DecisionRequestType>(
  requestType: T,
  decision: Decision
): decision is DecisionMap[T] {
  const allowed: ReadonlyArray<DecisionType> = ALLOWED_DECISIONS[requestType];
  return allowed.includes(decision.type);
}

/** Outcome of validating and applying one decision. */
export type DecisionOutcome = { accepted: true } | { accepted: false; reason: string };

export const ACCEPTED: DecisionOutcome = { accepted: true };

export function rejected(reason: string): DecisionOutcome {
  return { accepted: false, reason };
}
