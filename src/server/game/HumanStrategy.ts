import { isDecisionFor } from '../../shared/engine';
import type {
  Decision,
  DecisionMap,
  DecisionRequest,
  DecisionRequestType,
  DeployHexRequest,
  ExpandHexRequest,
  ExploitSectorRequest,
  ExploreNextRequest,
  ExploreStartRequest,
  ExterminateShipsRequest,
  ExterminateTargetRequest,
  Game,
  PlanOrderRequest,
  Strategy,
} from '../../shared/engine';
import { DecisionError, GameErrorCode } from '../../shared/errors';

interface PendingDecision {
  request: DecisionRequest;
  /** Resolves the waiting promise when the decision fits the request type. */
  accept: (decision: Decision) => boolean;
  reject: (error: Error) => void;
}

export type DecisionRequestListener = (request: DecisionRequest) => void;

/**
 * Strategy for a seat played from a user interface.
 *
 * Each request stays pending until the presentation layer calls `respond()`.
 * The answer is only matched against the request type here; the engine
 * decides whether it is legal and the session asks again when it is not.
 */
export class HumanStrategy implements Strategy {
  readonly profile = 'human';

  private pending: PendingDecision | null = null;
  private readonly listeners = new Set<DecisionRequestListener>();

  get pendingRequest(): DecisionRequest | null {
    return this.pending ? this.pending.request : null;
  }

  /** Called whenever a new request starts waiting for this seat. */
  onRequest(listener: DecisionRequestListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Answers the pending request. Returns false, keeping the request pending,
   * when the decision is of a kind the request does not take.
   */
  respond(decision: Decision): boolean {
    const pending = this.pending;
    if (!pending) {
      throw new DecisionError(GameErrorCode.DECISION_NOT_PENDING, 'No decision is waiting for an answer', {
        decision: decision.type,
      });
    }
    if (!pending.accept(decision)) {
      return false;
    }
    this.pending = null;
    return true;
  }

  /** Rejects the pending request, e.g. when the game is closed or replaced. */
  cancel(reason: string = 'Decision cancelled'): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.reject(
      new DecisionError(GameErrorCode.DECISION_CANCELLED, reason, {
        requestId: pending.request.id,
        requestType: pending.request.type,
      })
    );
  }

  chooseDeployHex(request: DeployHexRequest, _game: Game): Promise<DecisionMap['deploy_choose_hex']> {
    return this.ask('deploy_choose_hex', request);
  }

  choosePlan(request: PlanOrderRequest): Promise<DecisionMap['plan_choose_order']> {
    return this.ask('plan_choose_order', request);
  }

  chooseExpand(request: ExpandHexRequest): Promise<DecisionMap['expand_choose_hex']> {
    return this.ask('expand_choose_hex', request);
  }

  chooseExploreStart(request: ExploreStartRequest): Promise<DecisionMap['explore_choose_start']> {
    return this.ask('explore_choose_start', request);
  }

  chooseExploreNext(request: ExploreNextRequest): Promise<DecisionMap['explore_choose_next']> {
    return this.ask('explore_choose_next', request);
  }

  chooseExterminateTarget(
    request: ExterminateTargetRequest
  ): Promise<DecisionMap['exterminate_choose_target']> {
    return this.ask('exterminate_choose_target', request);
  }

  chooseExterminateShips(
    request: ExterminateShipsRequest
  ): Promise<DecisionMap['exterminate_choose_ships']> {
    return this.ask('exterminate_choose_ships', request);
  }

  chooseExploitSector(request: ExploitSectorRequest): Promise<DecisionMap['exploit_choose_sector']> {
    return this.ask('exploit_choose_sector', request);
  }

  private ask<T extends DecisionRequestType>(type: T, request: DecisionRequest): Promise<DecisionMap[T]> {
    // A new request supersedes one nobody answered.
    this.cancel('Superseded by a new request');

    const answer = new Promise<DecisionMap[T]>((resolve, reject) => {
      this.pending = {
        request,
        accept: (decision) => {
          if (!isDecisionFor(type, decision)) {
            return false;
          }
          resolve(decision);
          return true;
        },
        reject,
      };
    });
    this.listeners.forEach((listener) => listener(request));
    return answer;
  }
}
