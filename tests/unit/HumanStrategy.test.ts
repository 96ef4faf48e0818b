import type { DeployHexRequest, Game } from '../../src/shared/engine';
import { HumanStrategy } from '../../src/server/game/HumanStrategy';
import { DecisionError, GameErrorCode } from '../../src/shared/errors';
import { catchError, createTestGame } from '../helpers/engineTestUtils';

function deployRequest(): { game: Game; request: DeployHexRequest } {
  const game = createTestGame();
  const request = game.start();
  if (request?.type !== 'deploy_choose_hex') {
    throw new Error('Expected the opening deploy request');
  }
  return { game, request };
}

describe('HumanStrategy', () => {
  it('should publish the request and resolve with a matching answer', async () => {
    const { game, request } = deployRequest();
    const human = new HumanStrategy();
    const seen: string[] = [];
    human.onRequest((pending) => seen.push(pending.id));

    const answer = human.chooseDeployHex(request, game);

    expect(seen).toEqual(['req-1']);
    expect(human.pendingRequest).toBe(request);
    expect(human.respond({ type: 'deploy', hex: { x: 1, y: 0 } })).toBe(true);
    await expect(answer).resolves.toEqual({ type: 'deploy', hex: { x: 1, y: 0 } });
    expect(human.pendingRequest).toBeNull();
  });

  it('should keep the request pending when the answer is of another kind', async () => {
    const { game, request } = deployRequest();
    const human = new HumanStrategy();
    const answer = human.chooseDeployHex(request, game);

    expect(human.respond({ type: 'plan', order: [1, 2, 3] })).toBe(false);
    expect(human.pendingRequest).toBe(request);

    human.respond({ type: 'deploy', hex: { x: 0, y: 2 } });
    await expect(answer).resolves.toEqual({ type: 'deploy', hex: { x: 0, y: 2 } });
  });

  it('should refuse an answer when nothing is pending', () => {
    const human = new HumanStrategy();

    const error = catchError(() => human.respond({ type: 'finish_command' }));

    expect(error).toBeInstanceOf(DecisionError);
    expect(error).toMatchObject({
      code: GameErrorCode.DECISION_NOT_PENDING,
      context: { decision: 'finish_command' },
    });
  });

  it('should reject the waiting promise on cancel', async () => {
    const { game, request } = deployRequest();
    const human = new HumanStrategy();
    const answer = human.chooseDeployHex(request, game);

    human.cancel('Game closed');

    await expect(answer).rejects.toMatchObject({
      code: GameErrorCode.DECISION_CANCELLED,
      message: 'Game closed',
      context: { requestId: 'req-1', requestType: 'deploy_choose_hex' },
    });
    expect(human.pendingRequest).toBeNull();
    expect(() => human.cancel()).not.toThrow();
  });

  it('should cancel an unanswered request when a new one arrives', async () => {
    const { game, request } = deployRequest();
    const human = new HumanStrategy();
    const first = human.chooseDeployHex(request, game);

    const second = human.chooseDeployHex({ ...request, id: 'req-9' }, game);

    await expect(first).rejects.toMatchObject({ message: 'Superseded by a new request' });
    expect(human.pendingRequest?.id).toBe('req-9');
    human.respond({ type: 'deploy', hex: { x: 1, y: 0 } });
    await expect(second).resolves.toMatchObject({ type: 'deploy' });
  });

  it('should stop notifying a listener once unsubscribed', async () => {
    const { game, request } = deployRequest();
    const human = new HumanStrategy();
    const listener = jest.fn();
    const unsubscribe = human.onRequest(listener);
    unsubscribe();

    const answer = human.chooseDeployHex(request, game);
    human.cancel();

    expect(listener).not.toHaveBeenCalled();
    await expect(answer).rejects.toBeInstanceOf(DecisionError);
  });
});
