import { StopRequestedError, createCancellationToken } from '../../src/shared/cancellation.js';

describe('CancellationToken', () => {
  it('throws the stop reason once cancelled and notifies listeners once', () => {
    const token = createCancellationToken();
    const reasons: string[] = [];
    token.onCancel((reason) => reasons.push(reason));

    expect(() => token.throwIfCancelled()).not.toThrow();

    token.cancel('Stopped by operator');
    token.cancel('again');

    expect(token.isCancelled).toBe(true);
    expect(reasons).toEqual(['Stopped by operator']);
    expect(() => token.throwIfCancelled()).toThrow(StopRequestedError);
    expect(() => token.throwIfCancelled()).toThrow('Stopped by operator');
  });
});
