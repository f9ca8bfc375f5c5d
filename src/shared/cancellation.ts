// Cancellation token - lets the operator stop a run at its safe points

export class CancellationToken {
  private _isCancelled = false;
  private _reason = 'Operation was cancelled';
  private readonly _listeners: Array<(reason: string) => void> = [];

  get isCancelled(): boolean {
    return this._isCancelled;
  }

  get reason(): string {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (this._isCancelled) return;
    this._isCancelled = true;
    if (reason) this._reason = reason;
    for (const listener of this._listeners) {
      listener(this._reason);
    }
  }

  throwIfCancelled(): void {
    if (this._isCancelled) {
      throw new StopRequestedError(this._reason);
    }
  }

  onCancel(callback: (reason: string) => void): void {
    this._listeners.push(callback);
  }
}

/** Operator-initiated stop. Not a failure; reported as "stopped". */
export class StopRequestedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StopRequestedError';
  }
}

export function createCancellationToken(): CancellationToken {
  return new CancellationToken();
}
