// ============================================================================
// Provider Health Tracking
// ============================================================================

export interface HealthSnapshot {
  provider: string;
  score: number;
  attempts: number;
  successes: number;
  last_error?: string;
  last_updated?: Date;
}

/**
 * Rolling success rate over the last `window` attempts of one provider.
 * Each provider owns its tracker; updating one never touches another.
 */
export class HealthTracker {
  readonly provider: string;
  readonly window: number;
  private _outcomes: boolean[] = [];
  private _lastError?: string;
  private _lastUpdated?: Date;

  constructor(provider: string, window = 20) {
    if (!Number.isInteger(window) || window < 1) {
      throw new RangeError(`Health window must be a positive integer, got ${window}`);
    }
    this.provider = provider;
    this.window = window;
  }

  recordSuccess(): void {
    this.push(true);
  }

  recordFailure(error?: Error): void {
    this.push(false);
    if (error) this._lastError = `${error.name}: ${error.message}`;
  }

  /** successes / attempts in the window; 1 when nothing has been recorded. */
  get score(): number {
    if (this._outcomes.length === 0) return 1;
    return this.successes / this._outcomes.length;
  }

  get attempts(): number {
    return this._outcomes.length;
  }

  get successes(): number {
    return this._outcomes.filter(Boolean).length;
  }

  snapshot(): HealthSnapshot {
    return {
      provider: this.provider,
      score: this.score,
      attempts: this.attempts,
      successes: this.successes,
      last_error: this._lastError,
      last_updated: this._lastUpdated,
    };
  }

  reset(): void {
    this._outcomes = [];
    this._lastError = undefined;
    this._lastUpdated = undefined;
  }

  private push(ok: boolean): void {
    this._outcomes.push(ok);
    if (this._outcomes.length > this.window) {
      this._outcomes.shift();
    }
    this._lastUpdated = new Date();
  }
}
