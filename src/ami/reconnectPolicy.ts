export interface ReconnectPolicyOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  /** 0 means no limit. */
  maxAttempts: number;
  random?: () => number;
}

/**
 * Exponential backoff for reconnect attempts. Jitter only ever lengthens a
 * delay and the cap is applied last, so consecutive delays never shrink.
 */
export class ReconnectPolicy {
  private attempts = 0;
  private readonly random: () => number;

  constructor(private readonly options: ReconnectPolicyOptions) {
    this.random = options.random ?? Math.random;
  }

  public canRetry(): boolean {
    return this.options.maxAttempts === 0 || this.attempts < this.options.maxAttempts;
  }

  /** Records an attempt and returns how long to wait before making it. */
  public nextDelay(): number {
    this.attempts += 1;
    return this.delayFor(this.attempts);
  }

  public delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const base = this.options.baseDelayMs * Math.pow(2, exponent);
    const jittered = base * (1 + this.options.jitterRatio * this.random());
    return Math.round(Math.min(this.options.maxDelayMs, jittered));
  }

  public reset(): void {
    this.attempts = 0;
  }

  public get attemptCount(): number {
    return this.attempts;
  }
}
