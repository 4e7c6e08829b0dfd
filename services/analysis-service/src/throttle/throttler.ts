export type FrameThrottler = {
  tryAcquire: () => boolean;
  msUntilNextAccept: () => number;
  reset: () => void;
};

/**
 * Drops streaming frames that arrive within `minIntervalMs` of the last accepted
 * one. Nothing is queued: a rejected frame is gone, so the next accepted frame is
 * always the newest.
 */
export class AnalysisThrottler implements FrameThrottler {
  private lastSubmissionTime: number | null = null;

  constructor(
    readonly minIntervalMs = 500,
    private readonly now: () => number = () => performance.now()
  ) {}

  tryAcquire(): boolean {
    const current = this.now();
    if (this.lastSubmissionTime !== null && current - this.lastSubmissionTime < this.minIntervalMs) {
      return false;
    }
    this.lastSubmissionTime = current;
    return true;
  }

  msUntilNextAccept(): number {
    if (this.lastSubmissionTime === null) {
      return 0;
    }
    return Math.max(0, this.minIntervalMs - (this.now() - this.lastSubmissionTime));
  }

  reset(): void {
    this.lastSubmissionTime = null;
  }
}
