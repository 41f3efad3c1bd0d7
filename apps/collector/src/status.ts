export type CollectorState = 'unauthenticated' | 'polling';

export interface StatusSnapshot {
  status: 'ok' | 'degraded';
  state: CollectorState;
  cyclesRun: number;
  cyclesFailed: number;
  pointsWritten: number;
  lastSuccessAt: string | null;
  lastErrorAt: string | null;
  lastError: string | null;
}

/**
 * Running tally of the collector, read by the health endpoint
 */
export class CollectorStatus {
  state: CollectorState = 'unauthenticated';
  private cyclesRun = 0;
  private cyclesFailed = 0;
  private pointsWritten = 0;
  private lastSuccessAt: Date | null = null;
  private lastErrorAt: Date | null = null;
  private lastError: string | null = null;
  private lastCycleOk: boolean | null = null;

  recordSuccess(points: number, at: Date): void {
    this.cyclesRun += 1;
    this.pointsWritten += points;
    this.lastSuccessAt = at;
    this.lastCycleOk = true;
  }

  recordFailure(message: string, at: Date, points = 0): void {
    this.cyclesRun += 1;
    this.cyclesFailed += 1;
    this.pointsWritten += points;
    this.lastErrorAt = at;
    this.lastError = message;
    this.lastCycleOk = false;
  }

  snapshot(): StatusSnapshot {
    return {
      status: this.lastCycleOk === false ? 'degraded' : 'ok',
      state: this.state,
      cyclesRun: this.cyclesRun,
      cyclesFailed: this.cyclesFailed,
      pointsWritten: this.pointsWritten,
      lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
      lastErrorAt: this.lastErrorAt?.toISOString() ?? null,
      lastError: this.lastError,
    };
  }
}
