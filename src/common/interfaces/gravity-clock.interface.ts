export interface GravityClock {
  intervalMs: number;
  accumulatedMs: number;
  lastPollAt: number | null;
  gravityTicks: number;
}

export interface ClockAdvance {
  clock: GravityClock;
  gravityDue: boolean;
}
