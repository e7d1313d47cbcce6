export interface ClockPort {
  nowIso(): string;
  nowMs(): number;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }

  nowMs(): number {
    return Date.now();
  }
}

/** Calendar day in UTC, `YYYY-MM-DD`. Usage counters are bucketed by this. */
export function utcDay(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}
