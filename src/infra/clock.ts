export interface ClockPort {
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

export function clockNowMs(clock: ClockPort): number {
  return Date.parse(clock.nowIso());
}
