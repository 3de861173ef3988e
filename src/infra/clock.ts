export interface ClockPort {
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

export class FixedClock implements ClockPort {
  constructor(private readonly iso: string) {}

  nowIso(): string {
    return this.iso;
  }
}
