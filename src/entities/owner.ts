export const DEFAULT_VIP_HOURS = 500;

export class Owner {
  private hours = 0;

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly vipHoursThreshold = DEFAULT_VIP_HOURS
  ) {}

  get accumulatedHours(): number {
    return this.hours;
  }

  // no range check: callers may pass any integer
  accumulateHours(hours: number): void {
    this.hours += hours;
  }

  isVIP(): boolean {
    return this.hours >= this.vipHoursThreshold;
  }
}
