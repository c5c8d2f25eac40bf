import { IFeeCalculator } from "../interfaces/feeCalculator";
import { ParkingStay } from "../dtos/stay.dto";

export class HourlyFeeCalculator implements IFeeCalculator {
  constructor(private perHour: number, private vipDiscountPercent = 0) {}

  calculate(stay: ParkingStay): number {
    if (!(stay.exitHour > stay.entryHour)) return 0;
    const hours = stay.exitHour - stay.entryHour;
    const gross = hours * this.perHour;
    if (!stay.vip) return gross;
    return Math.round(gross * (100 - this.vipDiscountPercent) / 100);
  }
}
