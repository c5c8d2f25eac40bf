import { v4 as uuid } from 'uuid';
import { Vehicle } from "./vehicle";
import { IFeeCalculator } from "../interfaces/feeCalculator";

/**
 * One completed parking event. The cost is priced once, when the service is
 * built, so a later change in the owner's VIP status never reprices history.
 */
export class Service {
  readonly id = uuid();
  readonly cost: number;

  constructor(
    readonly entryHour: number,
    readonly exitHour: number,
    readonly vehicle: Vehicle,
    calculator: IFeeCalculator
  ) {
    if (!(Number.isInteger(entryHour) && Number.isInteger(exitHour) && exitHour > entryHour)) {
      throw new Error('InvalidHours');
    }
    this.cost = calculator.calculate({
      entryHour,
      exitHour,
      category: vehicle.category,
      vip: vehicle.owner.isVIP(),
    });
  }

  hours(): number {
    return this.exitHour - this.entryHour;
  }
}
