import { IFeeCalculator } from "../interfaces/feeCalculator";
import { HourlyFeeCalculator } from "./hourlyFeeCalculator";
import { VehicleCategory } from "../dtos/vehicle.dto";
import { ParkingConfig } from "../config/env";

export class FeeCalculatorFactory {
  static for(category: VehicleCategory, config: ParkingConfig): IFeeCalculator {
    switch (category) {
      case 'SEDAN': return new HourlyFeeCalculator(config.rates.SEDAN, config.vipDiscountPercent);
      case 'SUV': return new HourlyFeeCalculator(config.rates.SUV, config.vipDiscountPercent);
      case 'TRUCK': return new HourlyFeeCalculator(config.rates.TRUCK, config.vipDiscountPercent);
    }
  }
}
