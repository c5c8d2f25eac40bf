import { ParkingStay } from "../dtos/stay.dto";

export interface IFeeCalculator {
  calculate(stay: ParkingStay): number;
}
