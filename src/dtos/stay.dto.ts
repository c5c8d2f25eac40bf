import { VehicleCategory } from "./vehicle.dto";

// what a fee calculator needs to price one service
export interface ParkingStay {
  entryHour: number;
  exitHour: number;
  category: VehicleCategory;
  vip: boolean;
}
