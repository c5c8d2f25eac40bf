import { Owner } from "./owner";
import { VehicleCategory } from "../dtos/vehicle.dto";

export class Vehicle {
  constructor(
    readonly plate: string,
    readonly year: number,
    readonly color: string,
    readonly owner: Owner,
    readonly category: VehicleCategory
  ) {}
}
