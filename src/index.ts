import { ParkingLot } from "./services/parkingLot";

export { ParkingLot, SERVICE_REJECTED } from "./services/parkingLot";
export type { ParkingLogger, ParkingLotOptions } from "./services/parkingLot";
export { Owner } from "./entities/owner";
export { Vehicle } from "./entities/vehicle";
export { Service } from "./entities/service";
export { loadConfig } from "./config/env";
export type { ParkingConfig } from "./config/env";
export type { VehicleCategory } from "./dtos/vehicle.dto";
export type { Result } from "./interfaces/result";

function demo() {
  const lot = new ParkingLot({ logger: console });

  lot.registerOwner('1094', 'Ana Gomez');
  lot.registerVehicle('ABC123', 2020, 'red', '1094', 'SEDAN');

  const cost = lot.registerService('ABC123', 8, 12);
  console.log('Service cost:', cost);

  const rejected = lot.tryRegisterService('ABC123', 12, 12);
  if (!rejected.ok) console.log('Rejected:', rejected.reason);

  console.log('Total revenue:', lot.totalRevenue());
  console.log('Top owner:', lot.topOwnerByHours()?.name);
}

if (require.main === module) demo();
