import { InMemoryOwnerRepo, InMemoryVehicleRepo, InMemoryServiceRepo } from "../infra/inMemoryRepos";
import { FeeCalculatorFactory } from "./feeCalculatorFactory";
import { Owner } from "../entities/owner";
import { Vehicle } from "../entities/vehicle";
import { Service } from "../entities/service";
import { VehicleCategory } from "../dtos/vehicle.dto";
import {
  ParkingConfig, loadConfig,
  MIN_ENTRY_HOUR, MAX_ENTRY_HOUR, MIN_EXIT_HOUR, MAX_EXIT_HOUR
} from "../config/env";
import {
  Result, ok, fail,
  OwnerRejection, VehicleRejection, HoursRejection, ServiceRejection
} from "../interfaces/result";

export const SERVICE_REJECTED = -1;

export type ParkingLogger = Pick<Console, 'info' | 'warn'>;

export interface ParkingLotOptions {
  config?: ParkingConfig;
  logger?: ParkingLogger;
}

/**
 * Coordinates owners, vehicles and billed services for a single lot.
 *
 * The boolean and numeric operations keep their plain return values; each has a
 * `try*` twin that reports which check rejected the call.
 */
export class ParkingLot {
  private owners = new InMemoryOwnerRepo();
  private vehicles = new InMemoryVehicleRepo();
  private services = new InMemoryServiceRepo();
  private config: ParkingConfig;
  private logger?: ParkingLogger;

  constructor(options: ParkingLotOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger;
  }

  findOwner(id: string): Owner | undefined {
    return this.owners.findById(id);
  }

  findVehicle(plate: string): Vehicle | undefined {
    return this.vehicles.findByPlate(plate);
  }

  tryRegisterOwner(id: string, name: string): Result<Owner, OwnerRejection> {
    if (this.findOwner(id)) return this.reject('registerOwner', id, 'DUPLICATE_OWNER');

    const owner = new Owner(id, name, this.config.vipHoursThreshold);
    this.owners.add(owner);
    this.logger?.info(`owner registered: ${id}`);
    return ok(owner);
  }

  registerOwner(id: string, name: string): boolean {
    return this.tryRegisterOwner(id, name).ok;
  }

  tryRegisterVehicle(
    plate: string,
    year: number,
    color: string,
    ownerId: string,
    category: VehicleCategory
  ): Result<Vehicle, VehicleRejection> {
    if (this.findVehicle(plate)) return this.reject('registerVehicle', plate, 'DUPLICATE_VEHICLE');

    const owner = this.findOwner(ownerId);
    if (!owner) return this.reject('registerVehicle', plate, 'OWNER_NOT_FOUND');

    const vehicle = new Vehicle(plate, year, color, owner, category);
    this.vehicles.add(vehicle);
    this.logger?.info(`vehicle registered: ${plate} (${category}) for owner ${ownerId}`);
    return ok(vehicle);
  }

  registerVehicle(plate: string, year: number, color: string, ownerId: string, category: VehicleCategory): boolean {
    return this.tryRegisterVehicle(plate, year, color, ownerId, category).ok;
  }

  tryAccumulateHours(ownerId: string, hours: number): Result<number, HoursRejection> {
    const owner = this.findOwner(ownerId);
    if (!owner) return this.reject('accumulateHours', ownerId, 'OWNER_NOT_FOUND');

    owner.accumulateHours(hours);
    return ok(owner.accumulatedHours);
  }

  accumulateHours(ownerId: string, hours: number): boolean {
    return this.tryAccumulateHours(ownerId, hours).ok;
  }

  tryRegisterService(plate: string, entryHour: number, exitHour: number): Result<Service, ServiceRejection> {
    if (!Number.isInteger(entryHour) || entryHour < MIN_ENTRY_HOUR || entryHour > MAX_ENTRY_HOUR) {
      return this.reject('registerService', plate, 'ENTRY_HOUR_OUT_OF_RANGE');
    }
    if (!Number.isInteger(exitHour) || exitHour < MIN_EXIT_HOUR || exitHour > MAX_EXIT_HOUR) {
      return this.reject('registerService', plate, 'EXIT_HOUR_OUT_OF_RANGE');
    }
    if (exitHour <= entryHour) return this.reject('registerService', plate, 'EXIT_NOT_AFTER_ENTRY');

    const vehicle = this.findVehicle(plate);
    if (!vehicle) return this.reject('registerService', plate, 'VEHICLE_NOT_FOUND');

    // priced before the hours land, so the VIP discount reflects prior usage only
    const calculator = FeeCalculatorFactory.for(vehicle.category, this.config);
    const service = new Service(entryHour, exitHour, vehicle, calculator);
    this.accumulateHours(vehicle.owner.id, service.hours());
    this.services.add(service);
    this.logger?.info(`service ${service.id} registered: ${plate} ${entryHour}-${exitHour}h, cost ${service.cost}`);
    return ok(service);
  }

  /** Returns the service cost, or SERVICE_REJECTED when any check fails. */
  registerService(plate: string, entryHour: number, exitHour: number): number {
    const result = this.tryRegisterService(plate, entryHour, exitHour);
    return result.ok ? result.value.cost : SERVICE_REJECTED;
  }

  totalRevenue(): number {
    return this.services.list().reduce((total, s) => total + s.cost, 0);
  }

  countVIPOwners(): number {
    return this.owners.list().filter(o => o.isVIP()).length;
  }

  // ties keep the earliest registered owner
  topOwnerByHours(): Owner | undefined {
    let top: Owner | undefined;
    for (const owner of this.owners.list()) {
      if (!top || owner.accumulatedHours > top.accumulatedHours) top = owner;
    }
    return top;
  }

  getOwners(): readonly Owner[] { return this.owners.list(); }
  getVehicles(): readonly Vehicle[] { return this.vehicles.list(); }
  getServices(): readonly Service[] { return this.services.list(); }

  private reject<E extends string>(operation: string, key: string, reason: E): { ok: false; reason: E } {
    this.logger?.warn(`${operation} rejected for ${key}: ${reason}`);
    return fail(reason);
  }
}
