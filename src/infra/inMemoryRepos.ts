import { Owner } from "../entities/owner";
import { Vehicle } from "../entities/vehicle";
import { Service } from "../entities/service";

export class InMemoryOwnerRepo {
  private owners: Owner[] = [];

  constructor(initial: Owner[] = []) { this.owners = initial.slice(); }

  findById(id: string): Owner | undefined {
    return this.owners.find(o => o.id === id);
  }

  add(owner: Owner) { this.owners.push(owner); }
  list(): readonly Owner[] { return this.owners.slice(); }
}

export class InMemoryVehicleRepo {
  private vehicles: Vehicle[] = [];

  findByPlate(plate: string): Vehicle | undefined {
    return this.vehicles.find(v => v.plate === plate);
  }

  add(vehicle: Vehicle) { this.vehicles.push(vehicle); }
  list(): readonly Vehicle[] { return this.vehicles.slice(); }
}

// append-only: services are never updated or removed
export class InMemoryServiceRepo {
  private services: Service[] = [];

  add(service: Service) { this.services.push(service); }
  list(): readonly Service[] { return this.services.slice(); }
}
