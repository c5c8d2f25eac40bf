import { Owner } from "../src/entities/owner";
import { Vehicle } from "../src/entities/vehicle";
import { Service } from "../src/entities/service";
import { IFeeCalculator } from "../src/interfaces/feeCalculator";

test('owner starts with zero hours and becomes VIP at the threshold', () => {
  const owner = new Owner('1', 'Ana', 10);
  expect(owner.accumulatedHours).toBe(0);
  owner.accumulateHours(9);
  expect(owner.isVIP()).toBe(false);
  owner.accumulateHours(1);
  expect(owner.accumulatedHours).toBe(10);
  expect(owner.isVIP()).toBe(true);
});

test('owner uses the default VIP threshold of 500 hours', () => {
  const owner = new Owner('1', 'Ana');
  owner.accumulateHours(499);
  expect(owner.isVIP()).toBe(false);
  owner.accumulateHours(1);
  expect(owner.isVIP()).toBe(true);
});

test('vehicle keeps its attributes and owner', () => {
  const owner = new Owner('1', 'Ana');
  const vehicle = new Vehicle('ABC123', 2020, 'red', owner, 'SUV');
  expect(vehicle.owner).toBe(owner);
  expect([vehicle.plate, vehicle.year, vehicle.color, vehicle.category]).toEqual(['ABC123', 2020, 'red', 'SUV']);
});

test('service prices itself once with the owner VIP status', () => {
  const owner = new Owner('1', 'Ana', 0);
  const vehicle = new Vehicle('ABC123', 2020, 'red', owner, 'TRUCK');
  const calculator: IFeeCalculator = { calculate: jest.fn(() => 42) };

  const service = new Service(5, 9, vehicle, calculator);

  expect(service.cost).toBe(42);
  expect(service.hours()).toBe(4);
  expect(service.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  expect(calculator.calculate).toHaveBeenCalledWith({ entryHour: 5, exitHour: 9, category: 'TRUCK', vip: true });
});

test('service rejects an exit hour that is not after the entry hour', () => {
  const vehicle = new Vehicle('ABC123', 2020, 'red', new Owner('1', 'Ana'), 'SEDAN');
  expect(() => new Service(7, 7, vehicle, { calculate: () => 0 })).toThrow('InvalidHours');
});

test('service rejects hours that are not whole numbers', () => {
  const vehicle = new Vehicle('ABC123', 2020, 'red', new Owner('1', 'Ana'), 'SEDAN');
  const calculator = { calculate: () => 0 };
  expect(() => new Service(NaN, 5, vehicle, calculator)).toThrow('InvalidHours');
  expect(() => new Service(1.5, 3, vehicle, calculator)).toThrow('InvalidHours');
  expect(() => new Service(2, Infinity, vehicle, calculator)).toThrow('InvalidHours');
});
