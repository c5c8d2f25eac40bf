import { HourlyFeeCalculator } from "../src/services/hourlyFeeCalculator";
import { FeeCalculatorFactory } from "../src/services/feeCalculatorFactory";
import { loadConfig } from "../src/config/env";
import { ParkingStay } from "../src/dtos/stay.dto";

test('charges the hourly rate for each hour parked', () => {
  const calc = new HourlyFeeCalculator(6000, 15);
  const stay: ParkingStay = { entryHour: 9, exitHour: 12, category: 'SEDAN', vip: false };
  expect(calc.calculate(stay)).toBe(18000);
});

test('applies the discount to VIP stays', () => {
  const calc = new HourlyFeeCalculator(6000, 15);
  // 3h * 6000 = 18000, minus 15% => 15300
  expect(calc.calculate({ entryHour: 9, exitHour: 12, category: 'SEDAN', vip: true })).toBe(15300);
});

test('charges nothing for a stay that does not end after it starts', () => {
  const calc = new HourlyFeeCalculator(6000);
  expect(calc.calculate({ entryHour: 12, exitHour: 9, category: 'SEDAN', vip: false })).toBe(0);
  expect(calc.calculate({ entryHour: NaN, exitHour: 9, category: 'SEDAN', vip: false })).toBe(0);
});

test('factory picks the configured rate per category', () => {
  const config = loadConfig({ PARKING_RATE_SUV: '9000' });
  const stay = (category: ParkingStay['category']): ParkingStay => ({ entryHour: 1, exitHour: 3, category, vip: false });

  expect(FeeCalculatorFactory.for('SEDAN', config).calculate(stay('SEDAN'))).toBe(12000);
  expect(FeeCalculatorFactory.for('SUV', config).calculate(stay('SUV'))).toBe(18000);
  expect(FeeCalculatorFactory.for('TRUCK', config).calculate(stay('TRUCK'))).toBe(20000);
});
