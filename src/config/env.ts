import { z } from "zod";
import { VehicleCategory } from "../dtos/vehicle.dto";

export const MIN_ENTRY_HOUR = 1;
export const MAX_ENTRY_HOUR = 22;
export const MIN_EXIT_HOUR = 2;
export const MAX_EXIT_HOUR = 23;

const rate = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PARKING_RATE_SEDAN: rate(6000),
  PARKING_RATE_SUV: rate(8000),
  PARKING_RATE_TRUCK: rate(10000),
  PARKING_VIP_HOURS: z.coerce.number().int().nonnegative().default(500),
  PARKING_VIP_DISCOUNT_PERCENT: z.coerce.number().int().min(0).max(100).default(15),
});

export interface ParkingConfig {
  rates: Record<VehicleCategory, number>;
  vipHoursThreshold: number;
  vipDiscountPercent: number;
}

/**
 * Reads tariffs and the VIP policy from environment variables.
 * Unset variables fall back to the defaults above.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): ParkingConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid parking configuration: ${issues}`);
  }
  const env = parsed.data;
  return {
    rates: {
      SEDAN: env.PARKING_RATE_SEDAN,
      SUV: env.PARKING_RATE_SUV,
      TRUCK: env.PARKING_RATE_TRUCK,
    },
    vipHoursThreshold: env.PARKING_VIP_HOURS,
    vipDiscountPercent: env.PARKING_VIP_DISCOUNT_PERCENT,
  };
}
