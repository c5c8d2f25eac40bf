export type Result<T, E extends string> =
  | { ok: true; value: T }
  | { ok: false; reason: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E extends string>(reason: E): { ok: false; reason: E } => ({ ok: false, reason });

export type OwnerRejection = 'DUPLICATE_OWNER';

export type VehicleRejection = 'DUPLICATE_VEHICLE' | 'OWNER_NOT_FOUND';

export type HoursRejection = 'OWNER_NOT_FOUND';

export type ServiceRejection =
  | 'ENTRY_HOUR_OUT_OF_RANGE'
  | 'EXIT_HOUR_OUT_OF_RANGE'
  | 'EXIT_NOT_AFTER_ENTRY'
  | 'VEHICLE_NOT_FOUND';
