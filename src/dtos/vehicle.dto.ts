export type VehicleCategory = 'SEDAN' | 'SUV' | 'TRUCK';
