import { fail } from '../core/errors.js';

export type FuelKind = 'RP1' | 'LH2/LOX' | 'SRF';

export interface FuelConstants {
  readonly specificHeatRatio: number; // k, dimensionless (> 1)
  readonly specificGasConstant: number; // R, J/(kg·K)
}

// One record per propellant; frozen so nothing downstream can retune it
export const FUEL_CONSTANTS: Readonly<Record<FuelKind, FuelConstants>> = Object.freeze({
  RP1: Object.freeze({ specificHeatRatio: 1.2, specificGasConstant: 287.0 }),
  'LH2/LOX': Object.freeze({ specificHeatRatio: 1.4, specificGasConstant: 4124.0 }),
  SRF: Object.freeze({ specificHeatRatio: 1.2, specificGasConstant: 191.0 }),
});

export const FUEL_KINDS: readonly FuelKind[] = Object.freeze(Object.keys(FUEL_CONSTANTS).filter(isFuelKind));

/**
 * Check the table once at load. A bad entry would otherwise surface as NaN
 * deep inside the exhaust velocity formula.
 */
export function validateFuelTable(table: Readonly<Record<string, FuelConstants>>): void {
  for (const [name, c] of Object.entries(table)) {
    if (!(c.specificHeatRatio > 1) || !Number.isFinite(c.specificHeatRatio)) {
      throw new Error(`Fuel ${name}: specific heat ratio must be > 1 (got ${c.specificHeatRatio})`);
    }
    if (!(c.specificGasConstant > 0) || !Number.isFinite(c.specificGasConstant)) {
      throw new Error(`Fuel ${name}: gas constant must be > 0 (got ${c.specificGasConstant})`);
    }
  }
}

validateFuelTable(FUEL_CONSTANTS);

export function isFuelKind(name: string): name is FuelKind {
  return Object.prototype.hasOwnProperty.call(FUEL_CONSTANTS, name);
}

// Exact match only: "rp1" or " RP1" are rejected
export function getFuelConstants(name: string): FuelConstants {
  if (!isFuelKind(name)) {
    fail('UnknownFuelKind', `Unknown fuel type "${name}" (expected one of ${FUEL_KINDS.join(', ')})`);
  }
  return FUEL_CONSTANTS[name];
}
