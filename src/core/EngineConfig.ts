import { FUEL_KINDS, getFuelConstants, isFuelKind } from '../physics/FuelProperties.js';
import { computeExhaustVelocity } from '../physics/ExhaustVelocity.js';
import { fail } from './errors.js';
import type { EngineConfig } from './types.js';

export interface EngineConfigInput {
  fuelKind: string;
  chamberPressure: number;
  chamberTemperature: number;
  ambientPressure: number;
}

// Validates and freezes. Fuel names are matched exactly, like getFuelConstants.
export function createEngineConfig(input: EngineConfigInput): EngineConfig {
  const { fuelKind, chamberPressure, chamberTemperature, ambientPressure } = input;
  if (!isFuelKind(fuelKind)) {
    fail('UnknownFuelKind', `Unknown fuel type "${fuelKind}" (expected one of ${FUEL_KINDS.join(', ')})`);
  }

  if (!(chamberPressure > 0) || !Number.isFinite(chamberPressure)) {
    fail('InvalidEngineConfig', `Chamber pressure must be > 0 Pa (got ${chamberPressure})`);
  }
  if (!(chamberTemperature > 0) || !Number.isFinite(chamberTemperature)) {
    fail('InvalidEngineConfig', `Chamber temperature must be > 0 K (got ${chamberTemperature})`);
  }
  if (!(ambientPressure >= 0) || !Number.isFinite(ambientPressure)) {
    fail('InvalidEngineConfig', `Ambient pressure must be >= 0 Pa (got ${ambientPressure})`);
  }

  return Object.freeze({
    fuelKind,
    chamberPressure,
    chamberTemperature,
    ambientPressure,
  });
}

/**
 * Exhaust velocity for a configured engine: fuel constants from the table,
 * chamber and ambient conditions from the config.
 */
export function exhaustVelocityFor(engine: EngineConfig): number {
  const { specificHeatRatio, specificGasConstant } = getFuelConstants(engine.fuelKind);
  return computeExhaustVelocity(
    specificHeatRatio,
    specificGasConstant,
    engine.chamberTemperature,
    engine.ambientPressure,
    engine.chamberPressure
  );
}
