import {
  FUEL_CONSTANTS,
  FUEL_KINDS,
  getFuelConstants,
  isFuelKind,
  validateFuelTable,
} from '@/physics/FuelProperties';
import { describe, expect, it } from 'vitest';
import { captureError } from '../helpers';

describe('FuelProperties', () => {
  it('lists the three supported propellants', () => {
    expect(FUEL_KINDS).toEqual(['RP1', 'LH2/LOX', 'SRF']);
  });

  it('returns the fixed constants per fuel', () => {
    expect(getFuelConstants('RP1')).toEqual({ specificHeatRatio: 1.2, specificGasConstant: 287.0 });
    expect(getFuelConstants('LH2/LOX')).toEqual({ specificHeatRatio: 1.4, specificGasConstant: 4124.0 });
    expect(getFuelConstants('SRF')).toEqual({ specificHeatRatio: 1.2, specificGasConstant: 191.0 });
  });

  it('matches names exactly', () => {
    for (const name of ['rp1', ' RP1', 'LH2', 'LOX', '', 'toString']) {
      expect(isFuelKind(name)).toBe(false);
      expect(captureError(() => getFuelConstants(name)).kind).toBe('UnknownFuelKind');
    }
  });

  it('keeps the table immutable', () => {
    expect(Object.isFrozen(FUEL_CONSTANTS)).toBe(true);
    expect(Object.isFrozen(FUEL_CONSTANTS.RP1)).toBe(true);
  });

  it('rejects tables with non-physical constants', () => {
    expect(() => validateFuelTable({ X: { specificHeatRatio: 1.0, specificGasConstant: 287 } })).toThrow(
      /specific heat ratio/
    );
    expect(() => validateFuelTable({ X: { specificHeatRatio: 1.3, specificGasConstant: 0 } })).toThrow(/gas constant/);
    expect(() => validateFuelTable(FUEL_CONSTANTS)).not.toThrow();
  });
});
