import { computeExhaustVelocity } from '@/physics/ExhaustVelocity';
import { FUEL_KINDS, getFuelConstants } from '@/physics/FuelProperties';
import { describe, expect, it } from 'vitest';
import { captureError } from '../helpers';

describe('ExhaustVelocity', () => {
  it('evaluates the isentropic relation for an RP1 chamber at sea level', () => {
    // 12 · 287 · 3500 · (1 − (101325/5e6)^(1/6)) → 2400.013 m/s
    const ve = computeExhaustVelocity(1.2, 287.0, 3500, 101_325, 5_000_000);
    expect(ve).toBeCloseTo(2400.0134, 3);
  });

  it('is positive and finite for every fuel when ambient < chamber pressure', () => {
    for (const fuel of FUEL_KINDS) {
      const { specificHeatRatio, specificGasConstant } = getFuelConstants(fuel);
      const ve = computeExhaustVelocity(specificHeatRatio, specificGasConstant, 3000, 101_325, 7_000_000);
      expect(Number.isFinite(ve)).toBe(true);
      expect(ve).toBeGreaterThan(0);
    }
  });

  it('reaches the full thermal limit in vacuum', () => {
    const ve = computeExhaustVelocity(1.2, 287.0, 3500, 0, 5_000_000);
    expect(ve).toBeCloseTo(Math.sqrt(12 * 287 * 3500), 6);
    expect(ve).toBeGreaterThan(computeExhaustVelocity(1.2, 287.0, 3500, 101_325, 5_000_000));
  });

  it('gives zero when ambient equals chamber pressure', () => {
    expect(computeExhaustVelocity(1.2, 287.0, 3500, 2e6, 2e6)).toBe(0);
  });

  it('reports ambient above chamber pressure instead of returning NaN', () => {
    const err = captureError(() => computeExhaustVelocity(1.2, 287.0, 3500, 200_000, 100_000));
    expect(err.kind).toBe('InvalidPressureRatio');
  });

  it('rejects a non-positive chamber pressure', () => {
    expect(captureError(() => computeExhaustVelocity(1.2, 287.0, 3500, 101_325, 0)).kind).toBe('InvalidPressureRatio');
    expect(captureError(() => computeExhaustVelocity(1.2, 287.0, 3500, 101_325, -5)).kind).toBe(
      'InvalidPressureRatio'
    );
  });

  it('rejects negative ambient pressure and non-physical gas properties', () => {
    expect(captureError(() => computeExhaustVelocity(1.2, 287.0, 3500, -1, 5e6)).kind).toBe('InvalidPressureRatio');
    expect(captureError(() => computeExhaustVelocity(1.0, 287.0, 3500, 0, 5e6)).kind).toBe('InvalidEngineConfig');
    expect(captureError(() => computeExhaustVelocity(1.2, 287.0, 0, 0, 5e6)).kind).toBe('InvalidEngineConfig');
  });

  it('rejects infinite gas properties instead of returning NaN or Infinity', () => {
    const cases: Array<[number, number, number]> = [
      [Number.POSITIVE_INFINITY, 287.0, 3500],
      [1.2, Number.POSITIVE_INFINITY, 3500],
      [1.2, 287.0, Number.POSITIVE_INFINITY],
      [Number.NaN, 287.0, 3500],
    ];
    for (const [k, r, tc] of cases) {
      expect(captureError(() => computeExhaustVelocity(k, r, tc, 101_325, 5e6)).kind).toBe('InvalidEngineConfig');
    }
  });
});
