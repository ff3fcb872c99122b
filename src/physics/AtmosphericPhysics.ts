import { PRESSURE_EXPONENT, PRESSURE_LAPSE, SEA_LEVEL_PRESSURE } from './Constants.js';

// Ambient pressure at altitude (module-level). Below sea level reads as sea level.
export function getAtmosphericPressure(altitude: number): number {
  const h = Math.max(0, altitude);
  const base = Math.max(0, 1 - PRESSURE_LAPSE * h);
  if (base === 0) return 0;
  return Math.max(0, SEA_LEVEL_PRESSURE * Math.pow(base, PRESSURE_EXPONENT));
}

// Altitude where the fit reaches vacuum (~44.3 km)
export const VACUUM_ALTITUDE = 1 / PRESSURE_LAPSE;

export function isVacuum(altitude: number): boolean {
  return getAtmosphericPressure(altitude) === 0;
}
