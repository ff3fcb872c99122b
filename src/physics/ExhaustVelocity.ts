import { fail } from '../core/errors.js';

/**
 * Ideal nozzle exit velocity from the isentropic expansion relation:
 *
 *   ve = sqrt( 2k/(k−1) · R · Tc · (1 − (Pa/Pc)^((k−1)/k)) )
 *
 * Ambient pressure above chamber pressure makes the radicand negative; that
 * is reported as InvalidPressureRatio instead of returning NaN.
 */
export function computeExhaustVelocity(
  specificHeatRatio: number,
  gasConstant: number,
  chamberTemperature: number,
  ambientPressure: number,
  chamberPressure: number
): number {
  if (!(chamberPressure > 0) || !Number.isFinite(chamberPressure)) {
    fail('InvalidPressureRatio', `Chamber pressure must be a positive number (got ${chamberPressure} Pa)`);
  }
  if (!(ambientPressure >= 0) || !Number.isFinite(ambientPressure)) {
    fail('InvalidPressureRatio', `Ambient pressure must be >= 0 (got ${ambientPressure} Pa)`);
  }
  if (
    !(specificHeatRatio > 1) ||
    !(gasConstant > 0) ||
    !(chamberTemperature > 0) ||
    !Number.isFinite(specificHeatRatio) ||
    !Number.isFinite(gasConstant) ||
    !Number.isFinite(chamberTemperature)
  ) {
    fail(
      'InvalidEngineConfig',
      `Need finite k > 1, R > 0 and Tc > 0 (got k=${specificHeatRatio}, R=${gasConstant}, Tc=${chamberTemperature})`
    );
  }

  const k = specificHeatRatio;
  const pressureRatio = ambientPressure / chamberPressure;
  const expansionTerm = 1 - Math.pow(pressureRatio, (k - 1) / k);
  const radicand = ((2 * k) / (k - 1)) * gasConstant * chamberTemperature * expansionTerm;

  if (radicand < 0) {
    fail(
      'InvalidPressureRatio',
      `Ambient pressure (${ambientPressure} Pa) exceeds chamber pressure (${chamberPressure} Pa); the nozzle cannot expand`
    );
  }
  return Math.sqrt(radicand);
}
