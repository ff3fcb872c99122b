import { fail } from '../core/errors.js';
import type { ExpansionState, NozzleInputs, NozzlePerformance } from '../core/types.js';
import { STANDARD_GRAVITY } from './Constants.js';

// F = ṁ·ve + (Pe − Pa)·Ae
export function computeThrust(
  massFlowRate: number,
  exhaustVelocity: number,
  exitPressure: number,
  ambientPressure: number,
  exitArea: number
): number {
  return massFlowRate * exhaustVelocity + (exitPressure - ambientPressure) * exitArea;
}

// Isp = F / (ṁ·g₀)
export function computeSpecificImpulse(thrust: number, massFlowRate: number): number {
  if (massFlowRate === 0) {
    fail('DivisionByZero', 'Specific impulse is undefined for a mass flow rate of 0 kg/s');
  }
  return thrust / (massFlowRate * STANDARD_GRAVITY);
}

/**
 * Full nozzle breakdown: total thrust split into its momentum and pressure
 * terms, plus Isp, the exit-to-ambient pressure ratio and an efficiency
 * estimate.
 */
export function analyzeNozzle(inputs: NozzleInputs): NozzlePerformance {
  const { massFlowRate, exhaustVelocity, exitPressure, ambientPressure, exitArea } = inputs;
  const thrust = computeThrust(massFlowRate, exhaustVelocity, exitPressure, ambientPressure, exitArea);
  const pressureRatio = ambientPressure > 0 ? exitPressure / ambientPressure : 0;
  const expansion = classifyExpansion(exitPressure, ambientPressure);
  return {
    thrust,
    specificImpulse: computeSpecificImpulse(thrust, massFlowRate),
    momentumThrust: massFlowRate * exhaustVelocity,
    pressureThrust: (exitPressure - ambientPressure) * exitArea,
    pressureRatio,
    expansion,
    efficiency: estimateNozzleEfficiency(expansion, pressureRatio),
  };
}

// Within 10% of ambient counts as ideally expanded
export function classifyExpansion(exitPressure: number, ambientPressure: number): ExpansionState {
  if (Math.abs(exitPressure - ambientPressure) < 0.1 * ambientPressure) return 'ideal';
  return exitPressure > ambientPressure ? 'underexpanded' : 'overexpanded';
}

/**
 * Rough efficiency from how far the nozzle is off design: 0.95 when ideally
 * expanded, otherwise 0.85 less up to 0.1 by the decades of pressure mismatch.
 */
export function estimateNozzleEfficiency(expansion: ExpansionState, pressureRatio: number): number {
  if (expansion === 'ideal') return 0.95;
  return 0.85 - 0.1 * Math.min(Math.abs(Math.log10(pressureRatio + 0.1)), 1);
}
