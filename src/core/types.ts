// Core type definitions
import type { FuelKind } from '../physics/FuelProperties.js';

export type { FuelKind };

export interface EngineConfig {
  readonly fuelKind: FuelKind;
  readonly chamberPressure: number; // Pa, > 0
  readonly chamberTemperature: number; // K, > 0
  readonly ambientPressure: number; // Pa, >= 0
}

// Mutable loop state; owned by a single simulation run
export interface BurnState {
  elapsedTime: number; // s
  totalMass: number; // kg
  propellantMass: number; // kg
}

export interface TelemetryRecord {
  readonly time: number; // s, start of the step
  readonly thrust: number; // N
  readonly remainingPropellant: number; // kg, after the step
  readonly remainingTotalMass: number; // kg, after the step
}

export interface BurnParameters {
  initialTotalMass: number; // kg, propellant included
  initialPropellantMass: number; // kg
  massFlowRate: number; // kg/s
  exhaustVelocity: number; // m/s
  timestep: number; // s
  maxTime?: number; // s, optional cap on simulated time
}

export interface BurnSummary {
  steps: number;
  burnTime: number; // s
  totalImpulse: number; // N·s
  peakThrust: number; // N
  propellantConsumed: number; // kg
  finalTotalMass: number; // kg
  dryMass: number; // kg
  propellantExhausted: boolean;
}

export interface NozzleInputs {
  massFlowRate: number; // kg/s
  exhaustVelocity: number; // m/s
  exitPressure: number; // Pa
  ambientPressure: number; // Pa
  exitArea: number; // m²
}

export type ExpansionState = 'ideal' | 'underexpanded' | 'overexpanded';

export interface NozzlePerformance {
  thrust: number; // N
  specificImpulse: number; // s
  momentumThrust: number; // N, ṁ·ve
  pressureThrust: number; // N, (Pe − Pa)·Ae
  pressureRatio: number; // Pe/Pa, 0 in vacuum
  expansion: ExpansionState;
  efficiency: number; // 0..1, estimate from off-design expansion
}
