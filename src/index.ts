// Public API of the calculators
export { computeExhaustVelocity } from './physics/ExhaustVelocity.js';
export { FUEL_CONSTANTS, FUEL_KINDS, getFuelConstants, isFuelKind } from './physics/FuelProperties.js';
export type { FuelConstants, FuelKind } from './physics/FuelProperties.js';
export {
  analyzeNozzle,
  classifyExpansion,
  computeSpecificImpulse,
  computeThrust,
  estimateNozzleEfficiency,
} from './physics/NozzlePerformance.js';
export { getAtmosphericPressure } from './physics/AtmosphericPhysics.js';
export { STANDARD_GRAVITY } from './physics/Constants.js';

export { createEngineConfig, exhaustVelocityFor } from './core/EngineConfig.js';
export type { EngineConfigInput } from './core/EngineConfig.js';
export { BurnTally, simulate, simulateBurn, summarizeBurn, validateBurnParameters } from './core/BurnSimulator.js';
export type { SimulateOptions } from './core/BurnSimulator.js';
export { getPreset, listPresets } from './core/Presets.js';
export type { Preset } from './core/Presets.js';
export { ThrustbenchError, isThrustbenchError } from './core/errors.js';
export type { ErrorKind } from './core/errors.js';
export type {
  BurnParameters,
  BurnState,
  BurnSummary,
  EngineConfig,
  ExpansionState,
  NozzleInputs,
  NozzlePerformance,
  TelemetryRecord,
} from './core/types.js';
