import { analyzeNozzle } from '../physics/NozzlePerformance.js';
import { TelemetryReporter, formatNumber, type OutputSink } from '../ui/TelemetryReporter.js';
import { simulateBurn } from './BurnSimulator.js';
import { createEngineConfig, exhaustVelocityFor } from './EngineConfig.js';
import type { Logger } from './Logger.js';
import type { BurnParameters, BurnSummary, NozzleInputs, NozzlePerformance } from './types.js';

export interface SessionIO {
  write: OutputSink;
  logger: Logger;
  precision: number;
}

export interface BurnInputs {
  fuelKind: string;
  chamberPressure: number; // Pa
  chamberTemperature: number; // K
  ambientPressure: number; // Pa
  totalMass: number; // kg
  propellantMass: number; // kg
  massFlowRate: number; // kg/s
  timestep: number; // s
  maxTime?: number; // s
}

export interface BurnResult {
  exhaustVelocity: number;
  summary: BurnSummary;
}

/**
 * Burn simulation mode: engine config → exhaust velocity → streamed
 * telemetry → summary. Throws the core's typed errors untouched.
 */
export function runBurnSimulation(inputs: BurnInputs, io: SessionIO): BurnResult {
  const { write, logger, precision } = io;
  const engine = createEngineConfig({
    fuelKind: inputs.fuelKind,
    chamberPressure: inputs.chamberPressure,
    chamberTemperature: inputs.chamberTemperature,
    ambientPressure: inputs.ambientPressure,
  });
  const exhaustVelocity = exhaustVelocityFor(engine);
  write(`Nozzle Outlet Velocity for ${engine.fuelKind} (ve): ${formatNumber(exhaustVelocity, precision)} m/s`);

  const params: BurnParameters = {
    initialTotalMass: inputs.totalMass,
    initialPropellantMass: inputs.propellantMass,
    massFlowRate: inputs.massFlowRate,
    exhaustVelocity,
    timestep: inputs.timestep,
    maxTime: inputs.maxTime,
  };
  logger.info(
    `Starting burn: fuel=${engine.fuelKind} mass=${params.initialTotalMass}kg ` +
      `propellant=${params.initialPropellantMass}kg mfr=${params.massFlowRate}kg/s dt=${params.timestep}s`
  );

  const reporter = new TelemetryReporter(write, precision, logger);
  const summary = reporter.report(simulateBurn(params), params);
  reporter.printSummary(summary);

  if (!summary.propellantExhausted) {
    logger.warn(`Stopped at ${summary.burnTime}s with ${params.initialPropellantMass - summary.propellantConsumed}kg left`);
  }
  logger.info('Simulation complete.');
  return { exhaustVelocity, summary };
}

// Nozzle performance mode: thrust and Isp from user-supplied nozzle conditions
export function runNozzlePerformance(inputs: NozzleInputs, io: SessionIO): NozzlePerformance {
  const performance = analyzeNozzle(inputs);
  new TelemetryReporter(io.write, io.precision, io.logger).printNozzle(performance);
  io.logger.debug(`nozzle: ${JSON.stringify(inputs)}`);
  return performance;
}
