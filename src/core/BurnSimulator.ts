import { fail } from './errors.js';
import type { BurnParameters, BurnState, BurnSummary, TelemetryRecord } from './types.js';

// Remainders within this fraction of one step's mass are burned in that step
const FINAL_STEP_TOLERANCE = 1e-9;
// maxTime / timestep within this relative distance of a whole number counts as that number
const STEP_COUNT_TOLERANCE = 1e-12;

export interface SimulateOptions {
  /** Stop once simulated time reaches this many seconds, even with propellant left. */
  maxTime?: number;
}

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    fail('InvalidSimulationParameters', `${name} must be a finite number (got ${value})`);
  }
}

// Rejects inputs that would loop forever or break the dry-mass invariant
export function validateBurnParameters(params: BurnParameters): void {
  const { initialTotalMass, initialPropellantMass, massFlowRate, exhaustVelocity, timestep, maxTime } = params;
  requireFinite('initialTotalMass', initialTotalMass);
  requireFinite('initialPropellantMass', initialPropellantMass);
  requireFinite('massFlowRate', massFlowRate);
  requireFinite('exhaustVelocity', exhaustVelocity);
  requireFinite('timestep', timestep);

  if (!(massFlowRate > 0)) {
    fail('InvalidSimulationParameters', `massFlowRate must be > 0 kg/s (got ${massFlowRate})`);
  }
  if (!(timestep > 0)) {
    fail('InvalidSimulationParameters', `timestep must be > 0 s (got ${timestep})`);
  }
  if (initialPropellantMass < 0) {
    fail('InvalidSimulationParameters', `initialPropellantMass must be >= 0 kg (got ${initialPropellantMass})`);
  }
  if (initialTotalMass < initialPropellantMass) {
    fail(
      'InvalidSimulationParameters',
      `initialTotalMass (${initialTotalMass} kg) cannot be less than initialPropellantMass (${initialPropellantMass} kg)`
    );
  }
  if (maxTime !== undefined && !(maxTime > 0)) {
    fail('InvalidSimulationParameters', `maxTime must be > 0 s when given (got ${maxTime})`);
  }

  // A step too small to register (underflow, or lost to rounding) never empties the tank
  const stepMass = massFlowRate * timestep;
  if (initialPropellantMass > 0 && !(initialPropellantMass - stepMass < initialPropellantMass)) {
    fail(
      'InvalidSimulationParameters',
      `A step burns ${stepMass} kg, too little to change ${initialPropellantMass} kg of propellant`
    );
  }
}

// Steps that start before maxTime; undefined means no cap
function stepLimit(maxTime: number | undefined, timestep: number): number | undefined {
  if (maxTime === undefined) return undefined;
  return Math.ceil((maxTime / timestep) * (1 - STEP_COUNT_TOLERANCE));
}

/**
 * Fixed-step propellant depletion.
 *
 * Each step burns min(ṁ·dt, remaining) and reports thrust as ṁ·ve, so the
 * final clamped step still reports full-flow thrust. The last record always
 * has exactly 0 kg of propellant left unless `maxTime` cuts the run short.
 *
 * Validation runs immediately; records are produced lazily, and every
 * iteration of the returned iterable starts a fresh run.
 */
export function simulate(
  initialTotalMass: number,
  initialPropellantMass: number,
  massFlowRate: number,
  exhaustVelocity: number,
  timestep: number,
  options: SimulateOptions = {}
): Iterable<TelemetryRecord> {
  const params: BurnParameters = {
    initialTotalMass,
    initialPropellantMass,
    massFlowRate,
    exhaustVelocity,
    timestep,
    maxTime: options.maxTime,
  };
  validateBurnParameters(params);
  return { [Symbol.iterator]: () => runBurn(params) };
}

// Same as simulate(), taking the parameter object used by the CLI
export function simulateBurn(params: BurnParameters): Iterable<TelemetryRecord> {
  return simulate(
    params.initialTotalMass,
    params.initialPropellantMass,
    params.massFlowRate,
    params.exhaustVelocity,
    params.timestep,
    { maxTime: params.maxTime }
  );
}

function* runBurn(params: BurnParameters): Generator<TelemetryRecord, void, undefined> {
  const { massFlowRate, exhaustVelocity, timestep, maxTime } = params;
  const state: BurnState = {
    elapsedTime: 0,
    totalMass: params.initialTotalMass,
    propellantMass: params.initialPropellantMass,
  };
  const stepMass = massFlowRate * timestep;
  const maxSteps = stepLimit(maxTime, timestep);
  let step = 0;

  while (state.propellantMass > 0) {
    if (maxSteps !== undefined && step >= maxSteps) return;

    const thrust = massFlowRate * exhaustVelocity;
    if (state.propellantMass - stepMass <= FINAL_STEP_TOLERANCE * stepMass) {
      // Final step: land on zero exactly instead of subtracting
      state.totalMass -= state.propellantMass;
      state.propellantMass = 0;
    } else {
      state.propellantMass -= stepMass;
      state.totalMass -= stepMass;
    }

    yield Object.freeze({
      time: state.elapsedTime,
      thrust,
      remainingPropellant: state.propellantMass,
      remainingTotalMass: state.totalMass,
    });

    step++;
    // step · dt rather than a running sum
    state.elapsedTime = step * timestep;
  }
}

/**
 * Running totals over a record stream, fed one record at a time so a burn
 * can be summarized while it is printed. Impulse integrates thrust over the
 * time each step actually burned, so the clamped final step counts only its
 * partial duration.
 */
export class BurnTally {
  private readonly params: BurnParameters;
  private steps = 0;
  private totalImpulse = 0;
  private peakThrust = 0;
  private burnTime = 0;
  private propellant: number;
  private totalMass: number;

  constructor(params: BurnParameters) {
    this.params = params;
    this.propellant = params.initialPropellantMass;
    this.totalMass = params.initialTotalMass;
  }

  get count(): number {
    return this.steps;
  }

  add(record: TelemetryRecord): void {
    const duration = (this.propellant - record.remainingPropellant) / this.params.massFlowRate;
    this.totalImpulse += record.thrust * duration;
    this.peakThrust = Math.max(this.peakThrust, record.thrust);
    this.burnTime = record.time + duration;
    this.propellant = record.remainingPropellant;
    this.totalMass = record.remainingTotalMass;
    this.steps++;
  }

  summary(): BurnSummary {
    const { initialTotalMass, initialPropellantMass } = this.params;
    return {
      steps: this.steps,
      burnTime: this.burnTime,
      totalImpulse: this.totalImpulse,
      peakThrust: this.peakThrust,
      propellantConsumed: initialPropellantMass - this.propellant,
      finalTotalMass: this.totalMass,
      dryMass: initialTotalMass - initialPropellantMass,
      propellantExhausted: this.propellant === 0,
    };
  }
}

// Fold a whole burn into totals
export function summarizeBurn(records: Iterable<TelemetryRecord>, params: BurnParameters): BurnSummary {
  const tally = new BurnTally(params);
  for (const record of records) tally.add(record);
  return tally.summary();
}
