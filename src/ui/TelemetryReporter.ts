import { BurnTally } from '../core/BurnSimulator.js';
import type { Logger } from '../core/Logger.js';
import type { BurnParameters, BurnSummary, NozzlePerformance, TelemetryRecord } from '../core/types.js';

export type OutputSink = (line: string) => void;

export const BURN_COMPLETE_MESSAGE = 'Propellant Consumed! Simulation Ended.';
export const BURN_TIME_LIMIT_MESSAGE = 'Burn time limit reached.';

// Round, then drop trailing zeros: 12500.00 → "12500", 0.30000000000000004 → "0.3"
export function formatNumber(value: number, precision = 2): string {
  if (!Number.isFinite(value)) return String(value);
  const rounded = Number(value.toFixed(precision));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function formatTelemetry(record: TelemetryRecord, precision = 2): string {
  const n = (v: number) => formatNumber(v, precision);
  return (
    `Time: ${n(record.time)} s | Thrust: ${n(record.thrust)} N` +
    ` | Remaining Propellant: ${n(record.remainingPropellant)} kg` +
    ` | Total Mass: ${n(record.remainingTotalMass)} kg`
  );
}

export function formatSummary(summary: BurnSummary, precision = 2): string[] {
  const n = (v: number) => formatNumber(v, precision);
  return [
    `Steps: ${summary.steps}`,
    `Burn Time: ${n(summary.burnTime)} s`,
    `Total Impulse: ${n(summary.totalImpulse)} N·s`,
    `Peak Thrust: ${n(summary.peakThrust)} N`,
    `Propellant Consumed: ${n(summary.propellantConsumed)} kg`,
    `Final Mass: ${n(summary.finalTotalMass)} kg (dry ${n(summary.dryMass)} kg)`,
  ];
}

export function formatNozzle(performance: NozzlePerformance, precision = 2): string[] {
  const n = (v: number) => formatNumber(v, precision);
  return [
    `Thrust (F): ${n(performance.thrust)} N`,
    `Specific Impulse (Isp): ${n(performance.specificImpulse)} s`,
    `Momentum Thrust: ${n(performance.momentumThrust)} N`,
    `Pressure Thrust: ${n(performance.pressureThrust)} N`,
    `Pressure Ratio (Pe/Pa): ${n(performance.pressureRatio)} (${performance.expansion})`,
    `Nozzle Efficiency: ${n(performance.efficiency * 100)} %`,
  ];
}

/**
 * Streams records to the sink as they are produced, then prints the closing
 * line. Returns the summary of what was printed.
 */
export class TelemetryReporter {
  private readonly write: OutputSink;
  private readonly precision: number;
  private readonly logger?: Logger;

  constructor(write: OutputSink, precision = 2, logger?: Logger) {
    this.write = write;
    this.precision = precision;
    this.logger = logger;
  }

  report(records: Iterable<TelemetryRecord>, params: BurnParameters): BurnSummary {
    const tally = new BurnTally(params);
    for (const record of records) {
      tally.add(record);
      this.write(formatTelemetry(record, this.precision));
      this.logger?.debug(`step ${tally.count}: t=${record.time}s propellant=${record.remainingPropellant}kg`);
    }

    const summary = tally.summary();
    this.write(summary.propellantExhausted ? BURN_COMPLETE_MESSAGE : BURN_TIME_LIMIT_MESSAGE);
    return summary;
  }

  printSummary(summary: BurnSummary): void {
    for (const line of formatSummary(summary, this.precision)) this.write(line);
  }

  printNozzle(performance: NozzlePerformance): void {
    for (const line of formatNozzle(performance, this.precision)) this.write(line);
  }
}
