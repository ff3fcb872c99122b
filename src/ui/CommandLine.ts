import type { AppConfig } from '../core/AppConfig.js';
import { runBurnSimulation, runNozzlePerformance, type BurnInputs, type SessionIO } from '../core/CalculatorSession.js';
import { fail } from '../core/errors.js';
import { getPreset, listPresets, type Preset } from '../core/Presets.js';
import type { NozzleInputs } from '../core/types.js';
import { getAtmosphericPressure } from '../physics/AtmosphericPhysics.js';
import { FUEL_KINDS } from '../physics/FuelProperties.js';
import { parseNumber, type Prompter } from './Prompter.js';

export type Mode = 'burn' | 'nozzle';

export interface ParsedArgs {
  mode?: Mode;
  /** `true` when --preset is given without a name: use the configured default. */
  preset?: string | true;
  fuel?: string;
  chamberPressure?: number;
  chamberTemperature?: number;
  ambientPressure?: number;
  altitude?: number;
  totalMass?: number;
  propellantMass?: number;
  massFlowRate?: number;
  timestep?: number;
  maxTime?: number;
  exhaustVelocity?: number;
  exitPressure?: number;
  exitArea?: number;
  config?: string;
  verbose: boolean;
  help: boolean;
}

type NumericKey =
  | 'chamberPressure'
  | 'chamberTemperature'
  | 'ambientPressure'
  | 'altitude'
  | 'totalMass'
  | 'propellantMass'
  | 'massFlowRate'
  | 'timestep'
  | 'maxTime'
  | 'exhaustVelocity'
  | 'exitPressure'
  | 'exitArea';

const NUMERIC_FLAGS: Readonly<Record<string, NumericKey>> = {
  'chamber-pressure': 'chamberPressure',
  'chamber-temp': 'chamberTemperature',
  'ambient-pressure': 'ambientPressure',
  altitude: 'altitude',
  'total-mass': 'totalMass',
  'propellant-mass': 'propellantMass',
  'mass-flow': 'massFlowRate',
  timestep: 'timestep',
  'max-time': 'maxTime',
  'exhaust-velocity': 'exhaustVelocity',
  'exit-pressure': 'exitPressure',
  'exit-area': 'exitArea',
};

const MODE_ALIASES: Readonly<Record<string, Mode>> = {
  '1': 'burn',
  burn: 'burn',
  '2': 'nozzle',
  nozzle: 'nozzle',
};

export const USAGE = [
  'Usage: thrustbench [--mode burn|nozzle] [options]',
  '',
  'Burn simulation:',
  '  --preset [name]          start from a preset (' + listPresets().join(', ') + ')',
  '  --fuel <kind>            ' + FUEL_KINDS.join(', '),
  '  --chamber-pressure <Pa>  --chamber-temp <K>',
  '  --ambient-pressure <Pa>  or --altitude <m>',
  '  --total-mass <kg>  --propellant-mass <kg>  --mass-flow <kg/s>  --timestep <s>',
  '  --max-time <s>           stop the burn early',
  '',
  'Nozzle performance:',
  '  --mass-flow <kg/s>  --exhaust-velocity <m/s>  --exit-pressure <Pa>',
  '  --ambient-pressure <Pa>  --exit-area <m^2>',
  '',
  'General:',
  '  --config <file>  --verbose  --help',
  '',
  'Anything not given on the command line is asked for interactively.',
].join('\n');

// `--key value` pairs; a flag followed by another flag (or nothing) is boolean
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      fail('InvalidInput', `Unexpected argument "${token}"`);
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    const value = next === undefined || next.startsWith('--') ? undefined : next;
    if (value !== undefined) i++;

    const numericKey = lookup(NUMERIC_FLAGS, key);
    if (numericKey !== undefined) {
      parsed[numericKey] = requireNumber(key, value);
      continue;
    }

    switch (key) {
      case 'mode': {
        const mode = value === undefined ? undefined : lookup(MODE_ALIASES, value.toLowerCase());
        if (!mode) fail('InvalidInput', `--mode expects burn or nozzle (got ${value ?? 'nothing'})`);
        parsed.mode = mode;
        break;
      }
      case 'preset':
        parsed.preset = value ?? true;
        break;
      case 'fuel':
        parsed.fuel = requireValue(key, value);
        break;
      case 'config':
        parsed.config = requireValue(key, value);
        break;
      case 'verbose':
        parsed.verbose = true;
        if (value !== undefined) i--;
        break;
      case 'help':
      case 'h':
        parsed.help = true;
        if (value !== undefined) i--;
        break;
      default:
        fail('InvalidInput', `Unknown option --${key}`);
    }
  }
  return parsed;
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function requireValue(key: string, value: string | undefined): string {
  if (value === undefined) fail('InvalidInput', `--${key} expects a value`);
  return value;
}

function requireNumber(key: string, value: string | undefined): number {
  const parsed = parseNumber(requireValue(key, value));
  if (parsed === undefined) fail('InvalidInput', `--${key} expects a number (got "${value}")`);
  return parsed;
}

export async function resolveMode(args: ParsedArgs, prompter: Prompter): Promise<Mode> {
  if (args.mode) return args.mode;
  return prompter.choice(
    'For Rocket Engine Simulator, type 1. For Nozzle Performance Calculator, type 2.\n',
    MODE_ALIASES
  );
}

/**
 * Fill burn inputs from flags first, then the preset, then prompts. The
 * ambient pressure may come from an altitude (flag or preset).
 */
export async function resolveBurnInputs(
  args: ParsedArgs,
  config: AppConfig,
  prompter: Prompter
): Promise<BurnInputs> {
  const preset: Preset | undefined =
    args.preset === undefined
      ? undefined
      : getPreset(args.preset === true ? config.simulation.defaultPreset : args.preset);

  const fuelKind = args.fuel ?? preset?.fuelKind ?? (await prompter.text(`Fuel Type (${FUEL_KINDS.join(', ')}): `));
  const chamberPressure =
    args.chamberPressure ?? preset?.chamberPressure ?? (await prompter.number('Combustion Chamber Pressure (Pa): '));
  const chamberTemperature =
    args.chamberTemperature ?? preset?.chamberTemperature ?? (await prompter.number('Combustion Temperature (K): '));

  const altitude = args.altitude ?? preset?.altitude;
  const ambientPressure =
    args.ambientPressure ??
    (altitude !== undefined ? getAtmosphericPressure(altitude) : await prompter.number('Atmospheric Pressure (Pa): '));

  const totalMass =
    args.totalMass ?? preset?.totalMass ?? (await prompter.number('Total Mass, including Propellant (Kg): '));
  const propellantMass =
    args.propellantMass ?? preset?.propellantMass ?? (await prompter.number('Propellant Mass (Kg): '));
  const massFlowRate = args.massFlowRate ?? preset?.massFlowRate ?? (await prompter.number('Mass Flow Rate (Kg/s): '));
  const timestep = args.timestep ?? preset?.timestep ?? (await prompter.number('Simulation Timestep (s): '));
  const maxTime = args.maxTime ?? config.simulation.maxBurnTime ?? undefined;

  return {
    fuelKind,
    chamberPressure,
    chamberTemperature,
    ambientPressure,
    totalMass,
    propellantMass,
    massFlowRate,
    timestep,
    maxTime,
  };
}

export async function resolveNozzleInputs(args: ParsedArgs, prompter: Prompter): Promise<NozzleInputs> {
  const massFlowRate = args.massFlowRate ?? (await prompter.number('Mass Flow Rate (Kg/s): '));
  const exhaustVelocity = args.exhaustVelocity ?? (await prompter.number('Exhaust Velocity (m/s): '));
  const exitPressure = args.exitPressure ?? (await prompter.number('Exit Pressure (Pa): '));
  const ambientPressure =
    args.ambientPressure ??
    (args.altitude !== undefined
      ? getAtmosphericPressure(args.altitude)
      : await prompter.number('Ambient Pressure (Pa): '));
  const exitArea = args.exitArea ?? (await prompter.number('Exit Area (m^2): '));
  return { massFlowRate, exhaustVelocity, exitPressure, ambientPressure, exitArea };
}

// One full CLI run against injected I/O
export async function runCli(args: ParsedArgs, config: AppConfig, prompter: Prompter, io: SessionIO): Promise<void> {
  const mode = await resolveMode(args, prompter);
  if (mode === 'burn') {
    runBurnSimulation(await resolveBurnInputs(args, config, prompter), io);
  } else {
    runNozzlePerformance(await resolveNozzleInputs(args, prompter), io);
  }
}
