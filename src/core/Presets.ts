import { z } from 'zod';
import { fail } from './errors.js';
import presetData from './presets.json';

export const PresetSchema = z
  .object({
    label: z.string().min(1),
    fuelKind: z.enum(['RP1', 'LH2/LOX', 'SRF']),
    chamberPressure: z.number().positive(),
    chamberTemperature: z.number().positive(),
    altitude: z.number().min(0),
    totalMass: z.number().positive(),
    propellantMass: z.number().min(0),
    massFlowRate: z.number().positive(),
    timestep: z.number().positive(),
  })
  .refine((p) => p.totalMass >= p.propellantMass, {
    message: 'totalMass must include the propellant mass',
  });

export type Preset = z.infer<typeof PresetSchema>;

const PresetTableSchema = z.record(z.string(), PresetSchema);

// Parsed once at load so a bad entry fails fast
const PRESETS: Readonly<Record<string, Preset>> = Object.freeze(PresetTableSchema.parse(presetData));

export function listPresets(): string[] {
  return Object.keys(PRESETS);
}

export function getPreset(name: string): Preset {
  const preset = Object.prototype.hasOwnProperty.call(PRESETS, name) ? PRESETS[name] : undefined;
  if (!preset) {
    fail('UnknownPreset', `Unknown preset "${name}" (available: ${listPresets().join(', ')})`);
  }
  return preset;
}
