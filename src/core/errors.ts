// Typed failures raised by the calculators and the CLI
export type ErrorKind =
  | 'UnknownFuelKind'
  | 'InvalidPressureRatio'
  | 'InvalidSimulationParameters'
  | 'DivisionByZero'
  | 'InvalidEngineConfig'
  | 'UnknownPreset'
  | 'InvalidInput'
  | 'InvalidConfig';

export class ThrustbenchError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ThrustbenchError';
    this.kind = kind;
  }
}

/**
 * Narrow an unknown thrown value. With `kind`, also checks the discriminant.
 */
export function isThrustbenchError(err: unknown, kind?: ErrorKind): err is ThrustbenchError {
  if (!(err instanceof ThrustbenchError)) return false;
  return kind === undefined || err.kind === kind;
}

export function fail(kind: ErrorKind, message: string): never {
  throw new ThrustbenchError(kind, message);
}
