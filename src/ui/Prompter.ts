import { createInterface } from 'node:readline/promises';
import { fail } from '../core/errors.js';
import type { OutputSink } from './TelemetryReporter.js';

// Anything that can ask a question and hand back a line (readline, or a script in tests)
export interface LineReader {
  question(query: string): Promise<string>;
  close(): void;
}

export function createTerminalReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LineReader {
  return createInterface({ input, output });
}

/**
 * Prompts for typed values. Unparseable numbers are asked again, up to
 * `maxAttempts` times, then reported as InvalidInput.
 */
export class Prompter {
  private readonly reader: LineReader;
  private readonly write: OutputSink;
  private readonly maxAttempts: number;

  constructor(reader: LineReader, write: OutputSink, maxAttempts = 3) {
    this.reader = reader;
    this.write = write;
    this.maxAttempts = maxAttempts;
  }

  async text(label: string): Promise<string> {
    const answer = await this.reader.question(label);
    return answer.trim();
  }

  async number(label: string): Promise<number> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const raw = await this.text(label);
      const value = parseNumber(raw);
      if (value !== undefined) return value;
      this.write(`"${raw}" is not a number, try again.`);
    }
    return fail('InvalidInput', `No valid number given for "${label.trim()}"`);
  }

  async choice<T extends string>(label: string, options: Readonly<Record<string, T>>): Promise<T> {
    const keys = Object.keys(options);
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const raw = await this.text(label);
      if (Object.prototype.hasOwnProperty.call(options, raw)) return options[raw];
      this.write(`Please type one of: ${keys.join(', ')}`);
    }
    return fail('InvalidInput', `No valid choice given for "${label.trim()}"`);
  }

  close(): void {
    this.reader.close();
  }
}

// Accepts plain and exponent notation plus "_" separators; rejects blanks and junk
export function parseNumber(raw: string): number | undefined {
  const cleaned = raw.trim().replace(/_/g, '');
  if (cleaned === '') return undefined;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : undefined;
}
