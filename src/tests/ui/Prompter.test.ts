import { Prompter, parseNumber } from '@/ui/Prompter';
import { describe, expect, it } from 'vitest';
import { ScriptedReader, captureErrorAsync } from '../helpers';

describe('Prompter', () => {
  it('parses plain, exponent and grouped numbers', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber(' 7.5 ')).toBe(7.5);
    expect(parseNumber('5e6')).toBe(5_000_000);
    expect(parseNumber('101_325')).toBe(101_325);
    expect(parseNumber('-3')).toBe(-3);
  });

  it('rejects blanks, junk and infinities', () => {
    for (const raw of ['', '   ', '12abc', 'abc', 'Infinity', 'NaN']) {
      expect(parseNumber(raw)).toBeUndefined();
    }
  });

  it('asks again after an unparseable number', async () => {
    const reader = new ScriptedReader(['lots', '42']);
    const output: string[] = [];
    const value = await new Prompter(reader, (l) => output.push(l)).number('Mass Flow Rate (Kg/s): ');
    expect(value).toBe(42);
    expect(reader.questions).toEqual(['Mass Flow Rate (Kg/s): ', 'Mass Flow Rate (Kg/s): ']);
    expect(output).toEqual(['"lots" is not a number, try again.']);
  });

  it('gives up after the attempt limit', async () => {
    const reader = new ScriptedReader(['a', 'b']);
    const err = await captureErrorAsync(() => new Prompter(reader, () => undefined, 2).number('Timestep (s): '));
    expect(err.kind).toBe('InvalidInput');
    expect(err.message).toBe('No valid number given for "Timestep (s):"');
  });

  it('maps a choice through its options', async () => {
    const reader = new ScriptedReader(['3', '2']);
    const output: string[] = [];
    const mode = await new Prompter(reader, (l) => output.push(l)).choice('Mode? ', { '1': 'burn', '2': 'nozzle' });
    expect(mode).toBe('nozzle');
    expect(output).toEqual(['Please type one of: 1, 2']);
  });

  it('trims text answers and closes the reader', async () => {
    const reader = new ScriptedReader(['  SRF  ']);
    const prompter = new Prompter(reader, () => undefined);
    expect(await prompter.text('Fuel: ')).toBe('SRF');
    prompter.close();
    expect(reader.closed).toBe(true);
  });
});
