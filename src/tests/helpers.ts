import { ThrustbenchError } from '@/core/errors';
import type { LineReader } from '@/ui/Prompter';

export function captureError(fn: () => unknown): ThrustbenchError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ThrustbenchError) return error;
    throw error;
  }
  throw new Error('Expected a ThrustbenchError, nothing was thrown');
}

export async function captureErrorAsync(fn: () => Promise<unknown>): Promise<ThrustbenchError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof ThrustbenchError) return error;
    throw error;
  }
  throw new Error('Expected a ThrustbenchError, nothing was thrown');
}

// Answers prompts from a fixed script and records what was asked
export class ScriptedReader implements LineReader {
  public readonly questions: string[] = [];
  public closed = false;
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  question(query: string): Promise<string> {
    this.questions.push(query);
    const next = this.answers.shift();
    if (next === undefined) return Promise.reject(new Error(`Unexpected prompt: ${query}`));
    return Promise.resolve(next);
  }

  close(): void {
    this.closed = true;
  }
}
