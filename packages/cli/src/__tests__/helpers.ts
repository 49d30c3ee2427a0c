import type { Output } from '../session.js';

/** Output that records what would have been printed */
export interface CapturedOutput extends Output {
  readonly stdout: string[];
  readonly stderr: string[];
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

/** Run `fn` and return what it throws; fails when nothing is thrown */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export const PAGE = '<ul><li><a href="/one">One</a></li><li><a href="/two">Two</a></li></ul>';
