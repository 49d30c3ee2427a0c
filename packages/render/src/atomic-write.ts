/**
 * Write-then-rename file output.
 *
 * @module atomic-write
 */

import { rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { OutputError } from '@xsql/core';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Temporary sibling of `target`, in the same directory so the rename stays on one filesystem */
export function tempPathFor(target: string): string {
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Let `produce` fill a temporary sibling of `target`, then move it into
 * place. The temporary file is removed when anything fails.
 *
 * @throws {OutputError} naming `target`
 */
export async function writeAtomically(target: string, produce: (tempPath: string) => Promise<void>): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    await produce(tempPath);
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new OutputError(target, toError(error));
  }
}

export async function writeTextAtomically(target: string, content: string): Promise<void> {
  await writeAtomically(target, (tempPath) => writeFile(tempPath, content, { encoding: 'utf-8' }));
}
