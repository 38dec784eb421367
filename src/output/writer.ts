/**
 * Output Writer - Saves the finished document in one step.
 *
 * The text goes to a hidden temporary sibling first and is renamed over the
 * target, so a failed run never leaves a partial prompt file behind.
 */

import { renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { nanoid } from 'nanoid';
import { IoError, describeError } from '../errors.js';

/** "<outpath>/<outfile>.txt", absolute */
export function resolveOutputPath(outpath: string, outfile: string): string {
  return resolve(outpath, `${outfile}.txt`);
}

export function temporaryPathFor(targetPath: string): string {
  return join(dirname(targetPath), `.${basename(targetPath)}.${nanoid(8)}.tmp`);
}

export function writeFileAtomic(targetPath: string, contents: string): void {
  const tempPath = temporaryPathFor(targetPath);

  try {
    writeFileSync(tempPath, contents, 'utf-8');
    renameSync(tempPath, targetPath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new IoError(`Failed to write ${targetPath}: ${describeError(error)}`, targetPath, { cause: error });
  }
}
