/**
 * Directory listing helpers shared by the walker, the name collector and the
 * cleanup scanner. Listing failures abort the whole operation.
 */

import { readdirSync, statSync } from 'fs';
import { IoError, describeError } from '../errors.js';

export type EntryKind = 'file' | 'directory';

export interface VisibleEntry {
  name: string;
  relativePath: string;
  kind: EntryKind;
}

export function listDirectory(dirPath: string): string[] {
  try {
    return readdirSync(dirPath);
  } catch (error) {
    throw new IoError(`Cannot read directory ${dirPath}: ${describeError(error)}`, dirPath, { cause: error });
  }
}

/** Follows symlinks; a dangling link counts as a file. */
export function isDirectoryPath(absolutePath: string): boolean {
  try {
    return statSync(absolutePath).isDirectory();
  } catch {
    return false;
  }
}

export function entryKind(absolutePath: string): EntryKind {
  return isDirectoryPath(absolutePath) ? 'directory' : 'file';
}

/** Code-point order, case-sensitive: "B" < "a" < "b" */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

export function joinRelative(prefix: string, name: string): string {
  return prefix ? `${prefix}/${name}` : name;
}
