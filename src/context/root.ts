import { existsSync, realpathSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { InvalidInputError } from '../errors.js';

export interface ResolvedRoot {
  absolutePath: string;
  /** Name rendered as the tree's first line and used for "<name>_prompt.txt" */
  name: string;
}

/**
 * Validate that `dir` exists and is a directory with a name.
 * `canonical` resolves symlinks first, so the real directory's name is used.
 */
export function resolveRoot(dir: string, options: { canonical?: boolean } = {}): ResolvedRoot {
  const resolved = resolve(dir);

  if (!existsSync(resolved)) {
    throw new InvalidInputError(`Path does not exist: ${dir}\nResolved to: ${resolved}`);
  }

  const absolutePath = options.canonical ? realpathSync(resolved) : resolved;
  if (!statSync(absolutePath).isDirectory()) {
    throw new InvalidInputError(`Path is not a directory: ${dir}\nResolved to: ${absolutePath}`);
  }

  const name = basename(absolutePath);
  if (!name) {
    throw new InvalidInputError(`Could not determine name of directory: ${dir}`);
  }

  return { absolutePath, name };
}
