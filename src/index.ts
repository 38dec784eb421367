/**
 * Library entry: `buildPrompt` for embedding, `cli` for process entry points.
 * Both are thin wrappers over buildPromptDocument / runCli.
 */

import { buildPromptDocument } from './context/gather.js';
import type { MatchMode } from './context/filter.js';
import { EMPTY_IGNORE_CONFIG, mergeIgnoreConfig, type IgnoreConfig } from './config/config.js';
import { runCli } from './cli.js';

export interface BuildPromptOptions {
  /** Directory to scan (default: ".") */
  dir?: string;
  /** Suffix filters; empty keeps every file */
  filter?: readonly string[];
  ignoreDirs?: readonly string[];
  ignoreFiles?: readonly string[];
  treeOnly?: boolean;
  matchMode?: MatchMode;
  notebooks?: boolean;
  /** Lists applied before ignoreDirs/ignoreFiles; none when omitted */
  defaults?: IgnoreConfig;
}

export function buildPrompt(options: BuildPromptOptions = {}): string {
  const config = mergeIgnoreConfig(options.defaults ?? EMPTY_IGNORE_CONFIG, options.ignoreDirs, options.ignoreFiles);

  return buildPromptDocument({
    root: options.dir ?? '.',
    filters: options.filter ?? [],
    ignoreDirs: config.IGNORE_DIRS,
    ignoreFiles: config.IGNORE_FILES,
    treeOnly: options.treeOnly ?? false,
    matchMode: options.matchMode ?? 'name',
    notebooks: options.notebooks ?? false,
  }).document;
}

export function cli(argv: readonly string[]): Promise<number> {
  return runCli(argv);
}

export * from './context/index.js';
export * from './errors.js';
export {
  createIgnoreConfig,
  loadConfig,
  loadDefaultIgnoreConfig,
  mergeIgnoreConfig,
  parseIgnoreConfig,
  EMPTY_IGNORE_CONFIG,
} from './config/config.js';
export type { IgnoreConfig } from './config/config.js';
export { runCli, createProgram } from './cli.js';
export type { CliDeps } from './cli.js';
export { writeFileAtomic, resolveOutputPath } from './output/writer.js';
