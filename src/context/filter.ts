/**
 * Ignore Filter - Compiles ignore specs and decides which entries are visible.
 *
 * A spec is a literal name ("node_modules"), a bare extension ("py", ".png")
 * or a glob ("*.egg-info", "src/*.bak"). All specs in a list are OR-ed.
 */

import { Minimatch } from 'minimatch';
import { InvalidPatternError, describeError } from '../errors.js';

/**
 * How globs see an entry:
 * - `name`: only the bare entry name
 * - `relativePath`: the path relative to the scan root; globs without a `/`
 *   still match the basename
 */
export type MatchMode = 'name' | 'relativePath';

export const MATCH_MODES: readonly MatchMode[] = ['name', 'relativePath'];

export interface MatchCandidate {
  /** Bare entry name, e.g. "a.py" */
  name: string;
  /** POSIX path from the scan root, e.g. "src/a.py" */
  relativePath: string;
}

export interface CompiledPattern {
  readonly source: string;
  readonly mode: MatchMode;
  readonly glob: boolean;
  readonly matcher: Minimatch;
}

export interface IgnoreRules {
  readonly dirs: readonly CompiledPattern[];
  readonly files: readonly CompiledPattern[];
  readonly extensions: ReadonlySet<string>;
  /** Literal file names, never treated as globs (generated prompt files) */
  readonly exactFileNames: ReadonlySet<string>;
}

/** Dotfiles that stay visible: example env files are useful context */
const ALLOWED_DOTFILES: ReadonlySet<string> = new Set(['.env.example', '.example.env']);

const GLOB_CHARS = /[*?[\]{}]/;

export function isMatchMode(value: string): value is MatchMode {
  return value === 'name' || value === 'relativePath';
}

export function isGlobPattern(spec: string): boolean {
  return GLOB_CHARS.test(spec);
}

export function isHiddenEntry(name: string): boolean {
  return name.startsWith('.') && !ALLOWED_DOTFILES.has(name);
}

export function compilePattern(spec: string, mode: MatchMode = 'name'): CompiledPattern {
  if (spec.trim() === '') {
    throw new InvalidPatternError('Ignore pattern must not be empty', spec);
  }
  if (spec.includes('\0')) {
    throw new InvalidPatternError(`Ignore pattern contains a NUL character: ${JSON.stringify(spec)}`, spec);
  }

  let matcher: Minimatch;
  try {
    matcher = new Minimatch(spec, {
      dot: true,
      nonegate: true,
      nocomment: true,
      matchBase: mode === 'relativePath',
    });
  } catch (error) {
    throw new InvalidPatternError(`Invalid ignore pattern "${truncate(spec)}": ${describeError(error)}`, spec);
  }

  if (matcher.makeRe() === false) {
    throw new InvalidPatternError(`Invalid ignore pattern "${truncate(spec)}"`, spec);
  }

  return { source: spec, mode, glob: isGlobPattern(spec), matcher };
}

export function compilePatterns(specs: readonly string[], mode: MatchMode = 'name'): CompiledPattern[] {
  return specs.map(spec => compilePattern(spec, mode));
}

export function matchesPattern(pattern: CompiledPattern, candidate: MatchCandidate): boolean {
  if (candidate.name === pattern.source) return true;

  if (pattern.mode === 'name') {
    return pattern.glob && pattern.matcher.match(candidate.name);
  }

  if (candidate.relativePath === pattern.source) return true;
  return pattern.glob && pattern.matcher.match(candidate.relativePath);
}

export function matchesAny(patterns: readonly CompiledPattern[], candidate: MatchCandidate): boolean {
  return patterns.some(p => matchesPattern(p, candidate));
}

/**
 * Literal file specs double as extensions: "py", ".py" and "PY" all ignore
 * "main.py". Globs never contribute.
 */
export function compileExtensions(specs: readonly string[]): Set<string> {
  const extensions = new Set<string>();
  for (const spec of specs) {
    if (isGlobPattern(spec)) continue;
    const bare = spec.startsWith('.') ? spec.slice(1) : spec;
    if (bare) extensions.add(bare.toLowerCase());
  }
  return extensions;
}

/** Text after the last dot. ".bashrc" and "Makefile" have none. */
export function extensionOf(fileName: string): string | undefined {
  const dotIdx = fileName.lastIndexOf('.');
  if (dotIdx <= 0) return undefined;
  return fileName.slice(dotIdx + 1);
}

export function compileIgnoreRules(options: {
  dirs?: readonly string[];
  files?: readonly string[];
  exactFileNames?: Iterable<string>;
  mode?: MatchMode;
}): IgnoreRules {
  const mode = options.mode ?? 'name';
  const files = options.files ?? [];
  return {
    dirs: compilePatterns(options.dirs ?? [], mode),
    files: compilePatterns(files, mode),
    extensions: compileExtensions(files),
    exactFileNames: new Set(options.exactFileNames ?? []),
  };
}

export function isIgnoredDir(rules: IgnoreRules, candidate: MatchCandidate): boolean {
  return matchesAny(rules.dirs, candidate);
}

export function isIgnoredFile(rules: IgnoreRules, candidate: MatchCandidate): boolean {
  if (rules.exactFileNames.has(candidate.name)) return true;
  if (matchesAny(rules.files, candidate)) return true;

  const ext = extensionOf(candidate.name);
  return ext !== undefined && rules.extensions.has(ext.toLowerCase());
}

function truncate(spec: string, max: number = 80): string {
  return spec.length > max ? `${spec.slice(0, max)}...` : spec;
}
