/**
 * Ignore Config Support
 *
 * A config file is a JSON object with two string arrays:
 *
 *   { "IGNORE_DIRS": ["node_modules", "dist"], "IGNORE_FILES": ["png", "*.min.js"] }
 *
 * The bundled default-ignore.json is loaded the same way. A config passed with
 * --config replaces the defaults; --ignore-dir / --ignore-file extend whichever
 * config is active.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { ConfigError } from '../errors.js';

export interface IgnoreConfig {
    readonly IGNORE_DIRS: readonly string[];
    readonly IGNORE_FILES: readonly string[];
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>(['IGNORE_DIRS', 'IGNORE_FILES']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function assertStringArray(obj: Record<string, unknown>, key: string, source: string): string[] {
    const val = obj[key];
    if (val === undefined) {
        throw new ConfigError(`Config "${key}" is missing in ${source}`, source);
    }
    if (!isStringArray(val)) {
        throw new ConfigError(`Config "${key}" must be an array of strings in ${source}`, source);
    }
    return val;
}

// ── Construction ────────────────────────────────────────────────────────────

export function createIgnoreConfig(dirs: readonly string[], files: readonly string[]): IgnoreConfig {
    return Object.freeze({
        IGNORE_DIRS: Object.freeze([...dirs]),
        IGNORE_FILES: Object.freeze([...files]),
    });
}

export const EMPTY_IGNORE_CONFIG: IgnoreConfig = createIgnoreConfig([], []);

/** Base lists first, extras appended; nothing is de-duplicated */
export function mergeIgnoreConfig(
    base: IgnoreConfig,
    extraDirs: readonly string[] = [],
    extraFiles: readonly string[] = []
): IgnoreConfig {
    return createIgnoreConfig([...base.IGNORE_DIRS, ...extraDirs], [...base.IGNORE_FILES, ...extraFiles]);
}

/**
 * Validate an already-parsed config value.
 * `source` names where it came from, for error messages.
 */
export function parseIgnoreConfig(parsed: unknown, source: string): IgnoreConfig {
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${source}`, source);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    return createIgnoreConfig(
        assertStringArray(parsed, 'IGNORE_DIRS', source),
        assertStringArray(parsed, 'IGNORE_FILES', source)
    );
}

// ── Loaders ─────────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - Throws ConfigError on a missing file, invalid JSON or a wrong shape
 */
export function loadConfig(configPath: string): IgnoreConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`, absolutePath);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`, absolutePath);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`, absolutePath);
    }

    return parseIgnoreConfig(parsed, absolutePath);
}

/**
 * The bundled default ignore lists. Each call builds a fresh frozen value;
 * callers hold on to it and pass it down.
 */
export function loadDefaultIgnoreConfig(): IgnoreConfig {
    const require = createRequire(import.meta.url);
    const bundled: unknown = require('../../default-ignore.json');
    return parseIgnoreConfig(bundled, 'default-ignore.json');
}
