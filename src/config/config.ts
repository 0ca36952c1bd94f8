/**
 * Config File Support
 *
 * One JSON file can pin the whole run:
 * - Location (root, outDir)
 * - Profile lists (directories, root files, extensions, exclusions, toggle additions)
 * - Toggles (includeDocs, includeTests, includeArtProcessing, listOnly)
 * - Misc (verbose)
 *
 * All fields optional. Profile lists replace the defaults, they do not merge.
 * Priority: CLI flags > env vars > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { DEFAULT_PROFILE, DEFAULT_TOGGLES } from '../selection/rules.js';
import { DEFAULT_OUT_DIR } from '../stack/writer.js';

export interface StackerConfig {
    // Location
    root?: string;
    outDir?: string;

    // Profile
    includedDirectories?: readonly string[];
    rootFiles?: readonly string[];
    extensions?: readonly string[];
    excludedPathFragments?: readonly string[];
    excludeHiddenDirectories?: boolean;
    excludedFilenamePatterns?: readonly string[];
    docExtensions?: readonly string[];
    docRootFiles?: readonly string[];
    testDirectories?: readonly string[];
    artProcessingDirectories?: readonly string[];

    // Toggles
    includeDocs?: boolean;
    includeTests?: boolean;
    includeArtProcessing?: boolean;
    listOnly?: boolean;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const STRING_KEYS = ['root', 'outDir'] as const;

const STRING_ARRAY_KEYS = [
    'includedDirectories', 'rootFiles', 'extensions', 'excludedPathFragments',
    'excludedFilenamePatterns', 'docExtensions', 'docRootFiles',
    'testDirectories', 'artProcessingDirectories',
] as const;

const BOOLEAN_KEYS = [
    'excludeHiddenDirectories',
    'includeDocs', 'includeTests', 'includeArtProcessing', 'listOnly',
    'verbose',
] as const;

const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...STRING_ARRAY_KEYS, ...BOOLEAN_KEYS]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

function isStringArray(val: unknown): val is string[] {
    return Array.isArray(val) && val.every(v => typeof v === 'string');
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!isStringArray(val)) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    return val;
}

function isRecord(val: unknown): val is Record<string, unknown> {
    return typeof val === 'object' && val !== null && !Array.isArray(val);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative `root` resolves from the config file's directory
 * - Throws on missing file, invalid JSON or a wrongly typed key
 */
export function loadConfig(configPath: string): StackerConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: StackerConfig = {};
    const configDir = dirname(absolutePath);

    for (const key of STRING_KEYS) {
        if (parsed[key] !== undefined) config[key] = assertString(parsed, key);
    }
    if (config.root !== undefined && !isAbsolute(config.root)) {
        config.root = resolve(configDir, config.root);
    }

    for (const key of STRING_ARRAY_KEYS) {
        if (parsed[key] !== undefined) config[key] = assertStringArray(parsed, key);
    }

    for (const key of BOOLEAN_KEYS) {
        if (parsed[key] !== undefined) config[key] = assertBoolean(parsed, key);
    }

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Shows every available option with its default.
 */
export const CONFIG_TEMPLATE: StackerConfig = {
    root: '.',
    outDir: DEFAULT_OUT_DIR,

    ...DEFAULT_PROFILE,

    ...DEFAULT_TOGGLES,

    verbose: false,
};
