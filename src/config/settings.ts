/**
 * Merge the configuration layers into one settings object.
 * Priority: CLI flags > env vars > config file > hardcoded defaults.
 */

import { resolve } from 'path';
import { DEFAULT_PROFILE, DEFAULT_TOGGLES, type SelectionProfile, type Toggles } from '../selection/rules.js';
import { DEFAULT_OUT_DIR } from '../stack/writer.js';
import type { StackerConfig } from './config.js';

/** Values the user passed explicitly on the command line */
export interface CliOverrides extends Partial<Toggles> {
    root?: string;
    outDir?: string;
    tree?: boolean;
    verbose?: boolean;
}

/** Options commander parses for the stack and list commands */
export interface CliOptions {
    docs?: boolean;
    tests?: boolean;
    artProcessing?: boolean;
    listOnly?: boolean;
    outDir?: string;
    tree?: boolean;
    configPath?: string;
    verbose?: boolean;
}

export interface StackerSettings {
    /** Absolute repository root */
    root: string;
    /** Output directory; relative values resolve against root */
    outDir: string;
    profile: SelectionProfile;
    toggles: Toggles;
    tree: boolean;
    verbose: boolean;
}

export interface SettingsLayers {
    cli?: CliOverrides;
    env?: Partial<Toggles>;
    config?: StackerConfig;
}

function profileFromConfig(config: StackerConfig): SelectionProfile {
    return {
        includedDirectories: config.includedDirectories ?? DEFAULT_PROFILE.includedDirectories,
        rootFiles: config.rootFiles ?? DEFAULT_PROFILE.rootFiles,
        extensions: config.extensions ?? DEFAULT_PROFILE.extensions,
        excludedPathFragments: config.excludedPathFragments ?? DEFAULT_PROFILE.excludedPathFragments,
        excludeHiddenDirectories: config.excludeHiddenDirectories ?? DEFAULT_PROFILE.excludeHiddenDirectories,
        excludedFilenamePatterns: config.excludedFilenamePatterns ?? DEFAULT_PROFILE.excludedFilenamePatterns,
        docExtensions: config.docExtensions ?? DEFAULT_PROFILE.docExtensions,
        docRootFiles: config.docRootFiles ?? DEFAULT_PROFILE.docRootFiles,
        testDirectories: config.testDirectories ?? DEFAULT_PROFILE.testDirectories,
        artProcessingDirectories: config.artProcessingDirectories ?? DEFAULT_PROFILE.artProcessingDirectories,
    };
}

/**
 * Only values typed on the command line go into the CLI layer,
 * so env vars and the config file can still fill the rest.
 * `--no-docs` and friends arrive as false and win over lower layers.
 */
export function overridesFromCli(rootArg: string | undefined, options: CliOptions, forceList = false): CliOverrides {
    const overrides: CliOverrides = {};
    if (rootArg !== undefined) overrides.root = rootArg;
    if (options.outDir !== undefined) overrides.outDir = options.outDir;
    if (options.docs !== undefined) overrides.includeDocs = options.docs;
    if (options.tests !== undefined) overrides.includeTests = options.tests;
    if (options.artProcessing !== undefined) overrides.includeArtProcessing = options.artProcessing;
    if (forceList) overrides.listOnly = true;
    else if (options.listOnly !== undefined) overrides.listOnly = options.listOnly;
    if (options.tree) overrides.tree = true;
    if (options.verbose) overrides.verbose = true;
    return overrides;
}

function pickToggle(key: keyof Toggles, layers: Required<SettingsLayers>): boolean {
    return layers.cli[key] ?? layers.env[key] ?? layers.config[key] ?? DEFAULT_TOGGLES[key];
}

export function resolveSettings(layers: SettingsLayers = {}): StackerSettings {
    const all: Required<SettingsLayers> = {
        cli: layers.cli ?? {},
        env: layers.env ?? {},
        config: layers.config ?? {},
    };

    return {
        root: resolve(all.cli.root ?? all.config.root ?? '.'),
        outDir: all.cli.outDir ?? all.config.outDir ?? DEFAULT_OUT_DIR,
        profile: profileFromConfig(all.config),
        toggles: {
            includeDocs: pickToggle('includeDocs', all),
            includeTests: pickToggle('includeTests', all),
            includeArtProcessing: pickToggle('includeArtProcessing', all),
            listOnly: pickToggle('listOnly', all),
        },
        tree: all.cli.tree ?? false,
        verbose: all.cli.verbose ?? all.config.verbose ?? false,
    };
}
