/**
 * Selection rules - the resolved, immutable input of the engine.
 *
 * A profile holds the base lists plus what each toggle contributes.
 * Toggles are applied once by buildSelectionRule(); the engine never sees them.
 */

export interface SelectionRule {
    readonly includedDirectories: readonly string[];
    readonly rootFiles: readonly string[];
    readonly includedExtensions: ReadonlySet<string>;
    readonly excludedPathFragments: ReadonlySet<string>;
    readonly excludeHiddenDirectories: boolean;
    readonly excludedFilenamePatterns: readonly string[];
}

export interface SelectionProfile {
    includedDirectories: readonly string[];
    rootFiles: readonly string[];
    extensions: readonly string[];
    excludedPathFragments: readonly string[];
    excludeHiddenDirectories: boolean;
    excludedFilenamePatterns: readonly string[];
    /** Added by includeDocs */
    docExtensions: readonly string[];
    /** Added by includeDocs */
    docRootFiles: readonly string[];
    /** Added by includeTests */
    testDirectories: readonly string[];
    /** Added by includeArtProcessing */
    artProcessingDirectories: readonly string[];
}

export interface Toggles {
    includeDocs: boolean;
    includeTests: boolean;
    includeArtProcessing: boolean;
    /** Report the selection instead of writing stacks */
    listOnly: boolean;
}

export const DEFAULT_TOGGLES: Readonly<Toggles> = Object.freeze({
    includeDocs: false,
    includeTests: false,
    includeArtProcessing: false,
    listOnly: false,
});

/** App code only: no docs, tests, caches, tool state or backups. */
export const DEFAULT_PROFILE: Readonly<SelectionProfile> = Object.freeze({
    includedDirectories: Object.freeze([
        'helpers',
        'routes',
        'scripts',
        'settings',
        'static/css',
        'static/js',
        'templates',
        'utils',
    ]),
    rootFiles: Object.freeze([
        'app.py', 'config.py', 'requirements.txt',
        'toolkit.sh', 'gpt-edit.sh', 'gpt-edit-with-context.sh',
        'generate_folder_tree.py', 'cron-backup.sh', 'db.py',
    ]),
    extensions: Object.freeze(['.py', '.js', '.css', '.html', '.json', '.sh', '.ini', '.toml', '.yml', '.yaml']),
    excludedPathFragments: Object.freeze([
        'venv', '__pycache__',
        '.cache', '.config', '.dotnet', '.gemini', '.local', '.npm', '.nvm', '.pytest_cache', '.ssh', '.vscode-server',
        'backups', 'code-stacks', 'CODEX-LOGS', 'data', 'generic_texts', 'google-cloud-sdk',
        'inputs', 'logs', 'outputs', 'node_modules', 'build', 'dist', '.mypy_cache', '.ruff_cache',
        'old', 'archive', 'bk',
    ]),
    excludeHiddenDirectories: true,
    excludedFilenamePatterns: Object.freeze(['*-bk.*', '*_bk.*', '*-backup.*', '*.bak', '*~', '*.log']),
    docExtensions: Object.freeze(['.md', '.txt']),
    docRootFiles: Object.freeze(['README.md', 'CHANGELOG.md', 'CODEX-README.md']),
    testDirectories: Object.freeze(['tests']),
    artProcessingDirectories: Object.freeze(['art-processing']),
});

/**
 * Parse an environment-style flag. Only "true" (any case) is true.
 */
export function parseToggle(value: string | undefined): boolean {
    return value !== undefined && value.toLowerCase() === 'true';
}

function unique(values: readonly string[]): string[] {
    return [...new Set(values)];
}

/**
 * Resolve a profile and toggles into the rule the engine runs on.
 * Toggles only append; nothing they add can remove an earlier entry.
 */
export function buildSelectionRule(
    profile: SelectionProfile = DEFAULT_PROFILE,
    toggles: Partial<Toggles> = {}
): SelectionRule {
    const { includeDocs = false, includeTests = false, includeArtProcessing = false } = toggles;

    const includedDirectories = [...profile.includedDirectories];
    if (includeTests) includedDirectories.push(...profile.testDirectories);
    if (includeArtProcessing) includedDirectories.push(...profile.artProcessingDirectories);

    const rootFiles = [...profile.rootFiles];
    const extensions = [...profile.extensions];
    if (includeDocs) {
        rootFiles.push(...profile.docRootFiles);
        extensions.push(...profile.docExtensions);
    }

    return Object.freeze({
        includedDirectories: Object.freeze(unique(includedDirectories)),
        rootFiles: Object.freeze(unique(rootFiles)),
        includedExtensions: new Set(extensions),
        excludedPathFragments: new Set(profile.excludedPathFragments),
        excludeHiddenDirectories: profile.excludeHiddenDirectories,
        excludedFilenamePatterns: Object.freeze(unique(profile.excludedFilenamePatterns)),
    });
}
