/**
 * Errors raised by the selection pipeline.
 */

/** The root path is missing or is not a directory. Fatal for a run. */
export class ConfigurationError extends Error {
    readonly path: string;

    constructor(message: string, path: string) {
        super(message);
        this.name = 'ConfigurationError';
        this.path = path;
    }
}

/** Write mode was requested but neither partition selected a file. */
export class EmptySelectionError extends Error {
    readonly rootPath: string;

    constructor(rootPath: string) {
        super(`No files collected under ${rootPath}. Check include/exclude rules.`);
        this.name = 'EmptySelectionError';
        this.rootPath = rootPath;
    }
}
