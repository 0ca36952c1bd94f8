export { selectFiles, validateRoot, comparePaths } from './engine.js';
export type { SelectionResult } from './engine.js';

// Rules
export { buildSelectionRule, parseToggle, DEFAULT_PROFILE, DEFAULT_TOGGLES } from './rules.js';
export type { SelectionRule, SelectionProfile, Toggles } from './rules.js';

// Matching
export {
    globToRegex,
    matchesGlob,
    hasExcludedSegment,
    hasHiddenDirectory,
    hasIncludedExtension,
    matchesExcludedFilename,
    isSelectable,
    shouldPruneDir,
} from './match.js';

// Errors
export { ConfigurationError, EmptySelectionError } from './errors.js';
