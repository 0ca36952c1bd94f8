export { runStacker, EXIT_OK, EXIT_ERROR, EXIT_EMPTY_SELECTION } from './run.js';
export type { RunOptions } from './run.js';

// Writing
export { writeStacks, renderStack, stackPaths, formatSectionHeader, DEFAULT_OUT_DIR } from './writer.js';
export type { WriteOptions, WriteResult, RenderResult, SkippedFile } from './writer.js';

// Listing
export { formatListing } from './report.js';
export { renderSelectionTree } from './tree.js';

export { formatStamp } from './timestamp.js';
