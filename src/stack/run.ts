/**
 * Stacker run - selection followed by either a listing or the two stack files.
 *
 * Kept apart from the commander wiring so a whole run can be driven in-process.
 * ConfigurationError is not handled here; the caller decides how to report it.
 */

import { basename, resolve } from 'path';
import type { StackerSettings } from '../config/settings.js';
import { selectFiles } from '../selection/engine.js';
import { EmptySelectionError } from '../selection/errors.js';
import { buildSelectionRule } from '../selection/rules.js';
import { formatListing } from './report.js';
import { renderSelectionTree } from './tree.js';
import { writeStacks } from './writer.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_EMPTY_SELECTION = 2;

export interface RunOptions {
    /** Clock for stack titles and file names */
    now?: Date;
}

export function runStacker(settings: StackerSettings, options: RunOptions = {}): number {
    const start = Date.now();
    const { toggles, verbose } = settings;

    const rule = buildSelectionRule(settings.profile, toggles);

    if (verbose) {
        console.log(`  Root: ${settings.root}`);
        console.log(`  Directories: ${rule.includedDirectories.join(', ') || '(none)'}`);
        console.log(`  Root files: ${rule.rootFiles.join(', ') || '(none)'}`);
        console.log(`  Extensions: ${[...rule.includedExtensions].join(', ')}`);
        console.log(`  Excluded names: ${[...rule.excludedPathFragments].join(', ')}`);
        console.log(`  Excluded patterns: ${rule.excludedFilenamePatterns.join(', ')}`);
        console.log(`  Hidden directories: ${rule.excludeHiddenDirectories ? 'excluded' : 'included'}`);
    }

    const selection = selectFiles(settings.root, rule);

    if (verbose) {
        console.log(`  Selected ${selection.directoryFiles.length} + ${selection.rootFiles.length} files in ${Date.now() - start}ms`);
    }

    if (toggles.listOnly) {
        console.log(formatListing(selection));
        if (settings.tree) {
            console.log('');
            console.log(renderSelectionTree(
                [...selection.directoryFiles, ...selection.rootFiles],
                basename(settings.root)
            ));
        }
        return EXIT_OK;
    }

    try {
        const result = writeStacks(settings.root, selection, { outDir: settings.outDir, now: options.now });

        for (const skipped of result.skipped) {
            console.warn(`⚠️  Skipped ${skipped.path} (${skipped.reason})`);
        }

        console.log('✅ Code stacks generated:');
        console.log(`   ${result.fullStackPath}   (files: ${result.fileCount})`);
        console.log(`   ${result.rootStackPath}   (root files: ${result.rootFileCount})`);

        if (verbose) {
            console.log(`  Output directory: ${resolve(settings.root, settings.outDir)}`);
            console.log(`  Total time: ${Date.now() - start}ms`);
        }
        return EXIT_OK;
    } catch (error) {
        if (error instanceof EmptySelectionError) {
            console.error('❌ No files collected. Check include/exclude rules.');
            return EXIT_EMPTY_SELECTION;
        }
        throw error;
    }
}
