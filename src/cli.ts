#!/usr/bin/env node

/**
 * codestack CLI
 *
 * Collect a repository's app code into markdown stacks, or list what would be collected.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, type StackerConfig } from './config/config.js';
import { readEnvToggles } from './config/env.js';
import { overridesFromCli, resolveSettings, type CliOptions } from './config/settings.js';
import { runStacker, EXIT_ERROR } from './stack/run.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

function run(rootArg: string | undefined, options: CliOptions, forceList: boolean): void {
    try {
        let config: StackerConfig = {};
        if (options.configPath) {
            config = loadConfig(options.configPath);
        }

        const settings = resolveSettings({
            cli: overridesFromCli(rootArg, options, forceList),
            env: readEnvToggles(),
            config,
        });

        if (settings.verbose && options.configPath) {
            console.log(`📄 Config loaded from: ${resolve(options.configPath)}`);
        }

        process.exitCode = runStacker(settings);
    } catch (error) {
        // ConfigurationError (bad root) and config file errors alike
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = EXIT_ERROR;
    }
}

function addSelectionOptions(command: Command): Command {
    return command
        .argument('[root]', 'Repository root (default: current directory)')
        .option('--docs', 'Include .md/.txt files and documentation root files')
        .option('--no-docs', 'Leave docs out, even if env or config turn them on')
        .option('--tests', 'Include test directories')
        .option('--no-tests', 'Leave test directories out')
        .option('--art-processing', 'Include art-processing directories')
        .option('--no-art-processing', 'Leave art-processing directories out')
        .option('--tree', 'In listing mode, also draw the selection as a tree')
        .option('--config-path <path>', 'Path to config JSON file')
        .option('--verbose', 'Verbose output');
}

program
    .name('codestack')
    .description('Collect selected source files into markdown stacks for review')
    .version(pkg.version);

/**
 * Stack command - write the two stack documents (or list, with --list-only)
 */
addSelectionOptions(
    program
        .command('stack', { isDefault: true })
        .description('Write full-code and root-files stacks')
)
    .option('--list-only', 'List the selection without writing stacks')
    .option('--no-list-only', 'Write stacks even if env or config ask for listing')
    .option('-o, --out-dir <dir>', 'Output directory, relative to the root (default: code-stacks)')
    .action((rootArg: string | undefined, options: CliOptions) => {
        run(rootArg, options, false);
    });

/**
 * List command - dry run
 */
addSelectionOptions(
    program
        .command('list')
        .description('List the files a stack would include, without writing anything')
)
    .action((rootArg: string | undefined, options: CliOptions) => {
        run(rootArg, options, true);
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'codestack.config.json')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: codestack --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
program.parse();
