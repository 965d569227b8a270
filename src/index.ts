#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @license MIT
 *
 * @fileoverview CLI entry point for generating Go and Java bindings from the
 * roc-toolkit Doxygen XML.
 */

/**
 * @example
 * ```bash
 * # Regenerate both bindings next to a roc-toolkit checkout
 * roc-bindgen -t all
 *
 * # Go only, with explicit locations
 * roc-bindgen -t go --toolkit-dir ~/src/roc-toolkit --go-output-dir ~/src/roc-go
 * ```
 */

import { Option, program } from 'commander';

import { runBindgen } from './bindgen.js';
import {
    DEFAULT_DOXYGEN_DIR,
    DEFAULT_GO_OUTPUT_DIR,
    DEFAULT_JAVA_OUTPUT_DIR,
    DEFAULT_TOOLKIT_DIR,
    TARGET_SELECTORS,
    resolveConfig,
    type BindgenOptions,
} from './config.js';
import { BindgenError } from './shared/errors.js';
import { Logger, setLogLevel } from './shared/logger.js';

const log = new Logger('main');

/**
 * Generate bindings for the selected targets and print a summary.
 *
 * @param options - Parsed command-line options
 */
function generate(options: BindgenOptions) {
    const config = resolveConfig(options);
    setLogLevel(config.verbose ? 'debug' : 'info');

    log.debug(`Toolkit directory: ${config.toolkitDir}`);
    log.debug(`Doxygen directory: ${config.doxygenDir}`);

    const results = runBindgen(config);

    for (const result of results) {
        const { filesWritten, directoriesCreated, bytesWritten } = result.writeStats;
        log.info(
            `${result.target}: ${filesWritten} files, ${directoriesCreated} directories created, ` +
            `${(bytesWritten / 1024).toFixed(1)} KB`
        );
    }
}

/**
 * CLI entry point.
 */
async function main() {
    program
        .name('roc-bindgen')
        .description('Generate roc-go and roc-java sources from roc-toolkit Doxygen XML')
        .version('1.0.0')
        .addOption(
            new Option('-t, --type <type>', 'Bindings to generate')
                .choices(TARGET_SELECTORS)
                .makeOptionMandatory()
        )
        .option('--toolkit-dir <dir>', 'roc-toolkit checkout', DEFAULT_TOOLKIT_DIR)
        .option('--doxygen-dir <dir>', `Doxygen XML directory (default: <toolkit-dir>/${DEFAULT_DOXYGEN_DIR})`)
        .option('--go-output-dir <dir>', 'roc-go checkout', DEFAULT_GO_OUTPUT_DIR)
        .option('--java-output-dir <dir>', 'roc-java checkout', DEFAULT_JAVA_OUTPUT_DIR)
        .option('-v, --verbose', 'Enable debug output')
        .action(generate);

    await program.parseAsync();
}

main().catch((error: unknown) => {
    if (error instanceof BindgenError) {
        log.error(error.message);
        process.exit(error.exitCode);
    }
    log.error(error instanceof Error ? error.stack ?? error.message : String(error));
    process.exit(1);
});
