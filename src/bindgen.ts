/**
 * @file bindgen.ts
 * @module bindgen
 * @license MIT
 *
 * @fileoverview Pipeline driver: Doxygen XML to API model to bindings.
 */

import { DEFAULT_DOXYGEN_SOURCES, type BindgenConfig, type DoxygenSources } from './config.js';
import { DoxygenParser } from './doxygen/doxygen-parser.js';
import { readGitInfo } from './doxygen/git-info.js';
import { GeneratorFactory } from './generator/generator-factory.js';
import type { GenerationResult } from './generator/types.js';
import { createApiRoot } from './model/api-root.js';
import type { ApiRoot, GitInfo } from './model/types.js';
import { Logger } from './shared/logger.js';

const log = new Logger('bindgen');

export interface RunOptions {
    /** Revision to print in banners; read from the toolkit checkout when omitted */
    gitInfo?: GitInfo;
    /** Doxygen files to read */
    sources?: DoxygenSources;
}

/**
 * Parse the Doxygen directory and assemble the API model.
 *
 * @throws {BindgenError} When input files or git metadata can't be read
 */
export function loadApiRoot(config: BindgenConfig, options: RunOptions = {}): ApiRoot {
    const gitInfo = options.gitInfo ?? readGitInfo(config.toolkitDir);
    const parser = new DoxygenParser(config.doxygenDir, options.sources ?? DEFAULT_DOXYGEN_SOURCES);
    return createApiRoot(parser.parse(gitInfo));
}

/**
 * Run the whole pipeline for every configured target.
 *
 * The API model is built once and shared by all generators.
 *
 * @returns One result per target, in target order
 * @throws {BindgenError} On the first fatal problem
 */
export function runBindgen(config: BindgenConfig, options: RunOptions = {}): GenerationResult[] {
    const apiRoot = loadApiRoot(config, options);
    const results: GenerationResult[] = [];

    for (const target of config.targets) {
        const outputDir = config.outputDirs[target];
        log.info(`Running ${target} generator for ${outputDir}`);

        const generator = GeneratorFactory.createGenerator(target, outputDir, apiRoot);
        const result = generator.generateFiles();

        log.info(`Wrote ${result.writeStats.filesWritten} ${target} files in ${result.elapsedMs}ms`);
        results.push(result);
    }

    return results;
}
