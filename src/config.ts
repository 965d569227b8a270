/**
 * @file config.ts
 * @module config
 * @license MIT
 *
 * @fileoverview Defaults and resolved run configuration.
 */

import { join } from 'node:path';

/** Binding targets the generator can produce */
export type BindingTarget = 'go' | 'java';

/** Value of the `--type` option */
export type TargetSelector = BindingTarget | 'all';

export const TARGET_SELECTORS: readonly TargetSelector[] = ['all', 'java', 'go'];

/** Doxygen XML location relative to the toolkit checkout */
export const DEFAULT_DOXYGEN_DIR = 'build/docs/public_api/xml';
export const DEFAULT_TOOLKIT_DIR = '../roc-toolkit';
export const DEFAULT_GO_OUTPUT_DIR = '../roc-go';
export const DEFAULT_JAVA_OUTPUT_DIR = '../roc-java';

/**
 * Naming convention of the C API.
 *
 * Types and functions are `roc_lower_snake`, constants are `ROC_UPPER_SNAKE`.
 */
export const API_NAMESPACE = 'roc';
export const API_NAME_PREFIX = `${API_NAMESPACE}_`;
export const API_CONSTANT_PREFIX = `${API_NAMESPACE.toUpperCase()}_`;

/**
 * Enums whose constants don't use the `UPPERCASE_NAME_` prefix.
 */
export const ODD_ENUM_PREFIXES: ReadonlyMap<string, string> = new Map([
    ['roc_protocol', 'ROC_PROTO_'],
]);

/**
 * Doxygen XML files the definitions are read from.
 */
export interface DoxygenSources {
    /** File holding every enum of the public API */
    enumsFile: string;
    /** One compound file per struct */
    structFiles: readonly string[];
    /** One header file per class (opaque typedef + functions) */
    classFiles: readonly string[];
}

export const DEFAULT_DOXYGEN_SOURCES: DoxygenSources = {
    enumsFile: 'config_8h.xml',
    structFiles: [
        'structroc__context__config.xml',
        'structroc__receiver__config.xml',
        'structroc__sender__config.xml',
        'structroc__interface__config.xml',
        'structroc__media__encoding.xml',
    ],
    classFiles: [
        'context_8h.xml',
        'receiver_8h.xml',
        'sender_8h.xml',
        'endpoint_8h.xml',
    ],
};

/**
 * Fully resolved configuration for one run.
 */
export interface BindgenConfig {
    /** Targets to generate, in generation order */
    targets: BindingTarget[];
    /** roc-toolkit checkout, used for git metadata */
    toolkitDir: string;
    /** Doxygen XML directory */
    doxygenDir: string;
    /** Output root per target */
    outputDirs: Record<BindingTarget, string>;
    /** Enable debug logging */
    verbose: boolean;
}

/**
 * Options as received from the command line.
 */
export interface BindgenOptions {
    type: TargetSelector;
    toolkitDir?: string;
    doxygenDir?: string;
    goOutputDir?: string;
    javaOutputDir?: string;
    verbose?: boolean;
}

/**
 * Expand a target selector into the list of targets, java first.
 */
export function selectTargets(selector: TargetSelector): BindingTarget[] {
    switch (selector) {
        case 'all':
            return ['java', 'go'];
        case 'java':
            return ['java'];
        case 'go':
            return ['go'];
    }
}

/**
 * Fill in defaults for options not given on the command line.
 *
 * @example
 * ```typescript
 * resolveConfig({ type: 'go', toolkitDir: '/src/roc-toolkit' }).doxygenDir
 * // '/src/roc-toolkit/build/docs/public_api/xml'
 * ```
 */
export function resolveConfig(options: BindgenOptions): BindgenConfig {
    const toolkitDir = options.toolkitDir ?? DEFAULT_TOOLKIT_DIR;

    return {
        targets: selectTargets(options.type),
        toolkitDir,
        doxygenDir: options.doxygenDir ?? join(toolkitDir, DEFAULT_DOXYGEN_DIR),
        outputDirs: {
            go: options.goOutputDir ?? DEFAULT_GO_OUTPUT_DIR,
            java: options.javaOutputDir ?? DEFAULT_JAVA_OUTPUT_DIR,
        },
        verbose: options.verbose ?? false,
    };
}
