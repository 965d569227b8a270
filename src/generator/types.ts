/**
 * @file types.ts
 * @module generator/types
 * @license MIT
 *
 * @fileoverview Type definitions for binding generators.
 */

import type { BindingTarget } from '../config.js';
import type { WriteStats } from '../shared/file-writer.js';
import type { ClassDefinition, EnumDefinition, StructDefinition } from '../model/types.js';

/**
 * One rendered source file.
 */
export interface GeneratedFile {
    /** Path relative to the target's output root */
    path: string;
    /** Full file content */
    content: string;
}

/**
 * Result of a generation run for one target.
 */
export interface GenerationResult {
    target: BindingTarget;
    /** Written files in generation order */
    files: string[];
    /** File write statistics */
    writeStats: WriteStats;
    /** Time taken in milliseconds */
    elapsedMs: number;
}

/**
 * Generator interface for one binding target.
 *
 * Each generator turns definitions of the shared API model into source
 * files of its target language. The `generate*` methods render one
 * definition and write it, returning the written path.
 */
export interface BindingGenerator {
    /**
     * Target language of this generator.
     */
    readonly target: BindingTarget;

    /**
     * Generate every enum, struct and class, in that order, each kind in
     * declaration order.
     */
    generateFiles(): GenerationResult;

    generateEnum(enumDefinition: EnumDefinition): string;

    generateStruct(structDefinition: StructDefinition): string;

    /**
     * Generate a class scaffold. Method signatures are not translated; the
     * result is a stub meant to be completed by hand.
     */
    generateClass(classDefinition: ClassDefinition): string;
}
