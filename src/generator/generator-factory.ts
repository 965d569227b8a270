/**
 * @file generator-factory.ts
 * @module generator/generator-factory
 * @license MIT
 *
 * @fileoverview Factory for creating target-specific generators.
 */

import type { BindingTarget } from '../config.js';
import type { ApiRoot } from '../model/types.js';
import { GoGenerator } from './go-generator.js';
import { JavaGenerator } from './java-generator.js';
import type { BindingGenerator } from './types.js';

/**
 * Factory for creating generators by binding target.
 *
 * @example
 * ```typescript
 * const generator = GeneratorFactory.createGenerator('go', '../roc-go', apiRoot);
 * const result = generator.generateFiles();
 * ```
 */
export class GeneratorFactory {
    /**
     * Create the generator for a target.
     *
     * @param target - Binding target
     * @param outputDir - Output root of the target
     * @param apiRoot - Shared API model
     */
    static createGenerator(target: BindingTarget, outputDir: string, apiRoot: ApiRoot): BindingGenerator {
        switch (target) {
            case 'go':
                return new GoGenerator(outputDir, apiRoot);
            case 'java':
                return new JavaGenerator(outputDir, apiRoot);
        }
    }
}
