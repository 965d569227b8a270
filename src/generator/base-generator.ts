/**
 * @file base-generator.ts
 * @module generator/base-generator
 * @license MIT
 *
 * @fileoverview Abstract base class for binding generators with shared
 * traversal, header and comment wrapping logic.
 */

import type { BindingTarget } from '../config.js';
import { FileWriter } from '../shared/file-writer.js';
import { Logger } from '../shared/logger.js';
import { wrapText } from '../shared/text-wrap.js';
import type {
    ApiRoot,
    ClassDefinition,
    DocComment,
    DocRef,
    DocSeeItem,
    DocTextItem,
    EnumDefinition,
    StructDefinition,
} from '../model/types.js';
import { layoutBlock, type DocSegment, type InlineRenderer } from './doc-layout.js';
import type { BindingGenerator, GeneratedFile, GenerationResult } from './types.js';

/** Column limit of generated comments */
export const COMMENT_WIDTH = 80;

/**
 * Abstract base class providing the traversal and output logic shared by
 * all targets.
 *
 * Subclasses implement:
 * - renderEnum(), renderStruct(), renderClass(): produce file content
 * - renderInline(): inline doc items in the target's comment markup
 *
 * Rendering is a pure function of the definition and the {@link ApiRoot};
 * only the `generate*` methods touch the file system.
 *
 * @example
 * ```typescript
 * class MyGenerator extends BaseGenerator {
 *   readonly target = 'go';
 *   renderEnum(def) {
 *     return { path: `${def.name}.txt`, content: '...' };
 *   }
 *   // ...
 * }
 * new MyGenerator('../out', apiRoot).generateFiles();
 * ```
 */
export abstract class BaseGenerator implements BindingGenerator {
    abstract readonly target: BindingTarget;

    protected apiRoot: ApiRoot;
    protected writer: FileWriter;
    protected log: Logger;

    /**
     * Create a new BaseGenerator.
     * @param outputDir - Output root of the target, must exist
     * @param apiRoot - API model with built indexes
     * @param logModule - Module name used in log lines
     */
    constructor(outputDir: string, apiRoot: ApiRoot, logModule: string) {
        this.apiRoot = apiRoot;
        this.writer = new FileWriter(outputDir);
        this.log = new Logger(logModule);
    }

    /**
     * Main generation loop, shared across all targets.
     *
     * @returns Generation result with statistics
     * @throws {BindgenError} When the output root doesn't exist
     */
    generateFiles(): GenerationResult {
        const startTime = Date.now();
        const files: string[] = [];

        this.writer.checkOutputDir();
        this.writer.resetStats();

        for (const enumDefinition of this.apiRoot.enums.values()) {
            files.push(this.generateEnum(enumDefinition));
        }

        for (const structDefinition of this.apiRoot.structs.values()) {
            files.push(this.generateStruct(structDefinition));
        }

        for (const classDefinition of this.apiRoot.classes.values()) {
            files.push(this.generateClass(classDefinition));
        }

        return {
            target: this.target,
            files,
            writeStats: this.writer.getStats(),
            elapsedMs: Date.now() - startTime,
        };
    }

    generateEnum(enumDefinition: EnumDefinition): string {
        return this.write(this.renderEnum(enumDefinition));
    }

    generateStruct(structDefinition: StructDefinition): string {
        return this.write(this.renderStruct(structDefinition));
    }

    generateClass(classDefinition: ClassDefinition): string {
        this.log.warning(
            `Class generation is not fully supported, writing a scaffold: ${classDefinition.name}`
        );
        return this.write(this.renderClass(classDefinition));
    }

    /**
     * Lines of the provenance banner, without comment markers.
     */
    protected getAutogenComment(): string[] {
        const { tag, commit } = this.apiRoot.gitInfo;
        return [
            'Code generated by roc-bindgen from roc-toolkit Doxygen XML',
            `roc-toolkit git tag: ${tag}, commit: ${commit}`,
        ];
    }

    /**
     * Provenance banner as `//` comment lines followed by a blank line.
     */
    protected renderAutogenHeader(): string {
        return this.getAutogenComment().map(line => `// ${line}\n`).join('') + '\n';
    }

    /**
     * Look up a `ref` or `code` token in the symbol index.
     */
    protected lookupRef(token: string): DocRef | undefined {
        return this.apiRoot.docRefs.get(token);
    }

    /**
     * Lay out every block of a comment with this target's inline rendering.
     * @returns One segment list per block
     */
    protected layoutComment(doc: DocComment): DocSegment[][] {
        const renderInline: InlineRenderer = item => this.renderInline(item);
        return doc.blocks.map(block => layoutBlock(block, renderInline));
    }

    /**
     * Wrap one logical line to {@link COMMENT_WIDTH}, keeping this target's
     * atomic tokens intact.
     */
    protected wrap(text: string, initialIndent: string, subsequentIndent: string = initialIndent): string[] {
        return wrapText(text, {
            width: COMMENT_WIDTH,
            initialIndent,
            subsequentIndent,
            atomicPatterns: this.getAtomicPatterns(),
        });
    }

    private write(file: GeneratedFile): string {
        const filePath = this.writer.writeRelative(file.path, file.content);
        this.log.debug(`Writing ${filePath}`);
        return filePath;
    }

    /**
     * Substrings the wrapper must never split.
     */
    protected abstract getAtomicPatterns(): readonly RegExp[];

    /**
     * Render a text, reference or "see" item in the target's comment markup.
     */
    protected abstract renderInline(item: DocTextItem | DocSeeItem): string;

    abstract renderEnum(enumDefinition: EnumDefinition): GeneratedFile;

    abstract renderStruct(structDefinition: StructDefinition): GeneratedFile;

    /**
     * Render a class scaffold: a named type plus one stub per method.
     */
    abstract renderClass(classDefinition: ClassDefinition): GeneratedFile;
}
