/**
 * @file doxygen-parser.ts
 * @module doxygen/doxygen-parser
 * @license MIT
 *
 * @fileoverview Reads enum, struct and class definitions from Doxygen XML
 * output using cheerio in XML mode.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { Parser } from 'htmlparser2';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_DOXYGEN_SOURCES, type DoxygenSources } from '../config.js';
import { BindgenError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type {
    ApiDefinitions,
    ClassDefinition,
    ClassMethod,
    EnumDefinition,
    EnumValue,
    GitInfo,
    StructDefinition,
    StructField,
} from '../model/types.js';
import { parseDocComment } from './doc-comment-parser.js';

const log = new Logger('doxygen-parser');

/**
 * First structural error of an XML document, or undefined when every
 * element is closed explicitly.
 *
 * cheerio closes unterminated elements silently, so a truncated file would
 * otherwise load as a shorter but valid tree.
 */
export function findXmlError(xml: string): string | undefined {
    let error: string | undefined;

    const parser = new Parser({
        onclosetag(name, isImplied) {
            if (isImplied && error === undefined) {
                error = `element <${name}> is not closed`;
            }
        },
    }, { xmlMode: true });

    parser.write(xml);
    parser.end();

    return error;
}

/**
 * Parser for the Doxygen XML directory of the C API.
 *
 * Only the files listed in {@link DoxygenSources} are read:
 * - the enums file holds every `memberdef kind="enum"`
 * - each struct file holds one `compounddef` with variable members
 * - each class file holds one opaque typedef (the class) plus the
 *   functions operating on it
 *
 * @example
 * ```typescript
 * const parser = new DoxygenParser('../roc-toolkit/build/docs/public_api/xml');
 * const definitions = parser.parse({ tag: 'v0.4.0', commit: 'abc1234' });
 * ```
 */
export class DoxygenParser {
    private doxygenDir: string;
    private sources: DoxygenSources;

    constructor(doxygenDir: string, sources: DoxygenSources = DEFAULT_DOXYGEN_SOURCES) {
        this.doxygenDir = doxygenDir;
        this.sources = sources;
    }

    /**
     * Parse all definitions.
     * @throws {BindgenError} When a file is missing or malformed
     */
    parse(gitInfo: GitInfo): ApiDefinitions {
        return {
            gitInfo,
            enums: this.parseEnums(),
            structs: this.parseStructs(),
            classes: this.parseClasses(),
        };
    }

    parseEnums(): EnumDefinition[] {
        const $ = this.loadFile(this.sources.enumsFile);
        const enums: EnumDefinition[] = [];

        for (const elem of $('memberdef[kind="enum"]').toArray()) {
            const name = this.childText($, elem, 'name');
            const values = $(elem).children('enumvalue').toArray()
                .map(valueElem => this.parseEnumValue($, valueElem, name));

            log.debug(`Found enum ${name} in docs`);
            enums.push({ name, values, doc: parseDocComment(elem) });
        }

        return enums;
    }

    parseStructs(): StructDefinition[] {
        return this.sources.structFiles.map(file => {
            const $ = this.loadFile(file);
            const compound = this.requireElement($('compounddef').get(0), file, 'compounddef');
            const name = this.childText($, compound, 'compoundname');

            const fields = $(compound).find('memberdef[kind="variable"]').toArray()
                .map(fieldElem => this.parseStructField($, fieldElem));

            log.debug(`Found struct ${name} in docs`);
            return { name, fields, doc: parseDocComment(compound) };
        });
    }

    parseClasses(): ClassDefinition[] {
        return this.sources.classFiles.map(file => {
            const $ = this.loadFile(file);
            const typedef = this.requireElement(
                $('memberdef[kind="typedef"]').get(0), file, 'memberdef kind="typedef"'
            );
            const name = this.childText($, typedef, 'name');

            const methods: ClassMethod[] = $('memberdef[kind="function"]').toArray()
                .map(methodElem => ({
                    name: this.childText($, methodElem, 'name'),
                    doc: parseDocComment(methodElem),
                }));

            log.debug(`Found class ${name} in docs`);
            return { name, methods, doc: parseDocComment(typedef) };
        });
    }

    private parseEnumValue($: cheerio.CheerioAPI, elem: Element, enumName: string): EnumValue {
        const name = this.childText($, elem, 'name');
        const initializer = $(elem).children('initializer');
        if (initializer.length === 0) {
            throw new BindgenError(`Enum value ${name} of ${enumName} has no initializer`);
        }
        const value = initializer.first().text().trim().replace(/^=\s*/, '');
        return { name, value, doc: parseDocComment(elem) };
    }

    private parseStructField($: cheerio.CheerioAPI, elem: Element): StructField {
        const typeElem = $(elem).children('type').first();
        const ref = typeElem.children('ref').first();
        const type = (ref.length > 0 ? ref.text() : typeElem.text()).trim();

        return {
            name: this.childText($, elem, 'name'),
            type,
            doc: parseDocComment(elem),
        };
    }

    private childText($: cheerio.CheerioAPI, elem: Element, tag: string): string {
        return $(elem).children(tag).first().text().trim();
    }

    private requireElement(elem: Element | undefined, file: string, what: string): Element {
        if (!elem) {
            throw new BindgenError(`Error parsing XML file: ${join(this.doxygenDir, file)}: no ${what} element`);
        }
        return elem;
    }

    /**
     * Read one XML file of the Doxygen directory.
     * @throws {BindgenError} When the file can't be read, is not well-formed
     * or has no `doxygen` root
     */
    private loadFile(file: string): cheerio.CheerioAPI {
        const filePath = join(this.doxygenDir, file);
        log.info(`Parsing ${filePath}`);

        let xml: string;
        try {
            xml = readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new BindgenError(`File not found: ${filePath}`, 1, { cause: error });
        }

        const xmlError = findXmlError(xml);
        if (xmlError) {
            throw new BindgenError(`Error parsing XML file: ${filePath}: ${xmlError}`);
        }

        const $ = cheerio.load(xml, { xml: true });
        if ($.root().children('doxygen').length === 0) {
            throw new BindgenError(`Error parsing XML file: ${filePath}: no doxygen root element`);
        }
        return $;
    }
}
