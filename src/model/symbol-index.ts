/**
 * @file symbol-index.ts
 * @module model/symbol-index
 * @license MIT
 *
 * @fileoverview Classifies cross-reference tokens found in doc comments.
 */

import { API_CONSTANT_PREFIX, API_NAME_PREFIX } from '../config.js';
import { Logger } from '../shared/logger.js';
import type {
    ClassDefinition,
    DocComment,
    DocItem,
    DocRef,
    EnumDefinition,
    StructDefinition,
} from './types.js';

const log = new Logger('symbol-index');

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Tables the resolver classifies tokens against.
 */
export interface SymbolTables {
    enums: ReadonlyMap<string, EnumDefinition>;
    structs: ReadonlyMap<string, StructDefinition>;
    classes: ReadonlyMap<string, ClassDefinition>;
    enumPrefixes: ReadonlyMap<string, string>;
    structFields: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * Global token → {@link DocRef} table.
 *
 * A token is classified by the first matching rule:
 * 1. enum, struct or class name (`roc_interface`)
 * 2. enum constant (`ROC_INTERFACE_AUDIO_SOURCE`), longest enum prefix wins
 * 3. struct field (`packet_length`)
 * 4. class method (`roc_sender_write()`)
 * 5. any other namespaced name (`roc_slot`), classified as typedef
 *
 * Tokens matching none of them are unresolved. Every outcome, unresolved
 * included, is cached, so the same token always resolves the same way.
 *
 * @example
 * ```typescript
 * const index = new SymbolIndex(tables);
 * index.build();
 * index.resolve('ROC_INTERFACE_AUDIO_SOURCE');
 * // { type: 'enum_value', enumName: 'roc_interface', valueName: 'AUDIO_SOURCE', ... }
 * ```
 */
export class SymbolIndex {
    private tables: SymbolTables;
    private cache: Map<string, DocRef | null> = new Map();
    private classMethodPattern: RegExp;
    private typedefPattern: RegExp;

    constructor(tables: SymbolTables) {
        this.tables = tables;

        const ns = escapeRegExp(API_NAME_PREFIX);
        this.classMethodPattern = new RegExp(`^(${ns}[a-z]+)_([a-z_]+)(\\(\\))?$`);
        this.typedefPattern = new RegExp(`^${ns}[a-z_]+$`);
    }

    /**
     * Resolve every `ref` and `code` token of every doc comment in the model.
     *
     * Must run before any generator reads {@link SymbolIndex.toMap}, since a
     * comment may refer to a definition declared after it.
     */
    build(): void {
        for (const enumDef of this.tables.enums.values()) {
            this.visitComment(enumDef.doc);
            for (const value of enumDef.values) {
                this.visitComment(value.doc);
            }
        }

        for (const structDef of this.tables.structs.values()) {
            this.visitComment(structDef.doc);
            for (const field of structDef.fields) {
                this.visitComment(field.doc);
            }
        }

        for (const classDef of this.tables.classes.values()) {
            this.visitComment(classDef.doc);
            for (const method of classDef.methods) {
                this.visitComment(method.doc);
            }
        }
    }

    /**
     * Classify a token, using the cached result when there is one.
     * @param token - Raw text of a `ref` or `code` item
     * @returns Resolved reference, or undefined for ordinary code/prose
     */
    resolve(token: string): DocRef | undefined {
        const cached = this.cache.get(token);
        if (cached !== undefined) {
            return cached ?? undefined;
        }

        const ref = this.classify(token);
        this.cache.set(token, ref ?? null);
        if (!ref) {
            log.warning(`Unresolved reference: ${token}`);
        }
        return ref;
    }

    /**
     * Snapshot of all resolved tokens.
     */
    toMap(): ReadonlyMap<string, DocRef> {
        const refs = new Map<string, DocRef>();
        for (const [token, ref] of this.cache) {
            if (ref) {
                refs.set(token, ref);
            }
        }
        return refs;
    }

    private classify(token: string): DocRef | undefined {
        const { enums, structs, classes, structFields } = this.tables;

        // enum/struct/class name (e.g. "roc_interface")
        if (enums.has(token)) {
            return { type: 'enum', name: token };
        }
        if (structs.has(token)) {
            return { type: 'struct', name: token };
        }
        if (classes.has(token)) {
            return { type: 'class', name: token };
        }

        // enum value (e.g. "ROC_INTERFACE_AUDIO_SOURCE")
        if (token.startsWith(API_CONSTANT_PREFIX)) {
            const enumName = this.findEnumByPrefix(token);
            if (enumName !== undefined) {
                const prefix = this.tables.enumPrefixes.get(enumName) ?? '';
                return {
                    type: 'enum_value',
                    name: token,
                    enumName,
                    valueName: token.slice(prefix.length),
                };
            }
        }

        // struct field (e.g. "packet_length")
        if (structFields.has(token)) {
            return { type: 'struct_field', name: token };
        }

        // class method (e.g. "roc_sender_write()")
        const match = this.classMethodPattern.exec(token);
        if (match && classes.has(match[1])) {
            return {
                type: 'class_method',
                name: token,
                className: match[1],
                methodName: match[2],
            };
        }

        // other type name (e.g. "roc_slot")
        if (this.typedefPattern.test(token)) {
            return { type: 'typedef', name: token };
        }

        return undefined;
    }

    /**
     * Find the enum whose value prefix is a proper prefix of the token.
     * The longest prefix wins; on a tie the first declared enum wins.
     */
    private findEnumByPrefix(token: string): string | undefined {
        let best: string | undefined;
        let bestLength = 0;

        for (const [enumName, prefix] of this.tables.enumPrefixes) {
            if (token.length > prefix.length && token.startsWith(prefix) && prefix.length > bestLength) {
                best = enumName;
                bestLength = prefix.length;
            }
        }

        return best;
    }

    private visitComment(doc: DocComment): void {
        for (const block of doc.blocks) {
            this.visitItems(block.items);
        }
    }

    private visitItems(items: DocItem[]): void {
        for (const item of items) {
            switch (item.type) {
                case 'ref':
                case 'code':
                    this.resolve(item.text);
                    break;
                case 'list':
                    for (const block of item.blocks) {
                        this.visitItems(block.items);
                    }
                    break;
                default:
                    break;
            }
        }
    }
}
