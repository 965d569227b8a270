/**
 * @file api-root.ts
 * @module model/api-root
 * @license MIT
 *
 * @fileoverview Assembles the immutable {@link ApiRoot} and its indexes.
 */

import { ODD_ENUM_PREFIXES } from '../config.js';
import { SymbolIndex } from './symbol-index.js';
import type { ApiDefinitions, ApiRoot, EnumDefinition, StructDefinition } from './types.js';

function byName<T extends { name: string }>(definitions: T[]): Map<string, T> {
    const map = new Map<string, T>();
    for (const definition of definitions) {
        map.set(definition.name, definition);
    }
    return map;
}

/**
 * Map each enum to the prefix of its constants.
 *
 * The prefix is the upper-cased enum name plus `_`, unless the enum is
 * listed in `oddPrefixes`.
 *
 * @example
 * ```typescript
 * buildEnumPrefixes(enums).get('roc_interface') // 'ROC_INTERFACE_'
 * buildEnumPrefixes(enums).get('roc_protocol')  // 'ROC_PROTO_'
 * ```
 */
export function buildEnumPrefixes(
    enums: Iterable<EnumDefinition>,
    oddPrefixes: ReadonlyMap<string, string> = ODD_ENUM_PREFIXES
): Map<string, string> {
    const prefixes = new Map<string, string>();
    for (const enumDef of enums) {
        prefixes.set(enumDef.name, oddPrefixes.get(enumDef.name) ?? `${enumDef.name.toUpperCase()}_`);
    }
    return prefixes;
}

/**
 * Map each struct field name to the structs that declare it.
 */
export function buildStructFields(structs: Iterable<StructDefinition>): Map<string, Set<string>> {
    const fields = new Map<string, Set<string>>();
    for (const structDef of structs) {
        for (const field of structDef.fields) {
            let owners = fields.get(field.name);
            if (!owners) {
                owners = new Set();
                fields.set(field.name, owners);
            }
            owners.add(structDef.name);
        }
    }
    return fields;
}

/**
 * Build the {@link ApiRoot} from extracted definitions.
 *
 * Definition order is kept as given; generators emit files in that order.
 * The symbol index is fully built before this returns.
 *
 * @param definitions - Definitions in declaration order
 * @param oddPrefixes - Enum prefix exceptions
 */
export function createApiRoot(
    definitions: ApiDefinitions,
    oddPrefixes: ReadonlyMap<string, string> = ODD_ENUM_PREFIXES
): ApiRoot {
    const enums = byName(definitions.enums);
    const structs = byName(definitions.structs);
    const classes = byName(definitions.classes);

    const enumPrefixes = buildEnumPrefixes(enums.values(), oddPrefixes);
    const structFields = buildStructFields(structs.values());

    const index = new SymbolIndex({ enums, structs, classes, enumPrefixes, structFields });
    index.build();

    return Object.freeze({
        gitInfo: definitions.gitInfo,
        enums,
        structs,
        classes,
        enumPrefixes,
        structFields,
        docRefs: index.toMap(),
    });
}
