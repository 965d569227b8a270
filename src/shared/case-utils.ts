/**
 * @file case-utils.ts
 * @module shared/case-utils
 * @license MIT
 *
 * @fileoverview Identifier case conversion for snake_case C names.
 */

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Convert `snake_case` (or `UPPER_SNAKE`) to `PascalCase`.
 *
 * Each underscore-delimited segment gets its first character upper-cased
 * and the rest lower-cased.
 *
 * @example
 * ```typescript
 * toPascalCase('packet_length')    // 'PacketLength'
 * toPascalCase('INTERFACE_CONFIG') // 'InterfaceConfig'
 * ```
 */
export function toPascalCase(name: string): string {
    return name.split('_').map(capitalize).join('');
}

/**
 * Convert `snake_case` to `camelCase`.
 *
 * @example
 * ```typescript
 * toCamelCase('packet_length') // 'packetLength'
 * ```
 */
export function toCamelCase(name: string): string {
    if (!name) return name;
    return name.charAt(0).toLowerCase() + toPascalCase(name).slice(1);
}
