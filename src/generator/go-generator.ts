/**
 * @file go-generator.ts
 * @module generator/go-generator
 * @license MIT
 *
 * @fileoverview Generates Go sources (package roc) from the API model.
 */

import { API_NAME_PREFIX, type BindingTarget } from '../config.js';
import { toPascalCase } from '../shared/case-utils.js';
import type {
    ApiRoot,
    ClassDefinition,
    DocComment,
    DocRef,
    DocSeeItem,
    DocTextItem,
    EnumDefinition,
    StructDefinition,
    StructField,
} from '../model/types.js';
import { BaseGenerator } from './base-generator.js';
import type { DocSegment } from './doc-layout.js';
import type { GeneratedFile } from './types.js';

const GO_PACKAGE = 'roc';

/**
 * C primitive types to Go types.
 */
const GO_TYPE_MAP: ReadonlyMap<string, string> = new Map([
    ['unsigned int', 'uint32'],
    ['int', 'int32'],
    ['unsigned long', 'uint32'],
    ['long', 'int32'],
    ['unsigned long long', 'uint64'],
    ['long long', 'int64'],
    ['char', 'string'],
]);

/**
 * Field types that differ from the mechanical mapping, keyed by Go field name.
 */
const GO_TYPE_OVERRIDE: ReadonlyMap<string, string> = new Map([
    ['PacketLength', 'time.Duration'],
    ['PacketInterleaving', 'bool'],
    ['TargetLatency', 'time.Duration'],
    ['LatencyTolerance', 'time.Duration'],
    ['NoPlaybackTimeout', 'time.Duration'],
    ['ChoppyPlaybackTimeout', 'time.Duration'],
    ['ReuseAddress', 'bool'],
]);

/**
 * Go type names that don't follow the mechanical rule, keyed by C name.
 * roc-go uses plain names for everything so far.
 */
const GO_NAME_OVERRIDE: ReadonlyMap<string, string> = new Map();

/**
 * Hand-written comments replacing the generated ones, keyed by Go type name.
 */
const GO_COMMENT_OVERRIDE: ReadonlyMap<string, readonly string[]> = new Map([
    ['ContextConfig', [
        '// Context configuration.',
        '// You can zero-initialize this struct to get a default config.',
        '// See also Context.',
    ]],
    ['SenderConfig', [
        '// Sender configuration.',
        '// You can zero-initialize this struct to get a default config.',
        '// See also Sender.',
    ]],
    ['ReceiverConfig', [
        '// Receiver configuration.',
        '// You can zero-initialize this struct to get a default config.',
        '// See also Receiver.',
    ]],
]);

/** Call references such as `Sender.Write()` or `OpenSender()` */
const GO_ATOMIC_PATTERNS: readonly RegExp[] = [/[A-Za-z_]\w*(?:\.\w+)?\(\)/];

function stripNamespace(name: string): string {
    return name.startsWith(API_NAME_PREFIX) ? name.slice(API_NAME_PREFIX.length) : name;
}

/**
 * Generator for roc-go.
 *
 * Writes one file per definition to `<outputDir>/roc/`:
 * - enums become a named `int` type with one constant per value and a
 *   `go:generate stringer` directive
 * - structs become plain structs with Go-typed fields
 * - classes become `<name>_DUMMY.go` scaffolds with empty function stubs
 *
 * @example
 * ```typescript
 * const generator = new GoGenerator('../roc-go', apiRoot);
 * generator.renderEnum(apiRoot.enums.get('roc_interface')).path
 * // 'roc/interface.go'
 * ```
 */
export class GoGenerator extends BaseGenerator {
    readonly target: BindingTarget = 'go';

    constructor(outputDir: string, apiRoot: ApiRoot) {
        super(outputDir, apiRoot, 'go-generator');
    }

    renderEnum(enumDefinition: EnumDefinition): GeneratedFile {
        const goName = stripNamespace(enumDefinition.name);
        const goTypeName = this.getGoTypeName(enumDefinition.name);

        const rocPrefix = this.apiRoot.enumPrefixes.get(enumDefinition.name)
            ?? `${enumDefinition.name.toUpperCase()}_`;
        const goPrefix = toPascalCase(stripNamespace(rocPrefix.toLowerCase()).replace(/_$/, ''));

        let out = this.renderAutogenHeader();
        out += `package ${GO_PACKAGE}\n\n`;
        out += this.getGoComment(goTypeName, enumDefinition.doc);
        out += '//\n';
        out += `//go:generate stringer -type ${goTypeName} -trimprefix ${goPrefix} -output ${goName}_string.go\n`;
        out += `type ${goTypeName} int\n\n`;
        out += 'const (\n';

        enumDefinition.values.forEach((enumValue, i) => {
            if (i !== 0) {
                out += '\n';
            }
            out += this.formatComment(enumValue.doc, '\t');
            out += `\t${this.getGoConstantName(enumValue.name)} ${goTypeName} = ${enumValue.value}\n`;
        });

        out += ')\n';

        return { path: this.getGoPath(goName), content: out };
    }

    renderStruct(structDefinition: StructDefinition): GeneratedFile {
        const goName = stripNamespace(structDefinition.name);
        const goTypeName = this.getGoTypeName(structDefinition.name);

        const fields = structDefinition.fields.map(field => ({
            field,
            name: this.getGoFieldName(field.name),
            type: this.getGoFieldType(field),
        }));

        const imports = new Set<string>();
        for (const { type } of fields) {
            if (type.startsWith('time.')) {
                imports.add('time');
            }
        }

        let out = this.renderAutogenHeader();
        out += `package ${GO_PACKAGE}\n\n`;

        if (imports.size > 0) {
            out += 'import (\n';
            for (const imp of [...imports].sort()) {
                out += `\t"${imp}"\n`;
            }
            out += ')\n\n';
        }

        out += this.getGoComment(goTypeName, structDefinition.doc);
        out += `type ${goTypeName} struct {\n`;

        fields.forEach(({ field, name, type }, i) => {
            if (i !== 0) {
                out += '\n';
            }
            out += this.formatComment(field.doc, '\t');
            out += `\t${name} ${type}\n`;
        });

        out += '}\n';

        return { path: this.getGoPath(goName), content: out };
    }

    renderClass(classDefinition: ClassDefinition): GeneratedFile {
        const goName = stripNamespace(classDefinition.name);
        const goTypeName = this.getGoTypeName(classDefinition.name);

        let out = this.renderAutogenHeader();
        out += `package ${GO_PACKAGE}\n\n`;
        out += this.getGoComment(goTypeName, classDefinition.doc);
        out += '//\n';
        out += `type ${goTypeName} struct {\n`;
        out += '}\n';

        for (const method of classDefinition.methods) {
            const methodName = this.getGoMethodName(classDefinition.name, method.name);
            out += '\n';
            out += this.formatComment(method.doc, '');
            out += `func ${methodName}() {\n`;
            out += '\t// Not implemented: translate the C signature by hand.\n';
            out += '}\n';
        }

        return { path: this.getGoPath(`${goName}_DUMMY`), content: out };
    }

    /**
     * Go type name for an enum, struct, class or typedef, e.g.
     * `roc_media_encoding` → `MediaEncoding`.
     */
    getGoTypeName(rocName: string): string {
        return GO_NAME_OVERRIDE.get(rocName) ?? toPascalCase(stripNamespace(rocName));
    }

    /**
     * Go constant name for an enum value, e.g.
     * `ROC_INTERFACE_AUDIO_SOURCE` → `InterfaceAudioSource`.
     */
    getGoConstantName(rocValueName: string): string {
        return toPascalCase(stripNamespace(rocValueName.toLowerCase()));
    }

    getGoFieldName(rocFieldName: string): string {
        return toPascalCase(stripNamespace(rocFieldName.toLowerCase()));
    }

    /**
     * Go field type: override table first, then API types, then primitives.
     */
    getGoFieldType(field: StructField): string {
        const override = GO_TYPE_OVERRIDE.get(this.getGoFieldName(field.name));
        if (override) {
            return override;
        }
        if (field.type.startsWith(API_NAME_PREFIX)) {
            return this.getGoTypeName(field.type);
        }
        return GO_TYPE_MAP.get(field.type) ?? field.type;
    }

    /**
     * Go function name for a class method; `open` becomes `Open<Type>`.
     */
    getGoMethodName(rocClassName: string, rocMethodName: string): string {
        const bare = rocMethodName.startsWith(`${rocClassName}_`)
            ? rocMethodName.slice(rocClassName.length + 1)
            : rocMethodName;
        const goMethodName = toPascalCase(bare);
        return goMethodName === 'Open' ? `Open${this.getGoTypeName(rocClassName)}` : goMethodName;
    }

    /**
     * Render a comment as `//` lines.
     *
     * Paragraphs are separated by an empty `//` line, list entries are
     * rendered as `//   - entry`.
     *
     * @param doc - Comment to render
     * @param indent - Prefix before `//`, e.g. a tab inside a struct
     * @returns Comment lines, each ending with a newline
     */
    formatComment(doc: DocComment, indent: string): string {
        const lines: string[] = [];

        for (const segments of this.layoutComment(doc)) {
            const blockLines = this.formatSegments(segments, indent);
            if (blockLines.length === 0) {
                continue;
            }
            if (lines.length > 0) {
                lines.push(`${indent}//`);
            }
            lines.push(...blockLines);
        }

        return lines.map(line => `${line}\n`).join('');
    }

    protected getAtomicPatterns(): readonly RegExp[] {
        return GO_ATOMIC_PATTERNS;
    }

    protected renderInline(item: DocTextItem | DocSeeItem): string {
        switch (item.type) {
            case 'text':
            case 'bold':
            case 'emphasis':
                return item.text;
            case 'ref':
            case 'code':
                return this.renderRef(item.text);
            case 'see':
                return 'See';
        }
    }

    /**
     * Render a `ref`/`code` token as a Go identifier, or the raw token when
     * it is not resolved.
     */
    renderRef(token: string): string {
        const ref = this.lookupRef(token);
        if (!ref) {
            return token;
        }
        return this.renderDocRef(ref);
    }

    private renderDocRef(ref: DocRef): string {
        switch (ref.type) {
            case 'enum':
            case 'struct':
            case 'class':
            case 'typedef':
                return this.getGoTypeName(ref.name);
            case 'enum_value':
                return this.getGoConstantName(ref.name);
            case 'struct_field':
                return this.getGoFieldName(ref.name);
            case 'class_method': {
                const className = this.getGoTypeName(ref.className);
                if (ref.methodName === 'open') {
                    return `Open${className}()`;
                }
                return `${className}.${toPascalCase(ref.methodName)}()`;
            }
        }
    }

    private formatSegments(segments: DocSegment[], indent: string, depth = 0): string[] {
        const lines: string[] = [];
        const bulletIndent = `${indent}//   ${'  '.repeat(depth)}`;

        for (const segment of segments) {
            if (segment.kind === 'text') {
                lines.push(...this.wrap(segment.text, `${indent}// `));
                continue;
            }
            for (const entry of segment.entries) {
                lines.push(...this.formatListEntry(entry, indent, bulletIndent, depth));
            }
        }

        return lines;
    }

    private formatListEntry(entry: DocSegment[], indent: string, bulletIndent: string, depth: number): string[] {
        const lines: string[] = [];
        let bulletWritten = false;

        for (const segment of entry) {
            if (segment.kind === 'list') {
                if (!bulletWritten) {
                    lines.push(`${bulletIndent}-`);
                    bulletWritten = true;
                }
                lines.push(...this.formatSegments([segment], indent, depth + 1));
            } else if (!bulletWritten) {
                lines.push(...this.wrap(segment.text, `${bulletIndent}- `, `${bulletIndent}  `));
                bulletWritten = true;
            } else {
                lines.push(...this.wrap(segment.text, `${bulletIndent}  `));
            }
        }

        if (!bulletWritten) {
            lines.push(`${bulletIndent}-`);
        }

        return lines;
    }

    private getGoComment(goTypeName: string, doc: DocComment): string {
        const override = GO_COMMENT_OVERRIDE.get(goTypeName);
        if (override) {
            return override.map(line => `${line}\n`).join('');
        }
        return this.formatComment(doc, '');
    }

    private getGoPath(goName: string): string {
        return `${GO_PACKAGE}/${goName}.go`;
    }
}
