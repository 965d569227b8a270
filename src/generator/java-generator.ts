/**
 * @file java-generator.ts
 * @module generator/java-generator
 * @license MIT
 *
 * @fileoverview Generates Java sources (org.rocstreaming.roctoolkit) from
 * the API model.
 */

import { API_NAME_PREFIX, type BindingTarget } from '../config.js';
import { toCamelCase, toPascalCase } from '../shared/case-utils.js';
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

const JAVA_PACKAGE = 'org.rocstreaming.roctoolkit';

/**
 * C primitive types to Java types.
 */
const JAVA_TYPE_MAP: ReadonlyMap<string, string> = new Map([
    ['unsigned int', 'int'],
    ['int', 'int'],
    ['unsigned long', 'long'],
    ['long', 'long'],
    ['unsigned long long', 'long'],
    ['long long', 'long'],
    ['char', 'String'],
]);

/**
 * Field types that differ from the mechanical mapping, keyed by Java field name.
 */
const JAVA_TYPE_OVERRIDE: ReadonlyMap<string, string> = new Map([
    ['packetLength', 'Duration'],
    ['packetInterleaving', 'boolean'],
    ['targetLatency', 'Duration'],
    ['latencyTolerance', 'Duration'],
    ['noPlaybackTimeout', 'Duration'],
    ['choppyPlaybackTimeout', 'Duration'],
    ['reuseAddress', 'boolean'],
]);

/**
 * Java class names that don't follow the mechanical rule, keyed by C name.
 */
const JAVA_NAME_OVERRIDE: ReadonlyMap<string, string> = new Map([
    ['roc_context', 'RocContext'],
    ['roc_sender', 'RocSender'],
    ['roc_receiver', 'RocReceiver'],
    ['roc_context_config', 'RocContextConfig'],
    ['roc_sender_config', 'RocSenderConfig'],
    ['roc_receiver_config', 'RocReceiverConfig'],
]);

/**
 * Hand-written Javadoc replacing the generated one, keyed by Java class name.
 */
const JAVA_COMMENT_OVERRIDE: ReadonlyMap<string, readonly string[]> = new Map([
    ['RocContextConfig', [
        '/**',
        ' * Context configuration.',
        ' * <p>',
        ' * RocContextConfig object can be instantiated with {@link RocContextConfig#builder()}.',
        ' *',
        ' * @see RocContext',
        ' */',
    ]],
    ['RocSenderConfig', [
        '/**',
        ' * Sender configuration.',
        ' * <p>',
        ' * RocSenderConfig object can be instantiated with {@link RocSenderConfig#builder()}.',
        ' *',
        ' * @see RocSender',
        ' */',
    ]],
    ['RocReceiverConfig', [
        '/**',
        ' * Receiver configuration.',
        ' * <p>',
        ' * RocReceiverConfig object can be instantiated with {@link RocReceiverConfig#builder()}.',
        ' *',
        ' * @see RocReceiver',
        ' */',
    ]],
    ['InterfaceConfig', [
        '/**',
        ' * Interface configuration.',
        ' * <p>',
        ' * Sender and receiver can have multiple slots ({@link Slot}), and each slot',
        ' * can be bound or connected to multiple interfaces ({@link Interface}).',
        ' * <p>',
        ' * Each such interface has its own configuration, defined by this class.',
        ' * <p>',
        ' * See {@link RocSender#configure}, {@link RocReceiver#configure}.',
        ' */',
    ]],
]);

/** Inline tags such as `{@link Interface#AUDIO_SOURCE}` */
const JAVA_ATOMIC_PATTERNS: readonly RegExp[] = [/\{@\w+\s[^{}]*\}/];

function stripNamespace(name: string): string {
    return name.startsWith(API_NAME_PREFIX) ? name.slice(API_NAME_PREFIX.length) : name;
}

/**
 * Generator for roc-java.
 *
 * Writes one file per definition to
 * `<outputDir>/src/main/java/org/rocstreaming/roctoolkit/`:
 * - enums become Java enums carrying the native `int` value
 * - structs become lombok value classes with a validating builder
 * - classes become `<Name>_DUMMY.java` scaffolds with throwing stubs
 *
 * @example
 * ```typescript
 * const generator = new JavaGenerator('../roc-java', apiRoot);
 * generator.renderStruct(apiRoot.structs.get('roc_sender_config')).path
 * // 'src/main/java/org/rocstreaming/roctoolkit/RocSenderConfig.java'
 * ```
 */
export class JavaGenerator extends BaseGenerator {
    readonly target: BindingTarget = 'java';

    constructor(outputDir: string, apiRoot: ApiRoot) {
        super(outputDir, apiRoot, 'java-generator');
    }

    renderEnum(enumDefinition: EnumDefinition): GeneratedFile {
        const javaName = this.getJavaClassName(enumDefinition.name);

        let out = this.renderAutogenHeader();
        out += `package ${JAVA_PACKAGE};\n\n`;
        out += this.getJavaComment(javaName, enumDefinition.doc);
        out += `public enum ${javaName} {\n`;

        for (const enumValue of enumDefinition.values) {
            const valueName = this.getJavaEnumValueName(enumDefinition.name, enumValue.name);
            out += '\n';
            out += this.formatJavadoc(enumValue.doc, 4);
            out += `    ${valueName}(${enumValue.value}),\n`;
        }

        out += '    ;\n\n';
        out += '    final int value;\n\n';
        out += `    ${javaName}(int value) {\n`;
        out += '        this.value = value;\n';
        out += '    }\n';
        out += '}\n';

        return { path: this.getJavaPath(javaName), content: out };
    }

    renderStruct(structDefinition: StructDefinition): GeneratedFile {
        const javaName = this.getJavaClassName(structDefinition.name);

        const fields = structDefinition.fields.map(field => ({
            field,
            name: this.getJavaFieldName(field.name),
            type: this.getJavaFieldType(field),
        }));

        let out = this.renderAutogenHeader();
        out += `package ${JAVA_PACKAGE};\n\n`;
        if (fields.some(({ type }) => type === 'Duration')) {
            out += 'import java.time.Duration;\n';
        }
        out += 'import lombok.*;\n\n';

        out += this.getJavaComment(javaName, structDefinition.doc);
        out += '@Getter\n';
        out += '@Builder(builderClassName = "Builder", toBuilder = true)\n';
        out += '@ToString\n';
        out += '@EqualsAndHashCode\n';
        out += `public class ${javaName} {\n`;

        for (const { field, name, type } of fields) {
            out += '\n';
            out += this.formatJavadoc(field.doc, 4);
            out += `    private ${type} ${name};\n`;
        }

        out += '\n';
        out += '    /**\n';
        out += `     * Create a builder for {@link ${javaName}}.\n`;
        out += '     * <p>\n';
        out += '     * The builder checks field values when {@code build()} is called.\n';
        out += '     */\n';
        out += `    public static ${javaName}.Builder builder() {\n`;
        out += `        return new ${javaName}Validator();\n`;
        out += '    }\n';
        out += '}\n';

        return { path: this.getJavaPath(javaName), content: out };
    }

    renderClass(classDefinition: ClassDefinition): GeneratedFile {
        const javaName = this.getJavaClassName(classDefinition.name);
        // Named after the file so it compiles next to the hand-written class
        const scaffoldName = `${javaName}_DUMMY`;

        let out = this.renderAutogenHeader();
        out += `package ${JAVA_PACKAGE};\n\n`;
        out += this.getJavaComment(javaName, classDefinition.doc);
        out += `public class ${scaffoldName} {\n`;

        for (const method of classDefinition.methods) {
            const methodName = this.getJavaMethodName(classDefinition.name, method.name);
            out += '\n';
            out += this.formatJavadoc(method.doc, 4);
            if (methodName === 'open') {
                out += `    public ${scaffoldName}() {\n`;
            } else {
                out += `    public void ${methodName}() {\n`;
            }
            out += '        throw new UnsupportedOperationException("not implemented");\n';
            out += '    }\n';
        }

        out += '}\n';

        return { path: this.getJavaPath(scaffoldName), content: out };
    }

    /**
     * Java class name for an enum, struct, class or typedef, e.g.
     * `roc_sender` → `RocSender`, `roc_interface` → `Interface`.
     */
    getJavaClassName(rocName: string): string {
        return JAVA_NAME_OVERRIDE.get(rocName) ?? toPascalCase(stripNamespace(rocName));
    }

    /**
     * Java enum constant: the C constant without its enum prefix, e.g.
     * `ROC_INTERFACE_AUDIO_SOURCE` → `AUDIO_SOURCE`.
     */
    getJavaEnumValueName(rocEnumName: string, rocValueName: string): string {
        const prefix = this.apiRoot.enumPrefixes.get(rocEnumName);
        if (prefix && rocValueName.startsWith(prefix)) {
            return rocValueName.slice(prefix.length);
        }
        return rocValueName;
    }

    getJavaFieldName(rocFieldName: string): string {
        return toCamelCase(rocFieldName);
    }

    /**
     * Java field type: override table first, then API types, then primitives.
     */
    getJavaFieldType(field: StructField): string {
        const override = JAVA_TYPE_OVERRIDE.get(this.getJavaFieldName(field.name));
        if (override) {
            return override;
        }
        if (field.type.startsWith(API_NAME_PREFIX)) {
            return this.getJavaClassName(field.type);
        }
        return JAVA_TYPE_MAP.get(field.type) ?? field.type;
    }

    /**
     * Java method name for a class method, e.g. `roc_sender_write` → `write`.
     */
    getJavaMethodName(rocClassName: string, rocMethodName: string): string {
        const bare = rocMethodName.startsWith(`${rocClassName}_`)
            ? rocMethodName.slice(rocClassName.length + 1)
            : rocMethodName;
        return toCamelCase(bare);
    }

    /**
     * Render a comment as a Javadoc block.
     *
     * Paragraphs are separated by `<p>`, lists become `<ul>`/`<li>`.
     * An empty comment renders as an empty string.
     *
     * @param doc - Comment to render
     * @param indentSize - Number of spaces before each line
     */
    formatJavadoc(doc: DocComment, indentSize: number): string {
        const indent = ' '.repeat(indentSize);
        const lines: string[] = [];

        for (const segments of this.layoutComment(doc)) {
            const blockLines = this.formatSegments(segments, indent);
            if (blockLines.length === 0) {
                continue;
            }
            if (lines.length > 0) {
                lines.push(`${indent} * <p>`);
            }
            lines.push(...blockLines);
        }

        if (lines.length === 0) {
            return '';
        }

        return [`${indent}/**`, ...lines, `${indent} */`].map(line => `${line}\n`).join('');
    }

    protected getAtomicPatterns(): readonly RegExp[] {
        return JAVA_ATOMIC_PATTERNS;
    }

    protected renderInline(item: DocTextItem | DocSeeItem): string {
        switch (item.type) {
            case 'text':
                return item.text;
            case 'bold':
                return `<b>${item.text}</b>`;
            case 'emphasis':
                return `<em>${item.text}</em>`;
            case 'ref':
            case 'code':
                return this.renderRef(item.text);
            case 'see':
                return '@see';
        }
    }

    /**
     * Render a `ref`/`code` token as `{@link ...}` when it points to a Java
     * symbol, `{@code ...}` otherwise.
     */
    renderRef(token: string): string {
        const ref = this.lookupRef(token);
        if (!ref) {
            return `{@code ${token}}`;
        }
        return this.renderDocRef(ref);
    }

    private renderDocRef(ref: DocRef): string {
        switch (ref.type) {
            case 'enum':
            case 'struct':
            case 'class':
            case 'typedef':
                return `{@link ${this.getJavaClassName(ref.name)}}`;
            case 'enum_value': {
                const enumName = this.getJavaClassName(ref.enumName);
                return `{@link ${enumName}#${ref.valueName}}`;
            }
            case 'struct_field':
                return `{@code ${this.getJavaFieldName(ref.name)}}`;
            case 'class_method': {
                const className = this.getJavaClassName(ref.className);
                if (ref.methodName === 'open') {
                    return `{@link ${className}#${className}()}`;
                }
                return `{@link ${className}#${toCamelCase(ref.methodName)}()}`;
            }
        }
    }

    private formatSegments(segments: DocSegment[], indent: string): string[] {
        const linePrefix = `${indent} * `;
        const lines: string[] = [];

        for (const segment of segments) {
            if (segment.kind === 'text') {
                lines.push(...this.wrap(segment.text, linePrefix));
                continue;
            }
            lines.push(`${linePrefix}<ul>`);
            for (const entry of segment.entries) {
                lines.push(...this.formatListEntry(entry, indent));
            }
            lines.push(`${linePrefix}</ul>`);
        }

        return lines;
    }

    /**
     * Render a list entry as `<li>...</li>`; nested lists go between the
     * entry's opening and closing tags.
     */
    private formatListEntry(entry: DocSegment[], indent: string): string[] {
        const linePrefix = `${indent} * `;
        const parts: DocSegment[] = [...entry];

        const first = parts[0];
        if (first?.kind === 'text') {
            parts[0] = { kind: 'text', text: `<li>${first.text}` };
        } else {
            parts.unshift({ kind: 'text', text: '<li>' });
        }

        const lastIndex = parts.length - 1;
        const last = parts[lastIndex];
        if (last.kind === 'text') {
            parts[lastIndex] = { kind: 'text', text: `${last.text}</li>` };
        } else {
            parts.push({ kind: 'text', text: '</li>' });
        }

        const lines: string[] = [];
        for (const part of parts) {
            if (part.kind === 'text') {
                lines.push(...this.wrap(part.text, linePrefix));
            } else {
                lines.push(...this.formatSegments([part], indent));
            }
        }
        return lines;
    }

    private getJavaComment(javaName: string, doc: DocComment): string {
        const override = JAVA_COMMENT_OVERRIDE.get(javaName);
        if (override) {
            return override.map(line => `${line}\n`).join('');
        }
        return this.formatJavadoc(doc, 0);
    }

    private getJavaPath(javaName: string): string {
        return `src/main/java/${JAVA_PACKAGE.replaceAll('.', '/')}/${javaName}.java`;
    }
}
