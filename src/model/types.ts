/**
 * @file types.ts
 * @module model/types
 * @license MIT
 *
 * @fileoverview Definition model and documentation tree for the C API
 * extracted from Doxygen XML.
 */

/**
 * Formatting unit with a literal string.
 *
 * For `ref` and `code` items the text is also the raw token used as a key
 * into {@link ApiRoot.docRefs}.
 */
export interface DocTextItem {
    type: 'text' | 'ref' | 'code' | 'bold' | 'emphasis';
    text: string;
}

/**
 * Itemized list. Each entry is a full block.
 */
export interface DocListItem {
    type: 'list';
    blocks: DocBlock[];
}

/**
 * "See also" marker. The referenced items follow it in the same block.
 */
export interface DocSeeItem {
    type: 'see';
}

/**
 * A single formatting unit: a chunk of text, a code reference,
 * a nested list, etc.
 */
export type DocItem = DocTextItem | DocListItem | DocSeeItem;

/**
 * Sequence of successive items, i.e. one paragraph or one list entry.
 */
export interface DocBlock {
    items: DocItem[];
}

/**
 * Comment attached to a definition.
 *
 * The first block is the brief description and is always present
 * (possibly empty); the rest are the detailed description paragraphs.
 */
export interface DocComment {
    blocks: DocBlock[];
}

export interface EnumValue {
    name: string;
    /** Initializer as written in the header, e.g. `1` or `0x10` */
    value: string;
    doc: DocComment;
}

export interface EnumDefinition {
    name: string;
    values: EnumValue[];
    doc: DocComment;
}

export interface StructField {
    name: string;
    /** Declared type, e.g. `unsigned int` or `roc_protocol` */
    type: string;
    doc: DocComment;
}

export interface StructDefinition {
    name: string;
    fields: StructField[];
    doc: DocComment;
}

export interface ClassMethod {
    name: string;
    doc: DocComment;
}

export interface ClassDefinition {
    name: string;
    methods: ClassMethod[];
    doc: DocComment;
}

/**
 * Reference to a named entity, e.g. `roc_interface` or `packet_length`.
 */
export interface DocNameRef {
    type: 'enum' | 'struct' | 'class' | 'struct_field' | 'typedef';
    name: string;
}

/**
 * Reference to an enum constant, e.g. `ROC_INTERFACE_AUDIO_SOURCE`.
 */
export interface DocEnumValueRef {
    type: 'enum_value';
    name: string;
    /** Owning enum, e.g. `roc_interface` */
    enumName: string;
    /** Value name without the enum prefix, e.g. `AUDIO_SOURCE` */
    valueName: string;
}

/**
 * Reference to a function of a class, e.g. `roc_sender_write()`.
 */
export interface DocClassMethodRef {
    type: 'class_method';
    name: string;
    /** Owning class, e.g. `roc_sender` */
    className: string;
    /** Method name without the class prefix, e.g. `write` */
    methodName: string;
}

/**
 * Resolved code reference found in a doc comment.
 */
export type DocRef = DocNameRef | DocEnumValueRef | DocClassMethodRef;

/**
 * Revision of the source library the bindings are generated from.
 */
export interface GitInfo {
    tag: string;
    commit: string;
}

/**
 * Definitions as extracted from the documentation, in declaration order.
 */
export interface ApiDefinitions {
    gitInfo: GitInfo;
    enums: EnumDefinition[];
    structs: StructDefinition[];
    classes: ClassDefinition[];
}

/**
 * Whole API surface plus the indexes built over it.
 *
 * Immutable once assembled; every generator reads from the same instance.
 */
export interface ApiRoot {
    readonly gitInfo: GitInfo;

    /** Definitions keyed by name, iterated in declaration order */
    readonly enums: ReadonlyMap<string, EnumDefinition>;
    readonly structs: ReadonlyMap<string, StructDefinition>;
    readonly classes: ReadonlyMap<string, ClassDefinition>;

    /** Enum name to enum value prefix, e.g. `roc_protocol` → `ROC_PROTO_` */
    readonly enumPrefixes: ReadonlyMap<string, string>;
    /** Struct field name to the names of the structs declaring it */
    readonly structFields: ReadonlyMap<string, ReadonlySet<string>>;

    /** Raw `ref`/`code` token to its resolved reference */
    readonly docRefs: ReadonlyMap<string, DocRef>;
}
