/**
 * @file text-wrap.ts
 * @module shared/text-wrap
 * @license MIT
 *
 * @fileoverview Greedy line wrapping that keeps atomic tokens on one line.
 */

export interface WrapOptions {
    /** Maximum line length, indent included */
    width: number;
    /** Prefix of the first line */
    initialIndent?: string;
    /** Prefix of every following line */
    subsequentIndent?: string;
    /**
     * Patterns of substrings that must not be split, e.g. `{@link Foo#bar}`.
     * Whitespace inside a match is never used as a break point.
     */
    atomicPatterns?: readonly RegExp[];
}

/**
 * Ranges `[start, end)` of the text covered by atomic matches.
 */
function findAtomicRanges(text: string, patterns: readonly RegExp[]): Array<[number, number]> {
    const ranges: Array<[number, number]> = [];
    for (const pattern of patterns) {
        const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
        const global = new RegExp(pattern.source, flags);
        for (const match of text.matchAll(global)) {
            if (match.index !== undefined && match[0].length > 0) {
                ranges.push([match.index, match.index + match[0].length]);
            }
        }
    }
    return ranges;
}

/**
 * Split text into words at whitespace outside atomic ranges.
 */
export function splitWords(text: string, atomicPatterns: readonly RegExp[] = []): string[] {
    const ranges = findAtomicRanges(text, atomicPatterns);
    const protectedAt = (pos: number) => ranges.some(([start, end]) => pos >= start && pos < end);

    const words: string[] = [];
    let current = '';
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (/\s/.test(ch) && !protectedAt(i)) {
            if (current) {
                words.push(current);
                current = '';
            }
        } else {
            current += ch;
        }
    }
    if (current) {
        words.push(current);
    }
    return words;
}

/**
 * Wrap a paragraph to the given width.
 *
 * Words are packed greedily, joined by single spaces. A word that does not
 * fit even on an empty line is placed on a line of its own and left intact.
 *
 * @param text - Paragraph text (runs of whitespace are collapsed)
 * @returns Wrapped lines with indents applied, empty when the text is blank
 *
 * @example
 * ```typescript
 * wrapText('See {@link RocSender#write()} for details', {
 *   width: 20,
 *   initialIndent: ' * ',
 *   subsequentIndent: ' * ',
 *   atomicPatterns: [/\{@\w+ [^}]*\}/],
 * });
 * // [' * See', ' * {@link RocSender#write()}', ' * for details']
 * ```
 */
export function wrapText(text: string, options: WrapOptions): string[] {
    const initialIndent = options.initialIndent ?? '';
    const subsequentIndent = options.subsequentIndent ?? initialIndent;
    const words = splitWords(text, options.atomicPatterns);

    const lines: string[] = [];
    let line = '';
    let lineHasWord = false;

    for (const word of words) {
        if (!lineHasWord) {
            line = (lines.length === 0 ? initialIndent : subsequentIndent) + word;
            lineHasWord = true;
        } else if (line.length + 1 + word.length <= options.width) {
            line += ` ${word}`;
        } else {
            lines.push(line);
            line = subsequentIndent + word;
        }
    }

    if (lineHasWord) {
        lines.push(line);
    }

    return lines;
}
