/**
 * @file doc-layout.ts
 * @module generator/doc-layout
 * @license MIT
 *
 * @fileoverview Splits a doc block into text runs and lists before it is
 * rendered into a target's comment syntax.
 */

import { Logger } from '../shared/logger.js';
import type { DocBlock, DocSeeItem, DocTextItem } from '../model/types.js';

const log = new Logger('doc-layout');

/**
 * Laid-out piece of a block.
 *
 * `text` is one logical line to be wrapped; `list` holds one segment
 * sequence per list entry.
 */
export type DocSegment =
    | { kind: 'text'; text: string }
    | { kind: 'list'; entries: DocSegment[][] };

/**
 * Renders inline items (everything except lists) to target text.
 */
export type InlineRenderer = (item: DocTextItem | DocSeeItem) => string;

/**
 * Join inline pieces with single spaces and tidy spacing around
 * punctuation, e.g. `"( Slot ) ."` → `"(Slot)."`.
 */
export function joinInline(parts: string[]): string {
    return parts
        .filter(part => part.length > 0)
        .join(' ')
        .replaceAll(' ,', ',')
        .replaceAll(' .', '.')
        .replaceAll('( ', '(')
        .replaceAll(' )', ')');
}

function describeUnknown(item: never): string {
    const value: unknown = item;
    if (typeof value === 'object' && value !== null && 'type' in value) {
        return String(value.type);
    }
    return String(value);
}

/**
 * Lay out a block.
 *
 * Inline items accumulate into a text segment. A list closes the current
 * text segment; a "see" marker starts a new one, so the marker and the
 * references after it land on their own line.
 *
 * @param block - Block to lay out
 * @param renderInline - Target-specific inline rendering
 * @returns Segments in source order
 */
export function layoutBlock(block: DocBlock, renderInline: InlineRenderer): DocSegment[] {
    const segments: DocSegment[] = [];
    let parts: string[] = [];

    const flush = () => {
        const text = joinInline(parts);
        if (text) {
            segments.push({ kind: 'text', text });
        }
        parts = [];
    };

    for (const item of block.items) {
        switch (item.type) {
            case 'text':
            case 'ref':
            case 'code':
            case 'bold':
            case 'emphasis':
                parts.push(renderInline(item));
                break;
            case 'see':
                flush();
                parts.push(renderInline(item));
                break;
            case 'list':
                flush();
                segments.push({
                    kind: 'list',
                    entries: item.blocks.map(entry => layoutBlock(entry, renderInline)),
                });
                break;
            default:
                log.warning(`Unknown doc item type = ${describeUnknown(item)}, skipping it`);
                break;
        }
    }

    flush();
    return segments;
}

