/**
 * @file doc-comment-parser.ts
 * @module doxygen/doc-comment-parser
 * @license MIT
 *
 * @fileoverview Converts Doxygen description markup into the
 * {@link DocComment} tree.
 */

import { isTag, isText, type Element } from 'domhandler';
import { Logger } from '../shared/logger.js';
import type { DocBlock, DocComment, DocItem } from '../model/types.js';

const log = new Logger('doxygen-parser');

/**
 * Child elements of a node, optionally filtered by tag name.
 */
function childElements(elem: Element, name?: string): Element[] {
    return elem.children.filter(isTag).filter(child => name === undefined || child.name === name);
}

/**
 * Trimmed text before the first child element, or undefined when blank.
 */
function leadingText(elem: Element): string | undefined {
    let text = '';
    for (const node of elem.children) {
        if (isTag(node)) break;
        if (isText(node)) text += node.data;
    }
    const trimmed = text.trim();
    return trimmed || undefined;
}

/**
 * Parse one markup element into doc items.
 *
 * Recognized tags: `para`, `ref`, `computeroutput`, `bold`, `emphasis`,
 * `simplesect kind="see"` and `itemizedlist`. Other tags are reported and
 * their own text dropped, but their children are still parsed.
 *
 * Text following a child element (its tail) becomes a separate `text` item.
 *
 * @param elem - Doxygen markup element
 * @returns Items in document order
 */
export function parseDocElement(elem: Element): DocItem[] {
    const items: DocItem[] = [];
    const text = leadingText(elem);
    let parseChildren = true;

    switch (elem.name) {
        case 'para':
            if (text) items.push({ type: 'text', text });
            break;
        case 'ref':
            if (text) items.push({ type: 'ref', text });
            break;
        case 'computeroutput':
            if (text) items.push({ type: 'code', text });
            break;
        case 'bold':
            if (text) items.push({ type: 'bold', text });
            break;
        case 'emphasis':
            if (text) items.push({ type: 'emphasis', text });
            break;
        case 'simplesect': {
            const kind = elem.attribs.kind;
            if (kind === 'see') {
                items.push({ type: 'see' });
            } else {
                log.warning(`Unknown simplesect kind = ${kind}, consider adding it to parseDocElement`);
            }
            break;
        }
        case 'itemizedlist': {
            const blocks: DocBlock[] = childElements(elem, 'listitem').map(li => ({
                items: childElements(li).flatMap(parseDocElement),
            }));
            items.push({ type: 'list', blocks });
            parseChildren = false;
            break;
        }
        default:
            log.warning(`Unknown tag = ${elem.name}, consider adding it to parseDocElement`);
            break;
    }

    if (parseChildren) {
        let seenElement = false;
        let tail = '';

        const flushTail = () => {
            const stripped = tail.trim();
            if (stripped) {
                items.push({ type: 'text', text: stripped });
            }
            tail = '';
        };

        for (const node of elem.children) {
            if (isTag(node)) {
                flushTail();
                items.push(...parseDocElement(node));
                seenElement = true;
            } else if (isText(node) && seenElement) {
                tail += node.data;
            }
        }
        flushTail();
    }

    return items;
}

/**
 * Parse the brief and detailed description of a Doxygen member or compound.
 *
 * The first block comes from `briefdescription/para` and is present even
 * when the description is missing; every `detaileddescription/para` adds
 * one block.
 */
export function parseDocComment(elem: Element): DocComment {
    const blocks: DocBlock[] = [];

    const brief = childElements(elem, 'briefdescription')
        .flatMap(description => childElements(description, 'para'))[0];
    blocks.push({ items: brief ? parseDocElement(brief) : [] });

    for (const description of childElements(elem, 'detaileddescription')) {
        for (const para of childElements(description, 'para')) {
            blocks.push({ items: parseDocElement(para) });
        }
    }

    return { blocks };
}
