/**
 * @file doc-comment-parser.test.ts
 * @module tests/unit/doxygen/doc-comment-parser
 * @license MIT
 *
 * @fileoverview Unit tests for Doxygen description markup parsing.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { parseDocComment, parseDocElement } from '../../../src/doxygen/doc-comment-parser.js';

function element(xml: string): Element {
  const $ = cheerio.load(xml, { xml: true });
  const root = $.root().children().get(0);
  if (!root) {
    throw new Error(`No element in ${xml}`);
  }
  return root;
}

describe('parseDocElement', () => {
  it('should parse inline markup with tails', () => {
    const para = element(
      '<para>Use <computeroutput>x</computeroutput> with <bold>care</bold> and <emphasis>speed</emphasis>. </para>'
    );

    expect(parseDocElement(para)).toEqual([
      { type: 'text', text: 'Use' },
      { type: 'code', text: 'x' },
      { type: 'text', text: 'with' },
      { type: 'bold', text: 'care' },
      { type: 'text', text: 'and' },
      { type: 'emphasis', text: 'speed' },
      { type: 'text', text: '.' },
    ]);
  });

  it('should decode entities', () => {
    expect(parseDocElement(element('<para>a &lt; b &amp;&amp; c</para>'))).toEqual([
      { type: 'text', text: 'a < b && c' },
    ]);
  });

  it('should warn about unknown tags and keep their children', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const items = parseDocElement(element('<para>A<sp/>B <linebreak/>C</para>'));

    expect(items).toEqual([
      { type: 'text', text: 'A' },
      { type: 'text', text: 'B' },
      { type: 'text', text: 'C' },
    ]);
    expect(warn).toHaveBeenCalledWith(
      'warning: [doxygen-parser] Unknown tag = sp, consider adding it to parseDocElement'
    );
  });

  it('should warn about simplesect kinds other than see', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const items = parseDocElement(element('<simplesect kind="note"><para>Careful.</para></simplesect>'));

    expect(items).toEqual([{ type: 'text', text: 'Careful.' }]);
    expect(warn).toHaveBeenCalledWith(
      'warning: [doxygen-parser] Unknown simplesect kind = note, consider adding it to parseDocElement'
    );
  });

  it('should parse nested lists', () => {
    const list = element(
      '<itemizedlist><listitem><para>outer<itemizedlist><listitem><para>inner</para></listitem>' +
      '</itemizedlist></para></listitem></itemizedlist>'
    );

    expect(parseDocElement(list)).toEqual([
      {
        type: 'list',
        blocks: [
          {
            items: [
              { type: 'text', text: 'outer' },
              { type: 'list', blocks: [{ items: [{ type: 'text', text: 'inner' }] }] },
            ],
          },
        ],
      },
    ]);
  });
});

describe('parseDocComment', () => {
  it('should always have a brief block', () => {
    const member = element('<memberdef><name>x</name></memberdef>');

    expect(parseDocComment(member)).toEqual({ blocks: [{ items: [] }] });
  });

  it('should add one block per detailed paragraph', () => {
    const member = element(
      '<memberdef><briefdescription><para>Brief.</para></briefdescription>' +
      '<detaileddescription><para>One.</para><para>Two.</para></detaileddescription></memberdef>'
    );

    expect(parseDocComment(member)).toEqual({
      blocks: [
        { items: [{ type: 'text', text: 'Brief.' }] },
        { items: [{ type: 'text', text: 'One.' }] },
        { items: [{ type: 'text', text: 'Two.' }] },
      ],
    });
  });
});
