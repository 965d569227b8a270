/**
 * @file text-wrap.test.ts
 * @module tests/unit/shared/text-wrap
 * @license MIT
 *
 * @fileoverview Unit tests for atomic-token-aware line wrapping.
 */

import { splitWords, wrapText } from '../../../src/shared/text-wrap.js';

const LINK = /\{@\w+\s[^{}]*\}/;

describe('splitWords', () => {
  it('should split on runs of whitespace', () => {
    expect(splitWords('a  b\n c')).toEqual(['a', 'b', 'c']);
  });

  it('should not split inside atomic matches', () => {
    expect(splitWords('see {@code foo bar} here', [LINK])).toEqual(['see', '{@code foo bar}', 'here']);
  });
});

describe('wrapText', () => {
  it('should pack words greedily', () => {
    expect(wrapText('one two three four', { width: 9 })).toEqual(['one two', 'three', 'four']);
  });

  it('should apply initial and subsequent indents', () => {
    const lines = wrapText('one two three', {
      width: 10,
      initialIndent: '- ',
      subsequentIndent: '  ',
    });

    expect(lines).toEqual(['- one two', '  three']);
  });

  it('should use the initial indent for following lines by default', () => {
    expect(wrapText('aaa bbb', { width: 7, initialIndent: '// ' })).toEqual(['// aaa', '// bbb']);
  });

  it('should put an over-long word on its own line without splitting it', () => {
    const lines = wrapText('See {@link RocSender#write()} for details', {
      width: 20,
      initialIndent: ' * ',
      atomicPatterns: [LINK],
    });

    expect(lines).toEqual([' * See', ' * {@link RocSender#write()}', ' * for details']);
  });

  it('should keep an atomic token with spaces on one line', () => {
    const lines = wrapText('x {@code a b c d} y', { width: 8, atomicPatterns: [LINK] });

    expect(lines).toEqual(['x', '{@code a b c d}', 'y']);
  });

  it('should return no lines for blank text', () => {
    expect(wrapText('   ', { width: 80 })).toEqual([]);
  });

  it('should never exceed the width with short words', () => {
    const text = 'lorem ipsum dolor sit amet consectetur adipiscing elit sed do eiusmod tempor '.repeat(4);
    const lines = wrapText(text, { width: 30, initialIndent: '// ' });

    for (const line of lines) {
      expect(line.length).toBeLessThanOrEqual(30);
    }
  });
});
