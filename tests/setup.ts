/**
 * @file setup.ts
 * @module tests/setup
 * @license MIT
 *
 * @fileoverview Shared test paths and helpers.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { DoxygenSources } from '../src/config.js';
import type { DocComment, DocItem, GitInfo } from '../src/model/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Doxygen XML fixtures
export const DOXYGEN_FIXTURES_DIR = resolve(__dirname, 'fixtures/doxygen');

/**
 * The subset of the Doxygen output the fixtures provide.
 */
export const FIXTURE_SOURCES: DoxygenSources = {
  enumsFile: 'config_8h.xml',
  structFiles: ['structroc__interface__config.xml', 'structroc__sender__config.xml'],
  classFiles: ['sender_8h.xml'],
};

export const TEST_GIT_INFO: GitInfo = { tag: 'v0.4.0', commit: 'abc1234' };

// Create an empty temporary directory
export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `roc-bindgen-${prefix}-`));
}

// Build a comment from one item list per block
export function docOf(...blocks: DocItem[][]): DocComment {
  return { blocks: blocks.map(items => ({ items })) };
}

// Build a single-paragraph plain text comment
export function textDoc(text: string): DocComment {
  return docOf([{ type: 'text', text }]);
}
