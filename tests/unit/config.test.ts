/**
 * @file config.test.ts
 * @module tests/unit/config
 * @license MIT
 *
 * @fileoverview Unit tests for run configuration defaults.
 */

import { join } from 'node:path';
import { resolveConfig, selectTargets } from '../../src/config.js';

describe('selectTargets', () => {
  it('should expand all to java then go', () => {
    expect(selectTargets('all')).toEqual(['java', 'go']);
  });

  it('should select a single target', () => {
    expect(selectTargets('go')).toEqual(['go']);
    expect(selectTargets('java')).toEqual(['java']);
  });
});

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveConfig({ type: 'all' })).toEqual({
      targets: ['java', 'go'],
      toolkitDir: '../roc-toolkit',
      doxygenDir: join('../roc-toolkit', 'build/docs/public_api/xml'),
      outputDirs: { go: '../roc-go', java: '../roc-java' },
      verbose: false,
    });
  });

  it('should derive the doxygen directory from the toolkit directory', () => {
    expect(resolveConfig({ type: 'go', toolkitDir: '/src/roc-toolkit' }).doxygenDir)
      .toBe('/src/roc-toolkit/build/docs/public_api/xml');
  });

  it('should prefer explicit directories', () => {
    const config = resolveConfig({
      type: 'java',
      toolkitDir: '/a',
      doxygenDir: '/b',
      goOutputDir: '/c',
      javaOutputDir: '/d',
      verbose: true,
    });

    expect(config).toEqual({
      targets: ['java'],
      toolkitDir: '/a',
      doxygenDir: '/b',
      outputDirs: { go: '/c', java: '/d' },
      verbose: true,
    });
  });
});
