/**
 * @file generator-factory.test.ts
 * @module tests/unit/generator/generator-factory
 * @license MIT
 *
 * @fileoverview Unit tests for GeneratorFactory.
 */

import { GeneratorFactory } from '../../../src/generator/generator-factory.js';
import { GoGenerator } from '../../../src/generator/go-generator.js';
import { JavaGenerator } from '../../../src/generator/java-generator.js';
import { createApiRoot } from '../../../src/model/api-root.js';
import { createTestDefinitions } from '../../fixtures/api-definitions.js';

describe('GeneratorFactory', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should create a generator per target', () => {
    const root = createApiRoot(createTestDefinitions());

    const go = GeneratorFactory.createGenerator('go', '/tmp/go', root);
    const java = GeneratorFactory.createGenerator('java', '/tmp/java', root);

    expect(go).toBeInstanceOf(GoGenerator);
    expect(go.target).toBe('go');
    expect(java).toBeInstanceOf(JavaGenerator);
    expect(java.target).toBe('java');
  });
});
