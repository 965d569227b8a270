/**
 * @file api-root.test.ts
 * @module tests/unit/model/api-root
 * @license MIT
 *
 * @fileoverview Unit tests for ApiRoot assembly.
 */

import { buildEnumPrefixes, buildStructFields, createApiRoot } from '../../../src/model/api-root.js';
import { createTestDefinitions } from '../../fixtures/api-definitions.js';

describe('buildEnumPrefixes', () => {
  it('should derive prefixes from enum names except odd ones', () => {
    const { enums } = createTestDefinitions();

    expect([...buildEnumPrefixes(enums)]).toEqual([
      ['roc_interface', 'ROC_INTERFACE_'],
      ['roc_protocol', 'ROC_PROTO_'],
    ]);
  });

  it('should accept a custom exception table', () => {
    const { enums } = createTestDefinitions();
    const prefixes = buildEnumPrefixes(enums, new Map([['roc_interface', 'ROC_IFACE_']]));

    expect(prefixes.get('roc_interface')).toBe('ROC_IFACE_');
    expect(prefixes.get('roc_protocol')).toBe('ROC_PROTOCOL_');
  });
});

describe('buildStructFields', () => {
  it('should map field names to declaring structs', () => {
    const fields = buildStructFields([
      { name: 'roc_a', doc: { blocks: [] }, fields: [{ name: 'x', type: 'int', doc: { blocks: [] } }] },
      { name: 'roc_b', doc: { blocks: [] }, fields: [{ name: 'x', type: 'int', doc: { blocks: [] } }] },
    ]);

    expect([...(fields.get('x') ?? [])]).toEqual(['roc_a', 'roc_b']);
  });
});

describe('createApiRoot', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should key definitions by name in declaration order', () => {
    const root = createApiRoot(createTestDefinitions());

    expect([...root.enums.keys()]).toEqual(['roc_interface', 'roc_protocol']);
    expect([...root.structs.keys()]).toEqual(['roc_interface_config', 'roc_sender_config']);
    expect([...root.classes.keys()]).toEqual(['roc_sender']);
  });

  it('should resolve tokens found in any comment', () => {
    const root = createApiRoot(createTestDefinitions());

    expect(root.docRefs.get('ROC_INTERFACE_AUDIO_SOURCE')).toEqual({
      type: 'enum_value',
      name: 'ROC_INTERFACE_AUDIO_SOURCE',
      enumName: 'roc_interface',
      valueName: 'AUDIO_SOURCE',
    });
    expect(root.docRefs.get('roc_receiver')).toEqual({ type: 'typedef', name: 'roc_receiver' });
    expect(root.docRefs.get('roc_sender_open()')).toMatchObject({ type: 'class_method', methodName: 'open' });
    expect(root.docRefs.has('ROC_CHANNEL_LAYOUT_MULTITRACK')).toBe(false);
  });

  it('should freeze the aggregate', () => {
    const root = createApiRoot(createTestDefinitions());

    expect(Object.isFrozen(root)).toBe(true);
  });
});
