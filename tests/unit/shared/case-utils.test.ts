/**
 * @file case-utils.test.ts
 * @module tests/unit/shared/case-utils
 * @license MIT
 *
 * @fileoverview Unit tests for identifier case conversion.
 */

import { toCamelCase, toPascalCase } from '../../../src/shared/case-utils.js';

describe('toPascalCase', () => {
  it('should capitalize each underscore segment', () => {
    expect(toPascalCase('packet_length')).toBe('PacketLength');
    expect(toPascalCase('media_encoding')).toBe('MediaEncoding');
  });

  it('should lower-case the rest of upper-case segments', () => {
    expect(toPascalCase('INTERFACE_AUDIO_SOURCE')).toBe('InterfaceAudioSource');
  });

  it('should handle a single segment', () => {
    expect(toPascalCase('interface')).toBe('Interface');
  });

  it('should keep every character of each segment in order', () => {
    const name = 'choppy_playback_timeout';
    const converted = toPascalCase(name);

    expect(converted.toLowerCase()).toBe(name.replaceAll('_', ''));
  });
});

describe('toCamelCase', () => {
  it('should lower-case the first character', () => {
    expect(toCamelCase('packet_length')).toBe('packetLength');
    expect(toCamelCase('reuse_address')).toBe('reuseAddress');
  });

  it('should leave single segment names lower-case', () => {
    expect(toCamelCase('write')).toBe('write');
  });

  it('should return empty string unchanged', () => {
    expect(toCamelCase('')).toBe('');
  });
});
