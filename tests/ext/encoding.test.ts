/**
 * Strand Extension Tests: Base-64 and Base-32
 */

import { describe, expect, it } from 'vitest';
import { callError, callString, testTable } from '../helpers/call.js';

describe('Strand Extension: Encoding', () => {
  const table = testTable();

  describe('base64', () => {
    it('encodes UTF-8 bytes with padding', () => {
      expect(callString(table, 'base64encode', 'Hello World!')).toBe('SGVsbG8gV29ybGQh');
      expect(callString(table, 'base64encode', 'héllo')).toBe('aMOpbGxv');
      expect(callString(table, 'base64encode', '')).toBe('');
    });

    it('decodes', () => {
      expect(callString(table, 'base64decode', 'SGVsbG8gV29ybGQh')).toBe('Hello World!');
      expect(callString(table, 'base64decode', 'aMOpbGxv')).toBe('héllo');
    });

    it('rejects malformed input', () => {
      const error = callError(table, 'base64decode', 'not base64!');
      expect(error.kind).toBe('domain');
      expect(error.message).toMatch(/^unable to decode /);
    });

    it('keeps a leading byte order mark', () => {
      expect(callString(table, 'base64encode', '\uFEFFabc')).toBe('77u/YWJj');
      expect(callString(table, 'base64decode', '77u/YWJj')).toBe('\uFEFFabc');
    });

    it('rejects bytes that are not UTF-8', () => {
      const error = callError(table, 'base64decode', '/w==');
      expect(error.kind).toBe('domain');
      expect(error.message).toMatch(/^unable to decode: /);
    });
  });

  describe('base32', () => {
    it('encodes UTF-8 bytes with padding', () => {
      expect(callString(table, 'base32encode', 'Hello World!')).toBe(
        'JBSWY3DPEBLW64TMMQQQ===='
      );
      expect(callString(table, 'base32encode', 'héllo')).toBe('NDB2S3DMN4======');
    });

    it('decodes', () => {
      expect(callString(table, 'base32decode', 'JBSWY3DPEBLW64TMMQQQ====')).toBe(
        'Hello World!'
      );
    });

    it('keeps a leading byte order mark', () => {
      const encoded = callString(table, 'base32encode', '\uFEFFabc');
      expect(callString(table, 'base32decode', encoded)).toBe('\uFEFFabc');
    });

    it('rejects malformed input', () => {
      const error = callError(table, 'base32decode', '1');
      expect(error.kind).toBe('domain');
      expect(error.message).toMatch(/^unable to decode /);
    });
  });

  describe('properties', () => {
    const samples = ['', 'a', 'Hello World!', 'héllo', '\uFEFFabc', 'a\uFEFF', '日本語', '😀 ok'];

    for (const codec of ['base64', 'base32']) {
      it(`${codec}decode restores ${codec}encode output`, () => {
        for (const s of samples) {
          const encoded = callString(table, `${codec}encode`, s);
          expect(callString(table, `${codec}decode`, encoded)).toBe(s);
        }
      });
    }
  });
});
