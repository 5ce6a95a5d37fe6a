/**
 * Tests for unescapeJsonString
 */

import { describe, it, expect } from 'vitest';
import { unescapeJsonString } from '../src/core/unescape.js';

describe('unescapeJsonString', () => {
  it('should decode newline and ASCII \\u escapes', () => {
    expect(unescapeJsonString('a\\nb\\u0041')).toBe('a\nbA');
  });

  it('should emit the escaped character for unknown escapes', () => {
    expect(unescapeJsonString('\\q')).toBe('q');
  });

  it('should decode quote, backslash and slash', () => {
    expect(unescapeJsonString('\\"x\\" \\\\ \\/')).toBe('"x" \\ /');
  });

  it('should decode control escapes', () => {
    expect(unescapeJsonString('\\b\\f\\r\\t')).toBe('\b\f\r\t');
  });

  it('should replace non-ASCII code points with ?', () => {
    expect(unescapeJsonString('caf\\u00e9')).toBe('caf?');
  });

  it('should accept upper-case hex digits', () => {
    expect(unescapeJsonString('\\u004A\\u007f')).toBe('J\u007f');
  });

  it('should keep a trailing lone backslash', () => {
    expect(unescapeJsonString('abc\\')).toBe('abc\\');
  });

  it('should fall back to the letter u when fewer than four hex digits follow', () => {
    expect(unescapeJsonString('\\u12')).toBe('u12');
    expect(unescapeJsonString('\\uzz00')).toBe('uzz00');
  });

  it('should leave plain text untouched', () => {
    expect(unescapeJsonString('<title>Hi</title>')).toBe('<title>Hi</title>');
  });
});
