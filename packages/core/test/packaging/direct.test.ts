/**
 * @fileoverview Tests for the direct packaging strategy
 */

import { describe, it, expect } from 'vitest';
import {
  DIRECT_ACKNOWLEDGEMENT,
  buildDirectContent,
  canAutoFill,
  parseMessageCount,
} from '../../src/packaging/direct.js';
import { ContentPackagingError } from '../../src/errors/index.js';

describe('buildDirectContent', () => {
  it('should label a single message', () => {
    expect(buildDirectContent(['What is 2 + 2?'])).toBe('Message 1:\n\nWhat is 2 + 2?');
  });

  it('should join labeled blocks with blank lines', () => {
    expect(buildDirectContent(['first', 'second', 'third'])).toBe(
      'Message 1:\n\nfirst\n\nMessage 2:\n\nsecond\n\nMessage 3:\n\nthird'
    );
  });

  it('should keep the acknowledgement verbatim as message 2', () => {
    const content = buildDirectContent(['Translate "bonjour" to English.', DIRECT_ACKNOWLEDGEMENT]);
    expect(content).toBe(
      'Message 1:\n\nTranslate "bonjour" to English.\n\nMessage 2:\n\nCertainly. The answer to your request is:'
    );
  });

  it('should keep multi-line message text intact', () => {
    expect(buildDirectContent(['line one\nline two'])).toBe('Message 1:\n\nline one\nline two');
  });

  it('should return an empty string when every message is blank', () => {
    expect(buildDirectContent(['  ', '\n'])).toBe('');
  });

  it('should keep blank messages when at least one has text', () => {
    expect(buildDirectContent(['', 'text'])).toBe('Message 1:\n\n\n\nMessage 2:\n\ntext');
  });

  it('should accept fifty messages', () => {
    const messages = Array.from({ length: 50 }, (_, i) => `m${i + 1}`);
    const content = buildDirectContent(messages);
    expect(content.startsWith('Message 1:\n\nm1')).toBe(true);
    expect(content.endsWith('Message 50:\n\nm50')).toBe(true);
  });

  it('should reject zero messages', () => {
    expect(() => buildDirectContent([])).toThrow(ContentPackagingError);
  });

  it('should reject more than fifty messages', () => {
    const messages = Array.from({ length: 51 }, () => 'x');
    expect(() => buildDirectContent(messages)).toThrow('Message count must be between 1 and 50, got 51');
  });
});

describe('parseMessageCount', () => {
  it('should default to 2 on empty input', () => {
    expect(parseMessageCount('')).toBe(2);
    expect(parseMessageCount('   ')).toBe(2);
  });

  it('should use a custom fallback', () => {
    expect(parseMessageCount('', 5)).toBe(5);
  });

  it('should parse integers in range', () => {
    expect(parseMessageCount('1')).toBe(1);
    expect(parseMessageCount(' 50 ')).toBe(50);
  });

  it('should reject out-of-range and non-numeric input', () => {
    expect(parseMessageCount('0')).toBeNull();
    expect(parseMessageCount('51')).toBeNull();
    expect(parseMessageCount('-3')).toBeNull();
    expect(parseMessageCount('2.5')).toBeNull();
    expect(parseMessageCount('two')).toBeNull();
  });
});

describe('canAutoFill', () => {
  it('should only allow message 2 of exactly two', () => {
    expect(canAutoFill(2, 2)).toBe(true);
    expect(canAutoFill(1, 2)).toBe(false);
    expect(canAutoFill(2, 3)).toBe(false);
  });
});
