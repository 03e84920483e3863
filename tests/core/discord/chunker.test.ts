import { describe, it, expect } from 'vitest';
import {
  chunkText,
  findBreak,
  markdownBlocks,
  safeCut,
  splitPlain,
} from '../../../src/core/discord/chunker.js';

function longSummary(): string {
  const sentence = 'The quick brown fox jumps over the lazy dog.';
  const paragraph = Array.from({ length: 10 }, () => sentence).join(' ');
  return Array.from({ length: 16 }, (_, i) => `${i + 1}. ${paragraph}`).join('\n\n');
}

describe('splitPlain', () => {
  it('should prefer a blank line, then a space', () => {
    const text = 'first para.\n\nsecond para continues here';

    expect(splitPlain(text, 20, 20)).toEqual([
      'first para.\n\n',
      'second para ',
      'continues here',
    ]);
  });

  it('should hard split when there is no break point in the window', () => {
    expect(splitPlain('abcdefghijklmnop', 10, 5)).toEqual(['abcdefghij', 'klmnop']);
  });

  it('should ignore break points before the lookback window', () => {
    // the only space is at index 2, outside [8, 10)
    expect(splitPlain('ab cdefghijklmn', 10, 2)).toEqual(['ab cdefghi', 'jklmn']);
  });
});

describe('findBreak', () => {
  it('should not separate a surrogate pair', () => {
    const text = `${'a'.repeat(9)}😀b`;

    expect(findBreak(text, 10, 2)).toBe(9);
    expect(splitPlain(text, 10, 2)).toEqual(['a'.repeat(9), '😀b']);
  });

  it('should move a cut out of a surrogate pair', () => {
    expect(safeCut('ab😀', 2)).toBe(2);
    expect(safeCut('a😀b', 2)).toBe(1);
    expect(safeCut('😀b', 1)).toBe(1);
  });

  it('should prefer a line break over a later space', () => {
    expect(findBreak('line one\nline two more', 16, 10)).toBe(9);
  });
});

describe('markdownBlocks', () => {
  it('should always cover the input exactly', () => {
    const inputs = [
      '# Title\n\nParagraph one.\n\n- item a\n- item b\n',
      'See [docs][1].\n\n[1]: https://example.com',
      '```ts\nconst x = 1;\n```\n\ntext after',
      '',
    ];

    for (const input of inputs) {
      expect(markdownBlocks(input).join('')).toBe(input);
    }
  });
});

describe('chunkText', () => {
  it('should return one chunk for short text', () => {
    expect(chunkText('Hello world', 4096)).toEqual([{ index: 0, body: 'Hello world' }]);
  });

  it('should split a 7000-character summary into bounded, ordered chunks', () => {
    const text = longSummary();
    expect(text.length).toBeGreaterThan(7000);

    const chunks = chunkText(text, 4096);

    expect(chunks.length).toBeGreaterThanOrEqual(2);
    for (const chunk of chunks) {
      expect(chunk.body.length).toBeLessThanOrEqual(4096);
    }
    expect(chunks.map((c) => c.index)).toEqual(chunks.map((_, i) => i));
    expect(chunks.map((c) => c.body).join('')).toBe(text);
  });

  it('should keep paragraphs whole when they fit', () => {
    const chunks = chunkText('alpha\n\nbeta\n\ngamma', 8);

    expect(chunks.map((c) => c.body)).toEqual(['alpha\n\n', 'beta\n\n', 'gamma']);
  });

  it('should move a fenced code block to the next chunk instead of cutting it', () => {
    const code = `\`\`\`\n${'x'.repeat(50)}\n\`\`\``;
    const text = `Intro paragraph.\n\n${code}\n\nOutro.`;

    const chunks = chunkText(text, 70);

    expect(chunks).toHaveLength(2);
    expect(chunks[0].body.trim()).toBe('Intro paragraph.');
    expect(chunks[1].body.startsWith(code)).toBe(true);
  });

  it('should hard split a block without whitespace', () => {
    const chunks = chunkText('a'.repeat(25), 10);

    expect(chunks.map((c) => c.body)).toEqual(['a'.repeat(10), 'a'.repeat(10), 'a'.repeat(5)]);
  });

  it('should produce no chunks for blank text', () => {
    expect(chunkText('', 10)).toEqual([]);
    expect(chunkText('   ', 10)).toEqual([]);
  });

  it('should reject a non-positive limit', () => {
    expect(() => chunkText('text', 0)).toThrow(RangeError);
  });

  it('should reject a limit too small to hold a surrogate pair', () => {
    expect(() => chunkText('😀', 1)).toThrow(RangeError);
  });
});
