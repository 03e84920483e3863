import { marked } from 'marked';
import type { NotificationChunk } from '../../types/index.js';

/**
 * Break points tried, in order, inside the lookback window. The separator
 * stays with the earlier piece so pieces concatenate back to the input.
 */
export const MIN_CHUNK_LENGTH = 2;

export const BREAK_POINTS = ['\n\n', '\n', ' ', '\t'] as const;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * `end`, moved back one code unit when it would leave a lone high surrogate.
 */
export function safeCut(text: string, end: number): number {
  return end > 1 && end < text.length && isHighSurrogate(text.charCodeAt(end - 1)) ? end - 1 : end;
}

/**
 * Length of the first piece when `text` must be cut at or before `limit`.
 */
export function findBreak(text: string, limit: number, lookback: number): number {
  const window = text.slice(0, limit);
  const minCut = Math.max(1, limit - lookback);

  for (const separator of BREAK_POINTS) {
    const index = window.lastIndexOf(separator);
    if (index >= 0 && index + separator.length >= minCut) {
      return index + separator.length;
    }
  }

  return safeCut(text, limit);
}

export function splitPlain(text: string, limit: number, lookback: number): string[] {
  const pieces: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const cut = findBreak(rest, limit, lookback);
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) {
    pieces.push(rest);
  }
  return pieces;
}

/**
 * Top-level markdown blocks (paragraphs, lists, fenced code, ...) as source
 * text. Falls back to a single block when the lexer's sources do not cover
 * the input exactly, e.g. link reference definitions.
 */
export function markdownBlocks(text: string): string[] {
  const blocks = marked.lexer(text).map((token) => token.raw);
  return blocks.join('') === text ? blocks : [text];
}

export function chunkText(
  text: string,
  limit: number,
  lookback: number = Math.floor(limit / 4)
): NotificationChunk[] {
  // Below 2 a surrogate pair cannot fit in a chunk.
  if (!Number.isInteger(limit) || limit < MIN_CHUNK_LENGTH) {
    throw new RangeError(`Chunk limit must be an integer of at least ${MIN_CHUNK_LENGTH}, got ${limit}`);
  }

  const bodies: string[] = [];
  let current = '';

  for (const block of markdownBlocks(text)) {
    if (current.length + block.length <= limit) {
      current += block;
      continue;
    }

    if (current.length > 0) {
      bodies.push(current);
      current = '';
    }

    if (block.length <= limit) {
      current = block;
    } else {
      const pieces = splitPlain(block, limit, lookback);
      current = pieces.pop() ?? '';
      bodies.push(...pieces);
    }
  }
  if (current.length > 0) {
    bodies.push(current);
  }

  return bodies
    .filter((body) => body.trim().length > 0)
    .map((body, index) => ({ index, body }));
}
