import { describe, expect, it } from 'vitest';

import { parseMoveRequest } from './move.js';

describe('parseMoveRequest', () => {
  it('normalizes squares and drops an empty promotion', () => {
    const result = parseMoveRequest({ source: ' E2 ', destination: 'e4', promotion: '' });
    expect(result).toEqual({ ok: true, request: { source: 'e2', destination: 'e4', promotion: undefined } });
  });

  it('maps promotion letters to piece names', () => {
    const result = parseMoveRequest({ source: 'a7', destination: 'a8', promotion: 'N' });
    expect(result.ok && result.request.promotion).toBe('knight');
  });

  it('reports missing fields as required', () => {
    const result = parseMoveRequest({ destination: '' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fieldErrors.source).toEqual(['This field is required.']);
      expect(result.fieldErrors.destination).toEqual(['This field is required.']);
    }
  });

  it('explains which part of a square is wrong', () => {
    const result = parseMoveRequest({ source: 'e22', destination: 'z4' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fieldErrors.source).toEqual(['Enter a square in the format e2.']);
      expect(result.fieldErrors.destination).toEqual(['File must be a letter from a to h.']);
    }

    const rank = parseMoveRequest({ source: 'e9', destination: 'e0' });
    expect(rank.ok).toBe(false);
    if (!rank.ok) {
      expect(rank.fieldErrors.source).toEqual(['Rank must be a number from 1 to 8.']);
      expect(rank.fieldErrors.destination).toEqual(['Rank must be a number from 1 to 8.']);
    }
  });

  it('rejects unknown promotion pieces', () => {
    const result = parseMoveRequest({ source: 'a7', destination: 'a8', promotion: 'king' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fieldErrors.promotion).toEqual(['Choose a queen, rook, bishop or knight.']);
    }
  });

  it('rejects a body that is not an object', () => {
    const result = parseMoveRequest('e2e4');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fieldErrors).toEqual({});
      expect(result.message).toBe('Expected object, received string');
    }
  });
});
