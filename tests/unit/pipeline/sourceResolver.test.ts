/**
 * SourceResolver Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveSource, buildFallbackUrl } from '../../../src/pipeline/SourceResolver.js';
import { InvalidReferenceError } from '../../../src/shared/errors.js';

describe('resolveSource', () => {
  it('extracts the token from a share link', () => {
    expect(resolveSource('https://www.loom.com/share/0cd67c5205e34420')).toEqual({
      ok: true,
      value: '0cd67c5205e34420',
    });
  });

  it('extracts the token from an embed link', () => {
    expect(resolveSource('https://www.loom.com/embed/abc123XYZ')).toEqual({ ok: true, value: 'abc123XYZ' });
  });

  it('accepts any host', () => {
    expect(resolveSource('https://host/share/abc123XYZ')).toEqual({ ok: true, value: 'abc123XYZ' });
  });

  it('stops the token at the first non-alphanumeric character', () => {
    expect(resolveSource('https://host/share/abc123?sid=9f')).toEqual({ ok: true, value: 'abc123' });
    expect(resolveSource('https://host/share/abc-def')).toEqual({ ok: true, value: 'abc' });
  });

  it('rejects a reference without a share or embed segment', () => {
    const result = resolveSource('https://host/videos/abc123');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidReferenceError);
    expect(result.error.reference).toBe('https://host/videos/abc123');
    expect(result.error.stage).toBe('resolving');
    expect(result.error.severity).toBe('user');
  });

  it('rejects an empty token', () => {
    expect(resolveSource('https://host/share/').ok).toBe(false);
  });
});

describe('buildFallbackUrl', () => {
  it('substitutes every {id} placeholder', () => {
    expect(buildFallbackUrl('https://cdn.example.test/{id}/{id}.mp4', 'abc')).toBe(
      'https://cdn.example.test/abc/abc.mp4'
    );
  });
});
