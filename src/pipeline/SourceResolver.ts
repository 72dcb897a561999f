/**
 * SourceResolver.ts - Share/embed link to media identifier
 *
 * Pure: no I/O, no resources. A reference without a token is rejected
 * before anything is allocated for the run.
 */

import { InvalidReferenceError } from '../shared/errors.js';
import type { MediaIdentifier, Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';

/** `/share/<token>` or `/embed/<token>`, on any host */
const REFERENCE_PATTERN = /\/(?:share|embed)\/([a-zA-Z0-9]+)/;

const ID_PLACEHOLDER = /\{id\}/g;

export function resolveSource(reference: string): Result<MediaIdentifier, InvalidReferenceError> {
  const match = REFERENCE_PATTERN.exec(reference);
  if (!match) {
    return err(new InvalidReferenceError(reference));
  }
  return ok(match[1]);
}

/**
 * Direct-download URL for the fallback fetch.
 *
 * @example buildFallbackUrl('https://cdn.example.com/{id}.mp4', 'abc123') // 'https://cdn.example.com/abc123.mp4'
 */
export function buildFallbackUrl(template: string, id: MediaIdentifier): string {
  return template.replace(ID_PLACEHOLDER, id);
}
