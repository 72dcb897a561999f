/**
 * Shared types for framevault
 */

// ============================================================================
// Result
// ============================================================================

/**
 * Success value XOR typed error. Every pipeline operation returns one of
 * these instead of throwing for an expected failure.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Pipeline data model
// ============================================================================

/** Short alphanumeric token taken from a share or embed link. */
export type MediaIdentifier = string;

/** Which transfer strategy produced the local video. */
export type FetchStrategy = 'primary' | 'fallback';

/**
 * Video file on local ephemeral storage, owned by the run that fetched it.
 */
export interface LocalMediaFile {
  path: string;
  sizeBytes: number;
  strategy: FetchStrategy;
}

/**
 * One still image, numbered by capture order (1-based).
 */
export interface ExtractedFrame {
  index: number;
  fileName: string;
  path: string;
  /** Seconds from the start of the source, derived from the sampling interval */
  timestamp: number;
}

export interface FrameExtractionResult {
  frames: ExtractedFrame[];
  intervalSeconds: number;
  /** floor(duration / interval) + 1 when the source duration could be probed */
  expectedCount: number | null;
}

/**
 * The single normalized audio track of a run: mono, 16 kHz, PCM.
 */
export interface ExtractedAudio {
  path: string;
  sampleRate: 16000;
  channels: 1;
  codec: 'pcm_s16le';
}

export type ArtifactKind = 'video' | 'frame' | 'audio';

/**
 * Result of a successful upload. Never mutated after creation.
 */
export interface RemoteArtifactRef {
  id: string;
  name: string;
  webViewLink: string;
}

/**
 * Where uploads land: a plain folder, or a folder inside a shared drive.
 */
export type Placement =
  | { kind: 'folder'; folderId: string }
  | { kind: 'shared-drive'; driveId: string; folderId: string };

export interface ArtifactCounts {
  expected: number;
  uploaded: number;
}
