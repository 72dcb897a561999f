/**
 * errors.ts - Error taxonomy for the acquisition/extraction/upload pipeline
 *
 * Stage-level errors (resolve, fetch, extract) abort a run. Artifact-level
 * errors (upload preconditions, remote failures) are recorded per artifact
 * and never stop sibling uploads.
 *
 * `diagnostic` holds the verbatim output of the external tool or remote API.
 * It is meant for operators and is not machine-parseable.
 */

export type PipelineStage =
  | 'resolving'
  | 'fetching'
  | 'extracting-frames'
  | 'extracting-audio'
  | 'uploading'
  | 'completed'
  | 'aborted';

export type ErrorSeverity = 'user' | 'system';

export abstract class FramevaultError extends Error {
  abstract readonly stage: PipelineStage | 'config';
  public readonly severity: ErrorSeverity;
  public readonly diagnostic: string;

  constructor(message: string, severity: ErrorSeverity, diagnostic = '') {
    super(message);
    this.name = new.target.name;
    this.severity = severity;
    this.diagnostic = diagnostic;
  }
}

// ============================================================================
// Input and configuration
// ============================================================================

export class InvalidRequestError extends FramevaultError {
  readonly stage = 'resolving';
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid job request: ${issues.join('; ')}`, 'user');
    this.issues = issues;
  }
}

export class InvalidReferenceError extends FramevaultError {
  readonly stage = 'resolving';
  public readonly reference: string;

  constructor(reference: string) {
    super(`Could not extract a video ID from the source reference: ${reference}`, 'user');
    this.reference = reference;
  }
}

export class ConfigError extends FramevaultError {
  readonly stage = 'config';
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`, 'user');
    this.issues = issues;
  }
}

// ============================================================================
// Stage failures
// ============================================================================

export class WorkspaceError extends FramevaultError {
  readonly stage = 'fetching';

  constructor(message: string, diagnostic: string) {
    super(message, 'system', diagnostic);
  }
}

/**
 * Both transfer strategies failed. Keeps each strategy's diagnostic.
 */
export class FetchError extends FramevaultError {
  readonly stage = 'fetching';
  public readonly primaryDiagnostic: string;
  public readonly fallbackDiagnostic: string;

  constructor(primaryDiagnostic: string, fallbackDiagnostic: string) {
    super(
      'Failed to download video with both the primary and the fallback strategy',
      'system',
      `primary:\n${primaryDiagnostic}\nfallback:\n${fallbackDiagnostic}`
    );
    this.primaryDiagnostic = primaryDiagnostic;
    this.fallbackDiagnostic = fallbackDiagnostic;
  }
}

export class FrameExtractionError extends FramevaultError {
  readonly stage = 'extracting-frames';

  constructor(message: string, diagnostic = '') {
    super(message, 'system', diagnostic);
  }
}

export class AudioExtractionError extends FramevaultError {
  readonly stage = 'extracting-audio';

  constructor(message: string, diagnostic = '') {
    super(message, 'system', diagnostic);
  }
}

/**
 * The run was interrupted by `abort()` (SIGINT, SIGTERM or a caller).
 */
export class CancelledError extends FramevaultError {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage) {
    super(`Run cancelled during ${stage}`, 'user');
    this.stage = stage;
  }
}

// ============================================================================
// Artifact-level failures
// ============================================================================

export class ArtifactMissingError extends FramevaultError {
  readonly stage = 'uploading';
  public readonly localPath: string;

  constructor(localPath: string) {
    super(`File not found: ${localPath}`, 'system');
    this.localPath = localPath;
  }
}

export class PlacementNotConfiguredError extends FramevaultError {
  readonly stage = 'uploading';

  constructor() {
    super(
      'No upload destination configured: set GOOGLE_DRIVE_FOLDER_ID or GOOGLE_SHARED_DRIVE_ID',
      'user'
    );
  }
}

export class UploadError extends FramevaultError {
  readonly stage = 'uploading';
  public readonly artifactName: string;

  constructor(artifactName: string, remoteMessage: string) {
    super(`Upload failed: ${remoteMessage}`, 'system', remoteMessage);
    this.artifactName = artifactName;
  }
}

export type StageError =
  | InvalidRequestError
  | InvalidReferenceError
  | WorkspaceError
  | FetchError
  | FrameExtractionError
  | AudioExtractionError
  | CancelledError;

export type ArtifactError = ArtifactMissingError | PlacementNotConfiguredError | UploadError;

/**
 * Text of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
