/**
 * Pipeline Module - Acquisition, extraction and upload
 *
 * For one source reference, this pipeline:
 *   1. Resolves the share/embed link to a media identifier
 *   2. Downloads the video (yt-dlp, then a direct URL via curl)
 *   3. Samples keyframes every N seconds (ffmpeg)
 *   4. Extracts a 16 kHz mono WAV track (ffmpeg)
 *   5. Uploads video, frames and audio to Google Drive
 */

// ============================================================================
// Classes & Functions
// ============================================================================

export { PipelineOrchestrator, planUploads } from './PipelineOrchestrator.js';
export { MediaFetcher } from './MediaFetcher.js';
export { FrameExtractor, expectedFrameCount } from './FrameExtractor.js';
export { AudioExtractor } from './AudioExtractor.js';
export { ToolRunner } from './ToolRunner.js';
export { resolveSource, buildFallbackUrl } from './SourceResolver.js';
export { toReport, failureReport, summarize } from './report.js';
export { ArtifactUploader, resolvePlacement } from '../storage/ArtifactUploader.js';
export { DriveStore } from '../storage/DriveStore.js';
export { loadConfig } from '../config/AppConfig.js';
export { parseJobRequest } from '../shared/jobRequest.js';
export * from '../shared/errors.js';

// ============================================================================
// Types
// ============================================================================

export type {
  PipelineOutcome,
  CompletedOutcome,
  AbortedOutcome,
  UploadedArtifact,
  FailedArtifact,
  PipelineComponents,
  PipelineOptions,
} from './PipelineOrchestrator.js';

export type { JobReport, SuccessReport, FailureReport } from './report.js';
export type { AppConfig } from '../config/AppConfig.js';
export type { JobRequest } from '../shared/jobRequest.js';
export type { RemoteStore } from '../storage/types.js';
export type * from '../shared/types.js';
