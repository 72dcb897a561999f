/**
 * JSON-safe report for callers outside the process (CLI --json, MCP tools).
 */

import type { FramevaultError, PipelineStage } from '../shared/errors.js';
import type { ArtifactCounts, ArtifactKind, RemoteArtifactRef } from '../shared/types.js';
import type { PipelineOutcome } from './PipelineOrchestrator.js';

export interface SuccessReport {
  success: true;
  complete: boolean;
  videoId: string;
  title: string;
  files: Array<{ type: ArtifactKind; file: RemoteArtifactRef }>;
  failures: Array<{ type: ArtifactKind; name: string; error: string }>;
  counts: Record<ArtifactKind, ArtifactCounts>;
}

export interface FailureReport {
  success: false;
  /** `config` when the environment was rejected before any run started */
  stage: PipelineStage | 'config';
  error: string;
  diagnostic?: string;
}

export type JobReport = SuccessReport | FailureReport;

/**
 * Report for an error raised outside a run (bad request, bad config) or for
 * the error that aborted one.
 */
export function failureReport(
  error: FramevaultError,
  stage: FailureReport['stage'] = error.stage
): FailureReport {
  const report: FailureReport = { success: false, stage, error: error.message };
  if (error.diagnostic) {
    report.diagnostic = error.diagnostic;
  }
  return report;
}

export function toReport(outcome: PipelineOutcome): JobReport {
  if (outcome.status === 'aborted') {
    return failureReport(outcome.error, outcome.stage);
  }

  return {
    success: true,
    complete: outcome.complete,
    videoId: outcome.identifier,
    title: outcome.title,
    files: outcome.artifacts.map((artifact) => ({ type: artifact.kind, file: artifact.ref })),
    failures: outcome.failures.map((failure) => ({
      type: failure.kind,
      name: failure.name,
      error: failure.error.message,
    })),
    counts: outcome.counts,
  };
}

/**
 * Human-readable lines summarizing a run, shared by the CLI and MCP tool.
 */
export function summarize(outcome: PipelineOutcome): string[] {
  if (outcome.status === 'aborted') {
    const lines = [`Run aborted during ${outcome.stage}: ${outcome.error.message}`];
    if (outcome.error.diagnostic) {
      lines.push('', outcome.error.diagnostic);
    }
    return lines;
  }

  const { counts } = outcome;
  const lines = [
    outcome.complete ? 'All artifacts uploaded' : 'Run completed with upload failures',
    `  Video ID: ${outcome.identifier}`,
    `  Title:    ${outcome.title}`,
    `  Video:    ${counts.video.uploaded}/${counts.video.expected}`,
    `  Frames:   ${counts.frame.uploaded}/${counts.frame.expected} (every ${outcome.intervalSeconds}s)`,
    `  Audio:    ${counts.audio.uploaded}/${counts.audio.expected}`,
  ];

  if (outcome.artifacts.length > 0) {
    lines.push('', 'Uploaded:');
    for (const artifact of outcome.artifacts) {
      lines.push(`  ${artifact.name} ${artifact.ref.webViewLink}`);
    }
  }

  if (outcome.failures.length > 0) {
    lines.push('', 'Failed:');
    for (const failure of outcome.failures) {
      lines.push(`  ${failure.name}: ${failure.error.message}`);
    }
  }

  return lines;
}
