/**
 * PipelineOrchestrator.ts - One pipeline run, start to finish
 *
 *   resolving -> fetching -> extracting-frames -> extracting-audio -> uploading -> completed
 *
 * Any stage before uploading can move the run to `aborted`. Once extraction
 * has succeeded the run always completes: each artifact is uploaded on its
 * own and a failed upload is recorded without stopping its siblings.
 *
 * The run owns a private workspace under the configured base directory. It is
 * removed when the run ends, whether it completed, aborted or was cancelled.
 * A cancelled run ends as `aborted` at the stage it had reached, with a
 * CancelledError. Use one instance per run; concurrent runs share nothing.
 */

import { mkdir, mkdtemp, rm } from 'fs/promises';
import { extname, join } from 'path';
import { tmpdir } from 'os';

import type { AppConfig } from '../config/AppConfig.js';
import { runWithConcurrency } from '../shared/concurrency.js';
import {
  CancelledError,
  WorkspaceError,
  describeError,
  type ArtifactError,
  type PipelineStage,
  type StageError,
} from '../shared/errors.js';
import type { JobRequest } from '../shared/jobRequest.js';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type {
  ArtifactCounts,
  ArtifactKind,
  ExtractedAudio,
  ExtractedFrame,
  FetchStrategy,
  LocalMediaFile,
  MediaIdentifier,
  Placement,
  RemoteArtifactRef,
  Result,
} from '../shared/types.js';
import { ArtifactUploader } from '../storage/ArtifactUploader.js';
import type { RemoteStore } from '../storage/types.js';
import { AudioExtractor } from './AudioExtractor.js';
import { FrameExtractor } from './FrameExtractor.js';
import { MediaFetcher } from './MediaFetcher.js';
import { resolveSource } from './SourceResolver.js';
import { ToolRunner } from './ToolRunner.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineComponents {
  fetcher: Pick<MediaFetcher, 'fetch' | 'abort'>;
  frameExtractor: Pick<FrameExtractor, 'extract' | 'abort'>;
  audioExtractor: Pick<AudioExtractor, 'extract' | 'abort'>;
  uploader: Pick<ArtifactUploader, 'upload' | 'resolvePlacement'>;
}

export interface PipelineOptions {
  /** Base directory for the run workspace; OS temp dir when unset */
  workDir?: string;
  uploadConcurrency: number;
  log?: LogFn;
  onStage?: (stage: PipelineStage) => void;
}

export interface UploadedArtifact {
  kind: ArtifactKind;
  name: string;
  ref: RemoteArtifactRef;
  /** Capture order, frames only */
  frameIndex?: number;
}

export interface FailedArtifact {
  kind: ArtifactKind;
  name: string;
  localPath: string;
  error: ArtifactError;
  frameIndex?: number;
}

export interface CompletedOutcome {
  status: 'completed';
  success: true;
  /** True only when every expected artifact was uploaded */
  complete: boolean;
  identifier: MediaIdentifier;
  title: string;
  intervalSeconds: number;
  fetchStrategy: FetchStrategy;
  /** Video, then frames in capture order, then audio */
  artifacts: UploadedArtifact[];
  failures: FailedArtifact[];
  counts: Record<ArtifactKind, ArtifactCounts>;
}

export interface AbortedOutcome {
  status: 'aborted';
  success: false;
  stage: PipelineStage;
  error: StageError;
}

export type PipelineOutcome = CompletedOutcome | AbortedOutcome;

export interface PlannedUpload {
  kind: ArtifactKind;
  name: string;
  localPath: string;
  frameIndex?: number;
}

type UploadOutcome =
  | { ok: true; artifact: UploadedArtifact }
  | { ok: false; failure: FailedArtifact };

// ============================================================================
// PipelineOrchestrator Class
// ============================================================================

export class PipelineOrchestrator {
  private components: PipelineComponents;
  private options: PipelineOptions;
  private log: LogFn;
  private stage: PipelineStage = 'resolving';
  private runDir: string | null = null;
  private cancelled = false;

  constructor(components: PipelineComponents, options: PipelineOptions) {
    this.components = components;
    this.options = options;
    this.log = options.log ?? silentLogger;
  }

  /**
   * Wire real components for one run from the process configuration.
   */
  static fromConfig(
    config: Readonly<AppConfig>,
    store: RemoteStore,
    options: Pick<PipelineOptions, 'log' | 'onStage'> = {}
  ): PipelineOrchestrator {
    const log = options.log ?? silentLogger;
    const runner = new ToolRunner(log);

    return new PipelineOrchestrator(
      {
        fetcher: new MediaFetcher(config, runner, log),
        frameExtractor: new FrameExtractor(config.tools, runner, log),
        audioExtractor: new AudioExtractor(config.tools, runner, log),
        uploader: new ArtifactUploader(store, config.drive, log),
      },
      {
        ...options,
        workDir: config.workDir,
        uploadConcurrency: config.uploadConcurrency,
      }
    );
  }

  get currentStage(): PipelineStage {
    return this.stage;
  }

  async run(request: JobRequest): Promise<PipelineOutcome> {
    this.enter('resolving');

    // Rejected before any resource is allocated
    const identifier = resolveSource(request.url);
    if (!identifier.ok) {
      return this.abortWith(identifier.error);
    }
    this.log(`Resolved video ID ${identifier.value}`);

    try {
      this.enter('fetching');
      const runDir = await this.createRunDir();
      if (this.cancelled) {
        return this.abortWith(new CancelledError(this.stage));
      }
      if (!runDir.ok) {
        return this.abortWith(runDir.error);
      }

      const media = await this.components.fetcher.fetch(request.url, { workDir: runDir.value });
      if (this.cancelled) {
        return this.abortWith(new CancelledError(this.stage));
      }
      if (!media.ok) {
        return this.abortWith(media.error);
      }

      this.enter('extracting-frames');
      const frames = await this.components.frameExtractor.extract(
        media.value.path,
        join(runDir.value, 'frames'),
        request.interval
      );
      if (this.cancelled) {
        return this.abortWith(new CancelledError(this.stage));
      }
      if (!frames.ok) {
        return this.abortWith(frames.error);
      }

      this.enter('extracting-audio');
      const audio = await this.components.audioExtractor.extract(media.value.path, join(runDir.value, 'audio'));
      if (this.cancelled) {
        return this.abortWith(new CancelledError(this.stage));
      }
      if (!audio.ok) {
        return this.abortWith(audio.error);
      }

      this.enter('uploading');
      const plan = planUploads(request.title, media.value, frames.value.frames, audio.value);
      const outcomes = await this.uploadAll(plan);
      if (this.cancelled) {
        return this.abortWith(new CancelledError(this.stage));
      }

      const artifacts: UploadedArtifact[] = [];
      const failures: FailedArtifact[] = [];
      for (const outcome of outcomes) {
        if (outcome === null) continue;
        if (outcome.ok) {
          artifacts.push(outcome.artifact);
        } else {
          failures.push(outcome.failure);
        }
      }

      this.enter('completed');
      if (failures.length > 0) {
        this.log(`${failures.length} of ${plan.length} upload(s) failed`);
      }

      return {
        status: 'completed',
        success: true,
        complete: failures.length === 0,
        identifier: identifier.value,
        title: request.title,
        intervalSeconds: request.interval,
        fetchStrategy: media.value.strategy,
        artifacts,
        failures,
        counts: countArtifacts(plan, artifacts),
      };
    } finally {
      await this.reclaimRunDir();
    }
  }

  /**
   * Cancel the current run: kill any running tool, start no further stage
   * or upload, and remove the workspace. The pending `run()` resolves as
   * `aborted` once the interrupted stage reports back.
   */
  async abort(): Promise<void> {
    this.cancelled = true;
    this.components.fetcher.abort();
    this.components.frameExtractor.abort();
    this.components.audioExtractor.abort();
    await this.reclaimRunDir();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private enter(stage: PipelineStage): void {
    this.stage = stage;
    this.log(`Stage: ${stage}`);
    this.options.onStage?.(stage);
  }

  private abortWith(error: StageError): AbortedOutcome {
    const stage = this.stage;
    this.log(`Aborted during ${stage}: ${error.message}`);
    this.enter('aborted');
    return { status: 'aborted', success: false, stage, error };
  }

  private async createRunDir(): Promise<Result<string, WorkspaceError>> {
    const base = this.options.workDir ?? tmpdir();
    try {
      await mkdir(base, { recursive: true });
      const dir = await mkdtemp(join(base, 'framevault-run-'));
      this.runDir = dir;
      return { ok: true, value: dir };
    } catch (error) {
      return { ok: false, error: new WorkspaceError(`Cannot create run workspace under ${base}`, describeError(error)) };
    }
  }

  private async reclaimRunDir(): Promise<void> {
    const dir = this.runDir;
    if (!dir) return;
    this.runDir = null;

    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.log(`WARNING: could not remove workspace ${dir}: ${describeError(error)}`);
    }
  }

  /**
   * Outcomes in plan order; null for uploads skipped after cancellation.
   */
  private async uploadAll(plan: PlannedUpload[]): Promise<Array<UploadOutcome | null>> {
    const placement = this.components.uploader.resolvePlacement();
    if (!placement.ok) {
      this.log(`Uploads skipped: ${placement.error.message}`);
      return plan.map((item): UploadOutcome => ({ ok: false, failure: toFailure(item, placement.error) }));
    }

    this.log(`Uploading ${plan.length} artifact(s) with ${this.options.uploadConcurrency} worker(s)`);
    const tasks = plan.map(
      (item) => async (): Promise<UploadOutcome | null> =>
        this.cancelled ? null : this.uploadOne(item, placement.value)
    );
    return runWithConcurrency(tasks, this.options.uploadConcurrency);
  }

  private async uploadOne(item: PlannedUpload, placement: Placement): Promise<UploadOutcome> {
    const result = await this.components.uploader.upload(item.localPath, item.name, placement);
    if (!result.ok) {
      return { ok: false, failure: toFailure(item, result.error) };
    }

    const artifact: UploadedArtifact = { kind: item.kind, name: item.name, ref: result.value };
    if (item.frameIndex !== undefined) {
      artifact.frameIndex = item.frameIndex;
    }
    return { ok: true, artifact };
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Upload order: video, frames in capture order, audio.
 */
export function planUploads(
  title: string,
  media: LocalMediaFile,
  frames: ExtractedFrame[],
  audio: ExtractedAudio
): PlannedUpload[] {
  const videoExtension = extname(media.path) || '.mp4';

  return [
    { kind: 'video', name: `${title}_video${videoExtension}`, localPath: media.path },
    ...[...frames]
      .sort((a, b) => a.index - b.index)
      .map((frame): PlannedUpload => ({
        kind: 'frame',
        name: `${title}_${frame.fileName}`,
        localPath: frame.path,
        frameIndex: frame.index,
      })),
    { kind: 'audio', name: `${title}_audio.wav`, localPath: audio.path },
  ];
}

function toFailure(item: PlannedUpload, error: ArtifactError): FailedArtifact {
  const failure: FailedArtifact = { kind: item.kind, name: item.name, localPath: item.localPath, error };
  if (item.frameIndex !== undefined) {
    failure.frameIndex = item.frameIndex;
  }
  return failure;
}

function countArtifacts(plan: PlannedUpload[], uploaded: UploadedArtifact[]): Record<ArtifactKind, ArtifactCounts> {
  const counts: Record<ArtifactKind, ArtifactCounts> = {
    video: { expected: 0, uploaded: 0 },
    frame: { expected: 0, uploaded: 0 },
    audio: { expected: 0, uploaded: 0 },
  };
  for (const item of plan) counts[item.kind].expected += 1;
  for (const artifact of uploaded) counts[artifact.kind].uploaded += 1;
  return counts;
}
