/**
 * FrameExtractor.ts - Keyframe sampling via ffmpeg
 *
 * Emits one JPEG every N seconds of source duration into a frames directory,
 * named frame_0001.jpg, frame_0002.jpg, ... so that lexicographic and capture
 * order coincide. A run that leaves no frames on disk is a failure, whatever
 * ffmpeg's exit status.
 */

import { mkdir, readdir } from 'fs/promises';
import { join } from 'path';

import type { ToolPaths } from '../config/AppConfig.js';
import { FrameExtractionError, describeError } from '../shared/errors.js';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { ExtractedFrame, FrameExtractionResult, Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';
import { ToolRunner, diagnosticOf, succeeded } from './ToolRunner.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_FRAME_INTERVAL_SECONDS = 10;
export const MIN_FRAME_INTERVAL_SECONDS = 1;

/** ffmpeg output pattern; %04d keeps lexicographic order == numeric order */
const FRAME_OUTPUT_PATTERN = 'frame_%04d.jpg';
const FRAME_FILE_PATTERN = /^frame_(\d{4,})\.jpg$/;

/** Timeout for a full extraction pass (10 minutes) */
const FFMPEG_EXTRACT_TIMEOUT_MS = 10 * 60 * 1000;

/** Timeout for the duration probe (15 seconds) */
const FFPROBE_TIMEOUT_MS = 15_000;

// ============================================================================
// FrameExtractor Class
// ============================================================================

export class FrameExtractor {
  private tools: Pick<ToolPaths, 'ffmpeg' | 'ffprobe'>;
  private runner: ToolRunner;
  private log: LogFn;

  constructor(tools: Pick<ToolPaths, 'ffmpeg' | 'ffprobe'>, runner?: ToolRunner, log: LogFn = silentLogger) {
    this.tools = tools;
    this.log = log;
    this.runner = runner ?? new ToolRunner(log);
  }

  /**
   * Sample the video every `intervalSeconds` seconds.
   */
  async extract(
    videoPath: string,
    outputDir: string,
    intervalSeconds: number = DEFAULT_FRAME_INTERVAL_SECONDS
  ): Promise<Result<FrameExtractionResult, FrameExtractionError>> {
    if (!Number.isInteger(intervalSeconds) || intervalSeconds < MIN_FRAME_INTERVAL_SECONDS) {
      return err(
        new FrameExtractionError(
          `Sampling interval must be a whole number of seconds >= ${MIN_FRAME_INTERVAL_SECONDS}, got ${intervalSeconds}`
        )
      );
    }

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      return err(new FrameExtractionError(`Cannot create frames directory: ${outputDir}`, describeError(error)));
    }

    const duration = await this.probeDuration(videoPath);
    const expectedCount = duration === null ? null : expectedFrameCount(duration, intervalSeconds);

    const run = await this.runner.run(
      this.tools.ffmpeg,
      [
        '-hide_banner',
        '-nostdin',
        '-y',
        '-i', videoPath,
        '-vf', `fps=1/${intervalSeconds}`,
        join(outputDir, FRAME_OUTPUT_PATTERN),
      ],
      { timeoutMs: FFMPEG_EXTRACT_TIMEOUT_MS }
    );

    if (!succeeded(run)) {
      return err(new FrameExtractionError('Failed to extract frames', diagnosticOf(run)));
    }

    const frames = await this.listFrames(outputDir, intervalSeconds);
    if (frames.length === 0) {
      return err(
        new FrameExtractionError(
          'ffmpeg reported success but produced no frames',
          run.stderr.trim()
        )
      );
    }

    if (expectedCount !== null && expectedCount !== frames.length) {
      this.log(`Extracted ${frames.length} frame(s), expected ${expectedCount} for ${duration}s`);
    } else {
      this.log(`Extracted ${frames.length} frame(s) every ${intervalSeconds}s`);
    }

    return ok({ frames, intervalSeconds, expectedCount });
  }

  /**
   * Source duration in seconds, or null when ffprobe cannot tell.
   */
  async probeDuration(videoPath: string): Promise<number | null> {
    const run = await this.runner.run(
      this.tools.ffprobe,
      [
        '-v', 'error',
        '-show_entries', 'format=duration',
        '-of', 'default=noprint_wrappers=1:nokey=1',
        videoPath,
      ],
      { timeoutMs: FFPROBE_TIMEOUT_MS }
    );

    if (!succeeded(run)) {
      this.log(`Could not probe duration: ${diagnosticOf(run)}`);
      return null;
    }

    const duration = Number.parseFloat(run.stdout.trim());
    return Number.isFinite(duration) && duration >= 0 ? duration : null;
  }

  abort(): void {
    this.runner.abort();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async listFrames(outputDir: string, intervalSeconds: number): Promise<ExtractedFrame[]> {
    let entries: string[];
    try {
      entries = await readdir(outputDir);
    } catch (error) {
      this.log(`Cannot list frames directory: ${describeError(error)}`);
      return [];
    }

    const frames: ExtractedFrame[] = [];
    for (const fileName of entries) {
      const match = FRAME_FILE_PATTERN.exec(fileName);
      if (!match) continue;
      const index = Number.parseInt(match[1], 10);
      frames.push({
        index,
        fileName,
        path: join(outputDir, fileName),
        timestamp: (index - 1) * intervalSeconds,
      });
    }

    return frames.sort((a, b) => a.index - b.index);
  }
}

/**
 * Frames ffmpeg's fps filter emits for a source of the given length:
 * one at t=0 and one per full interval after it.
 *
 * @example expectedFrameCount(35, 10) // 4 (t = 0, 10, 20, 30)
 */
export function expectedFrameCount(durationSeconds: number, intervalSeconds: number): number {
  if (durationSeconds <= 0) return 0;
  return Math.floor(durationSeconds / intervalSeconds) + 1;
}
