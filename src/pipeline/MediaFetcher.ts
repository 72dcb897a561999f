/**
 * MediaFetcher.ts - Retrieve the source video onto local storage
 *
 * Primary strategy: yt-dlp against the source reference.
 * Fallback strategy: curl against a direct-download URL built from the
 * media identifier, attempted only after the primary is confirmed to have
 * produced nothing usable.
 *
 * A strategy succeeds only when its output file exists with a non-zero size.
 * The tool's exit status on its own is not trusted.
 */

import { mkdir, mkdtemp, stat } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';

import type { AppConfig } from '../config/AppConfig.js';
import { CancelledError, FetchError, InvalidReferenceError, WorkspaceError, describeError } from '../shared/errors.js';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { LocalMediaFile, Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';
import { buildFallbackUrl, resolveSource } from './SourceResolver.js';
import { ToolRunner, diagnosticOf, succeeded, type ToolRun } from './ToolRunner.js';

// ============================================================================
// Types
// ============================================================================

export type MediaFetcherConfig = Pick<AppConfig, 'workDir' | 'fallbackUrlTemplate' | 'tools'>;

export interface FetchOptions {
  /** Directory to download into; overrides the configured base directory */
  workDir?: string;
}

export type FetchFailure = FetchError | InvalidReferenceError | WorkspaceError | CancelledError;

// ============================================================================
// Constants
// ============================================================================

/** Downloads of long recordings are slow; 15 minutes per strategy */
const FETCH_TIMEOUT_MS = 15 * 60 * 1000;

// ============================================================================
// MediaFetcher Class
// ============================================================================

export class MediaFetcher {
  private config: MediaFetcherConfig;
  private runner: ToolRunner;
  private log: LogFn;

  constructor(config: MediaFetcherConfig, runner?: ToolRunner, log: LogFn = silentLogger) {
    this.config = config;
    this.log = log;
    this.runner = runner ?? new ToolRunner(log);
  }

  async fetch(reference: string, options: FetchOptions = {}): Promise<Result<LocalMediaFile, FetchFailure>> {
    const workDir = await this.prepareWorkDir(options.workDir);
    if (!workDir.ok) {
      return workDir;
    }

    const token = `${Date.now()}_${randomUUID().slice(0, 8)}`;

    // Step 1: primary strategy
    const primaryPath = join(workDir.value, `media_${token}.mp4`);
    this.log(`Downloading ${reference} to ${primaryPath}`);

    const primaryRun = await this.runner.run(
      this.config.tools.ytDlp,
      ['--verbose', '-f', 'best', '-o', primaryPath, reference],
      { timeoutMs: FETCH_TIMEOUT_MS }
    );

    const primarySize = await nonEmptySize(primaryPath);
    if (primarySize !== null) {
      this.log(`Downloaded ${primarySize} bytes with yt-dlp`);
      return ok<LocalMediaFile>({ path: primaryPath, sizeBytes: primarySize, strategy: 'primary' });
    }

    // No fallback once the run is cancelled
    if (this.runner.isAborted) {
      return err(new CancelledError('fetching'));
    }

    const primaryDiagnostic = describeMissingOutput(primaryRun, primaryPath);
    this.log('yt-dlp produced no usable file, trying the direct URL');

    // Step 2: fallback strategy, derived from the media identifier
    const id = resolveSource(reference);
    if (!id.ok) {
      return err(new FetchError(primaryDiagnostic, id.error.message));
    }

    const fallbackUrl = buildFallbackUrl(this.config.fallbackUrlTemplate, id.value);
    const fallbackPath = join(workDir.value, `media_direct_${token}.mp4`);
    this.log(`Fetching ${fallbackUrl}`);

    const fallbackRun = await this.runner.run(
      this.config.tools.curl,
      ['-L', '--fail', '--silent', '--show-error', '-o', fallbackPath, fallbackUrl],
      { timeoutMs: FETCH_TIMEOUT_MS }
    );

    const fallbackSize = await nonEmptySize(fallbackPath);
    if (fallbackSize !== null) {
      this.log(`Downloaded ${fallbackSize} bytes from the direct URL`);
      return ok<LocalMediaFile>({ path: fallbackPath, sizeBytes: fallbackSize, strategy: 'fallback' });
    }

    return err(new FetchError(primaryDiagnostic, describeMissingOutput(fallbackRun, fallbackPath)));
  }

  /**
   * Kill an in-flight download.
   */
  abort(): void {
    this.runner.abort();
  }

  private async prepareWorkDir(requested?: string): Promise<Result<string, WorkspaceError>> {
    const base = requested ?? this.config.workDir;
    try {
      if (base) {
        await mkdir(base, { recursive: true });
        return ok(base);
      }
      return ok(await mkdtemp(join(tmpdir(), 'framevault-')));
    } catch (error) {
      return err(
        new WorkspaceError(
          `Cannot create working directory: ${base ?? tmpdir()}`,
          describeError(error)
        )
      );
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Size of the file when it exists and is non-empty, otherwise null.
 */
async function nonEmptySize(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() && stats.size > 0 ? stats.size : null;
  } catch {
    return null;
  }
}

function describeMissingOutput(run: ToolRun, outputPath: string): string {
  if (succeeded(run)) {
    const stderr = run.stderr.trim();
    const note = `${run.command} exited 0 but ${outputPath} is missing or empty`;
    return stderr ? `${note}\n${stderr}` : note;
  }
  return diagnosticOf(run);
}
