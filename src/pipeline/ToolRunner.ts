/**
 * ToolRunner.ts - Out-of-process tool invocation
 *
 * Runs yt-dlp, curl, ffmpeg and ffprobe. A run never rejects because the
 * tool failed: the exit status and captured output come back as data so each
 * stage can apply its own success criterion. Child processes are tracked so
 * an interrupted pipeline can kill them; once aborted, a runner starts
 * nothing new.
 */

import { execFile as execFileCb, type ChildProcess } from 'child_process';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ToolRun {
  command: string;
  args: string[];
  /** null when the process could not start or was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started, timed out or was killed */
  spawnError?: string;
}

export interface ToolRunOptions {
  timeoutMs?: number;
}

// ============================================================================
// Constants
// ============================================================================

/** yt-dlp --verbose and ffmpeg both write a lot to stderr */
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

// ============================================================================
// ToolRunner Class
// ============================================================================

export class ToolRunner {
  private static readonly SAFE_CHILD_ENV = {
    PATH: process.env.PATH,
    HOME: process.env.HOME || process.env.USERPROFILE,
    USERPROFILE: process.env.USERPROFILE,
    LANG: process.env.LANG,
    TMPDIR: process.env.TMPDIR || process.env.TEMP,
    TEMP: process.env.TEMP,
    HTTP_PROXY: process.env.HTTP_PROXY,
    HTTPS_PROXY: process.env.HTTPS_PROXY,
  };

  private activeProcesses: Set<ChildProcess> = new Set();
  private aborted = false;
  private log: LogFn;

  constructor(log: LogFn = silentLogger) {
    this.log = log;
  }

  run(command: string, args: string[], options: ToolRunOptions = {}): Promise<ToolRun> {
    if (this.aborted) {
      this.log(`Not running ${command}: runner aborted`);
      return Promise.resolve({
        command,
        args,
        exitCode: null,
        stdout: '',
        stderr: '',
        spawnError: `${command} not started: run cancelled`,
      });
    }

    this.log(`Running: ${command} ${args.join(' ')}`);

    return new Promise((resolve) => {
      const child = execFileCb(
        command,
        args,
        {
          env: ToolRunner.SAFE_CHILD_ENV,
          maxBuffer: MAX_OUTPUT_BYTES,
          timeout: options.timeoutMs ?? 0,
        },
        (error, stdout, stderr) => {
          this.activeProcesses.delete(child);

          const run: ToolRun = {
            command,
            args,
            exitCode: error ? (typeof error.code === 'number' ? error.code : null) : 0,
            stdout: stdout?.toString() ?? '',
            stderr: stderr?.toString() ?? '',
          };
          if (error && run.exitCode === null) {
            run.spawnError = error.message;
          }

          this.log(`${command} exited with ${run.exitCode ?? 'no status'} (stderr: ${run.stderr.length} chars)`);
          resolve(run);
        }
      );
      this.activeProcesses.add(child);
    });
  }

  /**
   * Kill every tool still running. Their pending runs resolve as failed, and
   * later runs resolve as failed without starting.
   */
  abort(): void {
    this.aborted = true;
    for (const proc of this.activeProcesses) {
      proc.kill('SIGTERM');
    }
    this.activeProcesses.clear();
  }

  get isAborted(): boolean {
    return this.aborted;
  }

  get activeCount(): number {
    return this.activeProcesses.size;
  }
}

/**
 * Operator-facing text for a failed run: stderr if the tool wrote any,
 * otherwise whatever explains why it did not run.
 */
export function diagnosticOf(run: ToolRun): string {
  const stderr = run.stderr.trim();
  if (stderr) return stderr;
  if (run.spawnError) return run.spawnError;
  const stdout = run.stdout.trim();
  if (stdout) return stdout;
  return `${run.command} exited with code ${run.exitCode ?? 'unknown'}`;
}

export function succeeded(run: ToolRun): boolean {
  return run.exitCode === 0;
}
