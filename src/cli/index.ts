#!/usr/bin/env node
/**
 * framevault CLI - Archive a shared screen recording to Google Drive
 *
 * Usage:
 *   framevault process <url> [options]
 *   framevault folders [options]
 *   framevault doctor
 *
 * `process` runs the full pipeline for one recording:
 *   1. Resolve the share link to a video ID
 *   2. Download the video (yt-dlp, falling back to a direct URL)
 *   3. Extract a keyframe every N seconds
 *   4. Extract a 16 kHz mono WAV audio track
 *   5. Upload video, frames and audio to the configured Drive folder
 */

import { Command } from 'commander';

import { loadConfig, withDriveOverrides, type AppConfig } from '../config/AppConfig.js';
import { PipelineOrchestrator } from '../pipeline/PipelineOrchestrator.js';
import { failureReport, summarize, toReport } from '../pipeline/report.js';
import { describeError, type FramevaultError } from '../shared/errors.js';
import { parseJobRequest } from '../shared/jobRequest.js';
import { readVersion } from '../shared/version.js';
import { createLogger, silentLogger } from '../shared/logger.js';
import { DriveStore } from '../storage/DriveStore.js';
import type { FolderScope } from '../storage/types.js';
import { runDoctorChecks } from './doctor.js';
import {
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  EXIT_SYSTEM_ERROR,
  EXIT_SIGINT,
  exitCodeForError,
  exitCodeForOutcome,
} from './exitCodes.js';

const VERSION = readVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  warn: '⚠',     // warning sign
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  line: '─',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  framevault v${VERSION} ${SYMBOLS.bullet} CLI Mode`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function warn(message: string): void {
  console.log(`  ${SYMBOLS.warn} ${message}`);
}

interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Load configuration from the environment or exit with the config issues.
 */
function requireConfig(
  overrides: { folderId?: string; sharedDriveId?: string } = {},
  output: OutputOptions = {}
): Readonly<AppConfig> {
  const config = loadConfig();
  if (!config.ok) {
    failWith(config.error, output);
  }
  return withDriveOverrides(config.value, overrides);
}

/**
 * Report `error` and exit. Under --json the report is the only stdout output.
 */
function failWith(error: FramevaultError, output: OutputOptions): never {
  if (output.json) {
    console.log(JSON.stringify(failureReport(error), null, 2));
    process.exit(exitCodeForError(error));
  }

  fail(error.message);
  if (output.verbose && error.diagnostic) {
    console.log();
    console.log(error.diagnostic);
  }
  process.exit(exitCodeForError(error));
}

// ============================================================================
// Signal handling
// ============================================================================

let activePipeline: PipelineOrchestrator | null = null;

function setupSignalHandlers(): void {
  const handler = async () => {
    console.error('\n  Interrupted, cleaning up...');
    if (activePipeline) {
      await activePipeline.abort();
    }
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('framevault')
  .description('Download shared screen recordings, extract keyframes and audio, and archive them to Google Drive')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// process command
// ============================================================================

program
  .command('process')
  .description('Process one recording and upload its video, frames and audio')
  .argument('<url>', 'Share or embed link of the recording')
  .option('--title <title>', 'Prefix for uploaded file names')
  .option('--interval <seconds>', 'Seconds between extracted frames')
  .option('--folder <id>', 'Drive folder ID (overrides GOOGLE_DRIVE_FOLDER_ID)')
  .option('--shared-drive <id>', 'Shared drive ID (overrides GOOGLE_SHARED_DRIVE_ID)')
  .option('--json', 'Print the run report as JSON on stdout', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (url: string, options: {
    title?: string;
    interval?: string;
    folder?: string;
    sharedDrive?: string;
    json: boolean;
    verbose: boolean;
  }) => {
    if (!options.json) {
      banner();
    }

    const request = parseJobRequest({ url, title: options.title, interval: options.interval });
    if (!request.ok) {
      failWith(request.error, options);
    }

    const config = requireConfig({ folderId: options.folder, sharedDriveId: options.sharedDrive }, options);

    if (!options.json) {
      step(`Source:   ${request.value.url}`);
      step(`Title:    ${request.value.title}`);
      step(`Interval: ${request.value.interval}s`);
      console.log();
    }

    const pipeline = PipelineOrchestrator.fromConfig(config, DriveStore.fromCredentials(config.drive.credentials), {
      log: options.verbose ? createLogger('framevault') : silentLogger,
      onStage: options.json ? undefined : (stage) => step(`Stage: ${stage}`),
    });
    activePipeline = pipeline;

    try {
      const outcome = await pipeline.run(request.value);

      if (options.json) {
        console.log(JSON.stringify(toReport(outcome), null, 2));
      } else {
        console.log();
        const [headline, ...details] = summarize(outcome);
        if (outcome.status === 'completed' && outcome.complete) {
          success(headline);
        } else {
          fail(headline);
        }
        for (const line of details) {
          console.log(line ? `  ${line}` : '');
        }
        console.log();
      }

      process.exit(exitCodeForOutcome(outcome));
    } catch (error) {
      if (options.json) {
        console.log(
          JSON.stringify({ success: false, stage: pipeline.currentStage, error: describeError(error) }, null, 2)
        );
        process.exit(EXIT_SYSTEM_ERROR);
      }
      fail(`Processing failed: ${describeError(error)}`);
      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }
      process.exit(EXIT_SYSTEM_ERROR);
    } finally {
      activePipeline = null;
    }
  });

// ============================================================================
// folders command
// ============================================================================

program
  .command('folders')
  .description('List Drive folders visible to the configured credentials')
  .option('--folder <id>', 'List the subfolders of this folder')
  .option('--shared-drive <id>', 'List folders in this shared drive (overrides GOOGLE_SHARED_DRIVE_ID)')
  .option('--json', 'Print folders as JSON on stdout', false)
  .action(async (options: { folder?: string; sharedDrive?: string; json: boolean }) => {
    const config = requireConfig({ sharedDriveId: options.sharedDrive }, options);
    const sharedDriveId = config.drive.sharedDriveId;

    let scope: FolderScope;
    if (options.folder) {
      scope = { kind: 'folder', folderId: options.folder };
    } else if (sharedDriveId) {
      scope = { kind: 'shared-drive', driveId: sharedDriveId };
    } else {
      scope = { kind: 'my-drive' };
    }

    try {
      const folders = await DriveStore.fromCredentials(config.drive.credentials).listFolders(scope);

      if (options.json) {
        console.log(JSON.stringify({ success: true, folders }, null, 2));
        return;
      }

      banner();
      if (folders.length === 0) {
        step('No folders found');
      }
      for (const folder of folders) {
        step(`${folder.name}  ${folder.id}`);
      }
      console.log();
    } catch (error) {
      if (options.json) {
        console.log(JSON.stringify({ success: false, error: describeError(error) }, null, 2));
        process.exit(EXIT_SYSTEM_ERROR);
      }
      fail(`Could not list folders: ${describeError(error)}`);
      process.exit(EXIT_SYSTEM_ERROR);
    }
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check that the tools, credentials and Drive destination are usable')
  .action(async () => {
    banner();

    const config = requireConfig();
    const result = await runDoctorChecks(config, DriveStore.fromCredentials(config.drive.credentials));

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);

      if (check.hint && check.status !== 'pass') {
        for (const hintLine of check.hint.split('\n')) {
          console.log(`      ${hintLine}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.log();

    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => {
  fail(describeError(error));
  process.exit(EXIT_SYSTEM_ERROR);
});
