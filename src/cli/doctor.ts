/**
 * doctor.ts - Environment health check for the framevault CLI
 *
 * Checks that the pipeline can run end to end:
 * - Node.js version compatibility
 * - yt-dlp and curl (video download)
 * - ffmpeg / ffprobe (frame and audio extraction)
 * - Google Drive credentials and upload destination
 * - Whether the destination folder or shared drive is reachable
 */

import { existsSync } from 'fs';
import { platform } from 'os';

import type { AppConfig } from '../config/AppConfig.js';
import { ToolRunner, succeeded } from '../pipeline/ToolRunner.js';
import { describeError } from '../shared/errors.js';
import { resolvePlacement } from '../storage/ArtifactUploader.js';
import type { RemoteStore } from '../storage/types.js';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  runner?: Pick<ToolRunner, 'run'>;
  /** Defaults to process.version */
  nodeVersion?: string;
}

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function installHint(tool: string): string {
  const os = platform();
  if (os === 'darwin') return `brew install ${tool}`;
  if (os === 'win32') return `winget install ${tool}`;
  return `apt install ${tool} (or your package manager)`;
}

// ============================================================================
// Check functions
// ============================================================================

function checkNodeVersion(version: string): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `framevault requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
    };
  }

  if (parsed[0] >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR}.0.0)` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `framevault requires Node.js >= ${MIN_NODE_MAJOR}.0.0. Upgrade at https://nodejs.org`,
  };
}

/**
 * Run `<command> <versionFlag>` and report the version matched by `pattern`
 * on its output.
 */
async function checkTool(
  runner: Pick<ToolRunner, 'run'>,
  name: string,
  command: string,
  versionFlag: string,
  pattern: RegExp,
  hint: string
): Promise<DoctorCheck> {
  const run = await runner.run(command, [versionFlag], { timeoutMs: 10_000 });

  if (!succeeded(run)) {
    return {
      name,
      status: 'fail',
      message: command === name ? 'Not found on PATH' : `Not runnable: ${command}`,
      hint,
    };
  }

  const firstLine = run.stdout.trim().split('\n')[0] ?? '';
  const versionMatch = firstLine.match(pattern);
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return { name, status: 'pass', message: `Installed (${version})` };
}

function checkCredentials(config: Readonly<AppConfig>): DoctorCheck {
  const { credentials } = config.drive;

  switch (credentials.source) {
    case 'json':
      return {
        name: 'Drive credentials',
        status: 'pass',
        message: `Inline service account key (${credentials.key.clientEmail})`,
      };
    case 'file':
      if (!existsSync(credentials.keyFile)) {
        return {
          name: 'Drive credentials',
          status: 'fail',
          message: `Key file not found: ${credentials.keyFile}`,
          hint: 'Point GOOGLE_APPLICATION_CREDENTIALS at a service account key file',
        };
      }
      return { name: 'Drive credentials', status: 'pass', message: `Key file ${credentials.keyFile}` };
    case 'none':
      return {
        name: 'Drive credentials',
        status: 'warn',
        message: 'No key configured, using application default credentials',
        hint: 'Set GOOGLE_APPLICATION_CREDENTIALS or GOOGLE_APPLICATION_CREDENTIALS_JSON',
      };
  }
}

async function checkDestination(config: Readonly<AppConfig>, store: RemoteStore | null): Promise<DoctorCheck[]> {
  const placement = resolvePlacement(config.drive);

  if (!placement.ok) {
    return [
      {
        name: 'Drive destination',
        status: 'fail',
        message: 'Not configured',
        hint: placement.error.message,
      },
    ];
  }

  const target = placement.value;
  const destination: DoctorCheck = {
    name: 'Drive destination',
    status: 'pass',
    message:
      target.kind === 'shared-drive'
        ? `Shared drive ${target.driveId}, folder ${target.folderId}`
        : `Folder ${target.folderId}`,
  };

  if (!store) {
    return [destination];
  }

  try {
    const file = await store.getFile(target.folderId, { supportsAllDrives: target.kind === 'shared-drive' });
    return [
      destination,
      { name: 'Drive access', status: 'pass', message: `Reachable: ${file.name || file.id}` },
    ];
  } catch (error) {
    return [
      destination,
      {
        name: 'Drive access',
        status: 'fail',
        message: describeError(error),
        hint: 'Share the folder or shared drive with the service account',
      },
    ];
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result. The reachability check is
 * skipped when no store is given.
 */
export async function runDoctorChecks(
  config: Readonly<AppConfig>,
  store: RemoteStore | null,
  options: DoctorOptions = {}
): Promise<DoctorResult> {
  const runner = options.runner ?? new ToolRunner();
  const { tools } = config;

  const [ytDlp, curl, ffmpeg, ffprobe, destination] = await Promise.all([
    checkTool(runner, 'yt-dlp', tools.ytDlp, '--version', /^(\S+)/, 'pip install yt-dlp (or your package manager)'),
    checkTool(runner, 'curl', tools.curl, '--version', /^curl (\S+)/, `Install via: ${installHint('curl')}`),
    checkTool(runner, 'ffmpeg', tools.ffmpeg, '-version', /ffmpeg version (\S+)/, `Install via: ${installHint('ffmpeg')}`),
    checkTool(
      runner,
      'ffprobe',
      tools.ffprobe,
      '-version',
      /ffprobe version (\S+)/,
      'ffprobe is usually installed alongside ffmpeg'
    ),
    checkDestination(config, store),
  ]);

  const checks = [
    checkNodeVersion(options.nodeVersion ?? process.version),
    ytDlp,
    curl,
    ffmpeg,
    ffprobe,
    checkCredentials(config),
    ...destination,
  ];

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
