/**
 * AppConfig.ts - Process configuration, read once at start-up
 *
 * The environment is parsed a single time into a frozen AppConfig that is
 * passed by reference into MediaFetcher, the extractors and ArtifactUploader.
 * Nothing downstream reads process.env.
 */

import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import type { Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_FALLBACK_URL_TEMPLATE = 'https://cdn.loom.com/sessions/thumbnails/{id}.mp4';
export const DEFAULT_UPLOAD_CONCURRENCY = 4;
export const MAX_UPLOAD_CONCURRENCY = 16;

// ============================================================================
// Schema
// ============================================================================

/** Empty or whitespace-only variables count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  GOOGLE_DRIVE_FOLDER_ID: optionalString,
  GOOGLE_SHARED_DRIVE_ID: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS_JSON: optionalString,
  TEMP_DIR: optionalString,
  FRAMEVAULT_UPLOAD_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_UPLOAD_CONCURRENCY)
    .default(DEFAULT_UPLOAD_CONCURRENCY),
  FRAMEVAULT_FALLBACK_URL_TEMPLATE: z
    .string()
    .url()
    .refine((value) => value.includes('{id}'), 'must contain an {id} placeholder')
    .default(DEFAULT_FALLBACK_URL_TEMPLATE),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  CURL_PATH: z.string().min(1).default('curl'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
});

/** The fields of a service-account key file that authentication needs. */
const ServiceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  project_id: z.string().optional(),
});

// ============================================================================
// Types
// ============================================================================

export interface ServiceAccountKey {
  clientEmail: string;
  privateKey: string;
  projectId?: string;
}

export type DriveCredentials =
  | { source: 'json'; key: ServiceAccountKey }
  | { source: 'file'; keyFile: string }
  | { source: 'none' };

export interface DriveConfig {
  folderId?: string;
  sharedDriveId?: string;
  credentials: DriveCredentials;
}

export interface ToolPaths {
  ytDlp: string;
  curl: string;
  ffmpeg: string;
  ffprobe: string;
}

export interface AppConfig {
  /** Base directory for run workspaces; OS temp dir when unset */
  workDir?: string;
  uploadConcurrency: number;
  fallbackUrlTemplate: string;
  tools: ToolPaths;
  drive: DriveConfig;
}

// ============================================================================
// Loading
// ============================================================================

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<Readonly<AppConfig>, ConfigError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return err(
      new ConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      )
    );
  }

  const vars = parsed.data;
  const credentials = resolveCredentials(
    vars.GOOGLE_APPLICATION_CREDENTIALS_JSON,
    vars.GOOGLE_APPLICATION_CREDENTIALS
  );
  if (!credentials.ok) {
    return credentials;
  }

  return ok(
    Object.freeze({
      workDir: vars.TEMP_DIR,
      uploadConcurrency: vars.FRAMEVAULT_UPLOAD_CONCURRENCY,
      fallbackUrlTemplate: vars.FRAMEVAULT_FALLBACK_URL_TEMPLATE,
      tools: Object.freeze({
        ytDlp: vars.YTDLP_PATH,
        curl: vars.CURL_PATH,
        ffmpeg: vars.FFMPEG_PATH,
        ffprobe: vars.FFPROBE_PATH,
      }),
      drive: Object.freeze({
        folderId: vars.GOOGLE_DRIVE_FOLDER_ID,
        sharedDriveId: vars.GOOGLE_SHARED_DRIVE_ID,
        credentials: credentials.value,
      }),
    })
  );
}

/**
 * Inline JSON wins over a key file path. The inline key stays in memory.
 */
function resolveCredentials(
  json: string | undefined,
  keyFile: string | undefined
): Result<DriveCredentials, ConfigError> {
  if (json) {
    let key: unknown;
    try {
      key = JSON.parse(json);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ConfigError([`GOOGLE_APPLICATION_CREDENTIALS_JSON: not valid JSON (${reason})`]));
    }
    const parsedKey = ServiceAccountKeySchema.safeParse(key);
    if (!parsedKey.success) {
      return err(
        new ConfigError(
          parsedKey.error.issues.map(
            (issue) => `${['GOOGLE_APPLICATION_CREDENTIALS_JSON', ...issue.path].join('.')}: ${issue.message}`
          )
        )
      );
    }
    return ok<DriveCredentials>({
      source: 'json',
      key: {
        clientEmail: parsedKey.data.client_email,
        privateKey: parsedKey.data.private_key,
        projectId: parsedKey.data.project_id,
      },
    });
  }

  if (keyFile) {
    return ok<DriveCredentials>({ source: 'file', keyFile });
  }

  return ok<DriveCredentials>({ source: 'none' });
}

/**
 * Apply CLI/tool overrides for the upload destination on top of a loaded config.
 */
export function withDriveOverrides(
  config: Readonly<AppConfig>,
  overrides: { folderId?: string; sharedDriveId?: string }
): Readonly<AppConfig> {
  if (!overrides.folderId && !overrides.sharedDriveId) {
    return config;
  }

  return Object.freeze({
    ...config,
    drive: Object.freeze({
      ...config.drive,
      folderId: overrides.folderId ?? config.drive.folderId,
      sharedDriveId: overrides.sharedDriveId ?? config.drive.sharedDriveId,
    }),
  });
}
