/**
 * ArtifactUploader.ts - Persist one local file to the remote store
 *
 * Each call either returns a complete RemoteArtifactRef or an error; there is
 * no visible intermediate state. Nothing is retried here.
 */

import { existsSync } from 'fs';
import { extname } from 'path';

import type { DriveConfig } from '../config/AppConfig.js';
import {
  ArtifactMissingError,
  PlacementNotConfiguredError,
  UploadError,
  describeError,
  type ArtifactError,
} from '../shared/errors.js';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { Placement, RemoteArtifactRef, Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';
import type { RemoteStore } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.wav': 'audio/wav',
};

const DEFAULT_MIME_TYPE = 'application/octet-stream';

// ============================================================================
// Placement
// ============================================================================

/**
 * A configured shared drive takes precedence over a plain folder. Inside a
 * shared drive the folder id is optional and defaults to the drive root.
 */
export function resolvePlacement(
  drive: Pick<DriveConfig, 'folderId' | 'sharedDriveId'>
): Result<Placement, PlacementNotConfiguredError> {
  const folderId = drive.folderId?.trim();
  const sharedDriveId = drive.sharedDriveId?.trim();

  if (sharedDriveId) {
    return ok<Placement>({ kind: 'shared-drive', driveId: sharedDriveId, folderId: folderId || sharedDriveId });
  }
  if (folderId) {
    return ok<Placement>({ kind: 'folder', folderId });
  }
  return err(new PlacementNotConfiguredError());
}

export function mimeTypeFor(filePath: string): string {
  return MIME_TYPES[extname(filePath).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

// ============================================================================
// ArtifactUploader Class
// ============================================================================

export class ArtifactUploader {
  private store: RemoteStore;
  private drive: Pick<DriveConfig, 'folderId' | 'sharedDriveId'>;
  private log: LogFn;

  constructor(
    store: RemoteStore,
    drive: Pick<DriveConfig, 'folderId' | 'sharedDriveId'>,
    log: LogFn = silentLogger
  ) {
    this.store = store;
    this.drive = drive;
    this.log = log;
  }

  resolvePlacement(): Result<Placement, PlacementNotConfiguredError> {
    return resolvePlacement(this.drive);
  }

  /**
   * Upload `localPath` as `name`. Without an explicit placement, the
   * configured one is used.
   */
  async upload(
    localPath: string,
    name: string,
    placement?: Placement
  ): Promise<Result<RemoteArtifactRef, ArtifactError>> {
    if (!existsSync(localPath)) {
      return err(new ArtifactMissingError(localPath));
    }

    let target: Placement;
    if (placement) {
      target = placement;
    } else {
      const resolved = this.resolvePlacement();
      if (!resolved.ok) {
        return resolved;
      }
      target = resolved.value;
    }

    try {
      const ref = await this.store.createFile({
        name,
        localPath,
        mimeType: mimeTypeFor(localPath),
        parentId: target.folderId,
        supportsAllDrives: target.kind === 'shared-drive',
      });
      this.log(`Uploaded ${name} (${ref.id})`);
      return ok(ref);
    } catch (error) {
      const message = describeError(error);
      this.log(`Upload of ${name} failed: ${message}`);
      return err(new UploadError(name, message));
    }
  }
}
