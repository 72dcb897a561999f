/**
 * Remote storage contract consumed by ArtifactUploader, the CLI and the MCP
 * tools. DriveStore is the production implementation; tests use an
 * in-memory one.
 */

import type { RemoteArtifactRef } from '../shared/types.js';

// ============================================================================
// Requests
// ============================================================================

export interface CreateFileRequest {
  name: string;
  localPath: string;
  mimeType: string;
  parentId: string;
  /** Required by the remote API when the parent lives in a shared drive */
  supportsAllDrives: boolean;
}

export type FolderScope =
  | { kind: 'my-drive' }
  | { kind: 'folder'; folderId: string }
  | { kind: 'shared-drive'; driveId: string };

// ============================================================================
// Responses
// ============================================================================

export interface RemoteFolder {
  id: string;
  name: string;
}

export interface RemoteFileMetadata {
  id: string;
  name: string;
  mimeType: string;
  webViewLink?: string;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Remote-side failures (auth, quota, not-found) surface as rejected
 * promises carrying the remote error text.
 */
export interface RemoteStore {
  createFile(request: CreateFileRequest): Promise<RemoteArtifactRef>;
  listFolders(scope: FolderScope): Promise<RemoteFolder[]>;
  getFile(id: string, options?: { supportsAllDrives?: boolean }): Promise<RemoteFileMetadata>;
}
