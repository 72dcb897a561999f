/**
 * In-memory RemoteStore. Records every request and can be told to reject
 * uploads by file name.
 */

import type { RemoteArtifactRef } from '../../src/shared/types.js';
import type {
  CreateFileRequest,
  FolderScope,
  RemoteFileMetadata,
  RemoteFolder,
  RemoteStore,
} from '../../src/storage/types.js';

export class MemoryStore implements RemoteStore {
  readonly created: CreateFileRequest[] = [];
  readonly folders: Array<RemoteFolder & { parentId?: string; driveId?: string }> = [];
  readonly files = new Map<string, RemoteFileMetadata>();
  /** File names whose upload rejects with the mapped message */
  readonly rejections = new Map<string, string>();
  private nextId = 1;

  async createFile(request: CreateFileRequest): Promise<RemoteArtifactRef> {
    const rejection = this.rejections.get(request.name);
    if (rejection !== undefined) {
      throw new Error(rejection);
    }

    this.created.push(request);
    const id = `file-${this.nextId++}`;
    const ref = { id, name: request.name, webViewLink: `https://drive.example.test/${id}` };
    this.files.set(id, { ...ref, mimeType: request.mimeType });
    return ref;
  }

  async listFolders(scope: FolderScope): Promise<RemoteFolder[]> {
    return this.folders
      .filter((folder) => {
        if (scope.kind === 'folder') return folder.parentId === scope.folderId;
        if (scope.kind === 'shared-drive') return folder.driveId === scope.driveId;
        return folder.driveId === undefined;
      })
      .map(({ id, name }) => ({ id, name }));
  }

  async getFile(id: string): Promise<RemoteFileMetadata> {
    const file = this.files.get(id);
    if (!file) {
      throw new Error(`File not found: ${id}.`);
    }
    return file;
  }
}
