/**
 * DriveStore.ts - Google Drive v3 implementation of RemoteStore
 *
 * Authenticates as a service account (inline key, key file, or application
 * default credentials) with the full drive scope. Media is streamed from
 * disk; the create call returns only once Drive has the complete file.
 */

import { createReadStream } from 'fs';
import { google, type drive_v3 } from 'googleapis';

import type { DriveCredentials } from '../config/AppConfig.js';
import type { RemoteArtifactRef } from '../shared/types.js';
import type {
  CreateFileRequest,
  FolderScope,
  RemoteFileMetadata,
  RemoteFolder,
  RemoteStore,
} from './types.js';

export const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';
export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

const FOLDER_PAGE_SIZE = 100;

export function createDriveClient(credentials: DriveCredentials): drive_v3.Drive {
  const scopes = [DRIVE_SCOPE];

  const auth =
    credentials.source === 'json'
      ? new google.auth.GoogleAuth({
          credentials: {
            client_email: credentials.key.clientEmail,
            private_key: credentials.key.privateKey,
          },
          projectId: credentials.key.projectId,
          scopes,
        })
      : new google.auth.GoogleAuth({
          // No key file: application default credentials
          keyFile: credentials.source === 'file' ? credentials.keyFile : undefined,
          scopes,
        });

  return google.drive({ version: 'v3', auth });
}

export class DriveStore implements RemoteStore {
  private drive: drive_v3.Drive;

  constructor(drive: drive_v3.Drive) {
    this.drive = drive;
  }

  static fromCredentials(credentials: DriveCredentials): DriveStore {
    return new DriveStore(createDriveClient(credentials));
  }

  async createFile(request: CreateFileRequest): Promise<RemoteArtifactRef> {
    // googleapis sends a streamed body as one multipart request; the file
    // exists remotely only once the call resolves.
    const response = await this.drive.files.create({
      requestBody: {
        name: request.name,
        parents: [request.parentId],
      },
      media: {
        mimeType: request.mimeType,
        body: createReadStream(request.localPath),
      },
      fields: 'id,name,webViewLink',
      supportsAllDrives: request.supportsAllDrives,
    });

    const file = response.data;
    if (!file.id) {
      throw new Error(`Drive accepted ${request.name} but returned no file id`);
    }

    return {
      id: file.id,
      name: file.name ?? request.name,
      webViewLink: file.webViewLink ?? `https://drive.google.com/file/d/${file.id}/view`,
    };
  }

  async listFolders(scope: FolderScope): Promise<RemoteFolder[]> {
    const clauses = [`mimeType='${FOLDER_MIME_TYPE}'`, 'trashed=false'];
    if (scope.kind === 'folder') {
      clauses.push(`'${escapeQueryValue(scope.folderId)}' in parents`);
    }

    const folders: RemoteFolder[] = [];
    let pageToken: string | undefined;

    do {
      const { data }: { data: drive_v3.Schema$FileList } = await this.drive.files.list({
        q: clauses.join(' and '),
        fields: 'nextPageToken, files(id, name)',
        pageSize: FOLDER_PAGE_SIZE,
        pageToken,
        ...(scope.kind === 'shared-drive'
          ? {
              corpora: 'drive',
              driveId: scope.driveId,
              includeItemsFromAllDrives: true,
              supportsAllDrives: true,
            }
          : {}),
      });

      for (const file of data.files ?? []) {
        if (file.id) {
          folders.push({ id: file.id, name: file.name ?? '' });
        }
      }
      pageToken = data.nextPageToken ?? undefined;
    } while (pageToken);

    return folders;
  }

  async getFile(id: string, options: { supportsAllDrives?: boolean } = {}): Promise<RemoteFileMetadata> {
    const response = await this.drive.files.get({
      fileId: id,
      fields: 'id,name,mimeType,webViewLink',
      supportsAllDrives: options.supportsAllDrives ?? false,
    });

    const file = response.data;
    return {
      id: file.id ?? id,
      name: file.name ?? '',
      mimeType: file.mimeType ?? '',
      webViewLink: file.webViewLink ?? undefined,
    };
  }
}

/** Single quotes and backslashes must be escaped inside Drive query literals. */
function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}
