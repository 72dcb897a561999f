/**
 * Tool: list_folders
 *
 * List Drive folders visible to the configured credentials, so a caller can
 * pick a folder_id for process_recording.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { describeError } from '../../shared/errors.js';
import type { FolderScope } from '../../storage/types.js';
import type { ToolContext } from '../types.js';
import { log } from '../utils/Logger.js';

export function register(server: McpServer, context: ToolContext): void {
  server.tool(
    'list_folders',
    'List Google Drive folders visible to the configured credentials. Defaults to the configured shared drive, if any.',
    {
      parent_id: z.string().optional().describe('Only list subfolders of this folder'),
      shared_drive_id: z.string().optional().describe('List folders in this shared drive'),
    },
    async ({ parent_id, shared_drive_id }) => {
      const driveId = shared_drive_id ?? context.config.drive.sharedDriveId;

      let scope: FolderScope;
      if (parent_id) {
        scope = { kind: 'folder', folderId: parent_id };
      } else if (driveId) {
        scope = { kind: 'shared-drive', driveId };
      } else {
        scope = { kind: 'my-drive' };
      }

      try {
        const folders = await context.store.listFolders(scope);
        log(`Listed ${folders.length} folder(s) in ${scope.kind}`);

        return {
          content: [{ type: 'text', text: JSON.stringify({ success: true, folders }, null, 2) }],
        };
      } catch (error) {
        return {
          content: [{ type: 'text', text: `Error: ${describeError(error)}` }],
          isError: true,
        };
      }
    },
  );
}
