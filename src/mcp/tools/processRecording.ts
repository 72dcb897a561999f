/**
 * Tool: process_recording
 *
 * Download a shared recording, extract keyframes and audio, and upload all
 * of it to Google Drive. Returns the run report as JSON.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { withDriveOverrides } from '../../config/AppConfig.js';
import { toReport } from '../../pipeline/report.js';
import { describeError } from '../../shared/errors.js';
import { parseJobRequest } from '../../shared/jobRequest.js';
import type { ToolContext } from '../types.js';
import { log } from '../utils/Logger.js';

export function register(server: McpServer, context: ToolContext): void {
  server.tool(
    'process_recording',
    'Download a shared screen recording, extract a keyframe every N seconds plus a 16 kHz mono WAV track, and upload the video, frames and audio to Google Drive.',
    {
      url: z.string().describe('Share or embed link of the recording'),
      title: z.string().optional().describe('Prefix for uploaded file names (default: "Standard Operating Procedure")'),
      interval: z
        .union([z.number(), z.string()])
        .optional()
        .describe('Seconds between extracted frames, a number or numeric string (default: 10)'),
      folder_id: z.string().optional().describe('Drive folder ID, overrides the configured folder'),
      shared_drive_id: z.string().optional().describe('Shared drive ID, overrides the configured shared drive'),
    },
    async ({ url, title, interval, folder_id, shared_drive_id }) => {
      const request = parseJobRequest({ url, title, interval });
      if (!request.ok) {
        return {
          content: [{ type: 'text', text: `Error: ${request.error.message}` }],
          isError: true,
        };
      }

      try {
        const config = withDriveOverrides(context.config, { folderId: folder_id, sharedDriveId: shared_drive_id });
        log(`Processing ${request.value.url} (interval ${request.value.interval}s)`);

        const outcome = await context.createPipeline(config, context.store).run(request.value);
        const report = toReport(outcome);

        if (outcome.status === 'completed') {
          log(`Uploaded ${outcome.artifacts.length} artifact(s), ${outcome.failures.length} failure(s)`);
        } else {
          log(`Run aborted during ${outcome.stage}: ${outcome.error.message}`);
        }

        return {
          content: [{ type: 'text', text: JSON.stringify(report, null, 2) }],
          isError: !report.success,
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
