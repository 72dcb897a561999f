#!/usr/bin/env node
/**
 * framevault MCP Server - Entry Point
 *
 * Headless Node.js process communicating over stdio using JSON-RPC 2.0.
 * stdout is reserved for MCP protocol; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from '../config/AppConfig.js';
import { PipelineOrchestrator } from '../pipeline/PipelineOrchestrator.js';
import { describeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { DriveStore } from '../storage/DriveStore.js';
import { readVersion } from '../shared/version.js';
import { createServer } from './server.js';
import { log } from './utils/Logger.js';

const VERSION = readVersion();

log(`framevault MCP server v${VERSION} starting...`);

process.on('uncaughtException', (error) => {
  log(`Uncaught exception: ${describeError(error)}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log(`Unhandled rejection: ${describeError(reason)}`);
  process.exit(1);
});

const config = loadConfig();
if (!config.ok) {
  log(config.error.message);
  process.exit(1);
}

try {
  const server = createServer(
    {
      config: config.value,
      store: DriveStore.fromCredentials(config.value.drive.credentials),
      createPipeline: (runConfig, store) =>
        PipelineOrchestrator.fromConfig(runConfig, store, { log: createLogger('pipeline') }),
    },
    VERSION
  );
  const transport = new StdioServerTransport();
  await server.connect(transport);
} catch (error) {
  log(`Failed to start MCP server: ${describeError(error)}`);
  process.exit(1);
}
