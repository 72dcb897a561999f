/**
 * Logger for the MCP server. stdout carries JSON-RPC traffic, so this writes
 * to stderr only.
 */

import { createLogger } from '../../shared/logger.js';

export const log = createLogger('framevault-mcp');
