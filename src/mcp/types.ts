/**
 * MCP-specific types for the framevault MCP server.
 */

import type { AppConfig } from '../config/AppConfig.js';
import type { PipelineOrchestrator } from '../pipeline/PipelineOrchestrator.js';
import type { RemoteStore } from '../storage/types.js';

/** Runs one job; the orchestrator in production, a fake in tests. */
export type PipelineFactory = (
  config: Readonly<AppConfig>,
  store: RemoteStore
) => Pick<PipelineOrchestrator, 'run'>;

/** Shared by every tool registration. Loaded once when the server starts. */
export interface ToolContext {
  config: Readonly<AppConfig>;
  store: RemoteStore;
  createPipeline: PipelineFactory;
}
