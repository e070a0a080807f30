export { Pipeline } from './pipeline.js';
export type {
  AnalysisOptions,
  DiscoveryOutcome,
  HardeningRunResult,
  PipelineOptions,
  QueryResponse,
  RetryAcknowledgement,
} from './pipeline.js';
export { PipelineStateStore, createInitialState } from './pipeline-state.js';
export type {
  ErrorEntry,
  FindingCounts,
  PipelinePhase,
  PipelineSnapshot,
  PriorAnalysis,
  Unit,
  UnitStatus,
} from './pipeline-state.js';
export { runParallel } from './phase-executor.js';
export type { PhaseRunSummary, WorkerHooks } from './phase-executor.js';
export { discoverUnits, createExclusionPredicate, readPriorAnalysis } from './unit-registry.js';
export { SidecarStore } from './sidecar-store.js';
export { createToolClient } from './tool-client.js';
export type { ToolClient, ToolClientConfig, ToolBackend } from './tool-client.js';
export { parseToolResponse, isDegraded } from './llm/response-normalizer.js';
export type { StructuredResult, DegradedResult } from './llm/response-normalizer.js';
export { PromptLibrary } from './llm/prompt-loader.js';
export { ActionLogger } from './storage/action-logger.js';
export { startControlServer } from './reporting/control-server.js';
export type { ControlServer, ControlServerOptions } from './reporting/control-server.js';
export { buildConfig, loadConfigFile } from './config.js';
export type { HardenConfig } from './config.js';
export * from './errors.js';
