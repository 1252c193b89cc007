export { FileCommitter } from './committer';
export { createPipeline, orchestratorOptions } from './factory';
export type { Pipeline } from './factory';
export { Orchestrator } from './orchestrator';
export type {
  FileReport,
  FileStatus,
  OrchestratorDeps,
  OrchestratorMode,
  OrchestratorOptions,
  RunSummary,
} from './orchestrator';
export { ProcessedFileRegistry, REGISTRY_FILE_NAME, sha256 } from './registry';
